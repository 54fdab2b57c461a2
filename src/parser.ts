import type {
  AssignmentOperator,
  MakefileDocument,
  Target,
  Variable,
} from "./types";

const COMMENT_PATTERN = /^\s*#\s*(.*)$/;
const HELP_COMMENT_PATTERN = /^\s*##\s*([^\s:#]+)\s*:\s*(.*)$/;
const PHONY_PATTERN = /^\.PHONY\s*:(.*)$/;
const DEFAULT_GOAL_PATTERN = /^\.DEFAULT_GOAL\s*(?:::=|:=|\?=|\+=|!=|=)(.*)$/;
const VARIABLE_PATTERN =
  /^(?:(?:override|export)\s+)*([A-Za-z_.][A-Za-z0-9_.-]*)\s*(::=|:=|\?=|\+=|!=|=)(.*)$/;
const RULE_PATTERN = /^([^:#=\s][^:#=]*?)\s*(::?)(?!=)(.*)$/;
const DIRECTIVE_PATTERN =
  /^(?:ifeq|ifneq|ifdef|ifndef|else|endif|-?include|sinclude|export|unexport|override|vpath)(?:\s|$)/;
const DEFINE_PATTERN = /^(?:(?:override|export)\s+)*define(?:\s|$)/;
const ENDEF_PATTERN = /^endef(?:\s|$)/;
const HELP_PRINTF_PATTERN =
  /@printf\s+"%-\d+s\s+%s\\n"\s+"([^"]+)"\s+"([^"]*)"/;
const HELP_TABLE_HEADERS = new Set(["Target", "------"]);

interface DraftTarget {
  names: string[];
  prerequisites: string[];
  recipe: string[];
  comments: string[];
}

/** A physical-line group joined across backslash continuations. */
interface LogicalLine {
  text: string;
  isRecipe: boolean;
}

function endsWithContinuation(line: string): boolean {
  let count = 0;
  for (let i = line.length - 1; i >= 0 && line[i] === "\\"; i--) {
    count++;
  }
  return count % 2 === 1;
}

/**
 * Join physical lines ending in an unescaped backslash.
 * Recipe lines keep the continuation text as written; every other line
 * collapses the break and surrounding whitespace to one space.
 */
export function logicalLines(text: string): LogicalLine[] {
  const physical = text.split(/\r?\n/);
  const result: LogicalLine[] = [];
  let pending: LogicalLine | null = null;

  for (const raw of physical) {
    const continues = endsWithContinuation(raw);
    const body = continues ? raw.slice(0, -1) : raw;

    if (pending) {
      pending.text = pending.isRecipe
        ? pending.text + body
        : `${pending.text.trimEnd()} ${body.trimStart()}`;
    } else {
      pending = { text: body, isRecipe: body.startsWith("\t") };
    }

    if (!continues) {
      result.push(pending);
      pending = null;
    }
  }

  if (pending) {
    result.push(pending);
  }
  return result;
}

const OPERATORS: readonly AssignmentOperator[] = [
  "=",
  ":=",
  "::=",
  "?=",
  "+=",
  "!=",
];

function isOperator(token: string): token is AssignmentOperator {
  return OPERATORS.some((operator) => operator === token);
}

/** Index of the first unescaped `#`, or -1. */
function commentIndex(text: string): number {
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "#" && text[i - 1] !== "\\") {
      return i;
    }
  }
  return -1;
}

function stripComment(text: string): string {
  const index = commentIndex(text);
  return index === -1 ? text : text.slice(0, index);
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/** `## description` after a rule header, as used by self-documenting Makefiles. */
function inlineHelp(comment: string): string | null {
  if (!comment.startsWith("##")) {
    return null;
  }
  const description = comment.replace(/^#+\s*/, "").trim();
  return description.length > 0 ? description : null;
}

class MakefileParser {
  private readonly drafts = new Map<string, DraftTarget>();
  private readonly variables = new Map<string, Variable>();
  private readonly phony = new Set<string>();
  private readonly helpEntries = new Map<string, string>();
  private defaultGoal: string | null = null;

  private pendingComments: string[] = [];
  private current: DraftTarget | null = null;
  private inDefine = false;

  parse(text: string): MakefileDocument {
    for (const line of logicalLines(text)) {
      this.consume(line);
    }

    const targets: Target[] = [...this.drafts.values()].map((draft) => ({
      names: draft.names,
      key: draft.names.join(" "),
      prerequisites: draft.prerequisites,
      recipe: draft.recipe,
      comments: draft.comments,
      is_phony: draft.names.some((name) => this.phony.has(name)),
    }));

    return {
      targets,
      variables: this.variables,
      phony: this.phony,
      help_entries: this.helpEntries,
      default_goal: this.defaultGoal,
    };
  }

  private consume({ text: line, isRecipe }: LogicalLine): void {
    if (this.inDefine) {
      if (ENDEF_PATTERN.test(line.trim())) {
        this.inDefine = false;
      }
      return;
    }

    // a tab-only line is blank and closes the recipe
    if (line.trim().length === 0) {
      this.current = null;
      this.pendingComments = [];
      return;
    }

    if (isRecipe) {
      // orphaned recipe lines (no open rule) are dropped
      this.appendRecipe(line.slice(1));
      this.pendingComments = [];
      return;
    }

    this.current = null;

    const comment = COMMENT_PATTERN.exec(line);
    if (comment) {
      this.pendingComments.push(comment[1].trimEnd());
      const help = HELP_COMMENT_PATTERN.exec(line);
      const description = help ? help[2].trim() : "";
      if (help && description.length > 0) {
        this.helpEntries.set(help[1], description);
      }
      return;
    }

    const trimmed = line.trimStart();

    if (DEFINE_PATTERN.test(trimmed)) {
      this.inDefine = true;
      this.pendingComments = [];
      return;
    }

    const phonyMatch = PHONY_PATTERN.exec(trimmed);
    if (phonyMatch) {
      for (const name of splitWords(stripComment(phonyMatch[1]))) {
        this.phony.add(name);
      }
      this.pendingComments = [];
      return;
    }

    const goalMatch = DEFAULT_GOAL_PATTERN.exec(trimmed);
    if (goalMatch) {
      this.defaultGoal = stripComment(goalMatch[1]).trim() || null;
      this.pendingComments = [];
      return;
    }

    const variableMatch = VARIABLE_PATTERN.exec(trimmed);
    const operator = variableMatch?.[2] ?? "";
    if (variableMatch && isOperator(operator)) {
      const name = variableMatch[1];
      this.variables.set(name, {
        name,
        operator,
        value: variableMatch[3].trim(),
        comments: this.takeComments(),
      });
      return;
    }

    if (DIRECTIVE_PATTERN.test(trimmed)) {
      this.pendingComments = [];
      return;
    }

    const ruleMatch = RULE_PATTERN.exec(trimmed);
    if (ruleMatch) {
      this.consumeRule(splitWords(ruleMatch[1]), ruleMatch[3]);
      return;
    }

    this.pendingComments = [];
  }

  private consumeRule(names: string[], rest: string): void {
    let header = rest;
    let inlineRecipe: string | null = null;

    const hash = commentIndex(header);
    const semicolon = header.indexOf(";");
    if (semicolon !== -1 && (hash === -1 || semicolon < hash)) {
      inlineRecipe = header.slice(semicolon + 1).trim();
      header = header.slice(0, semicolon);
    }

    const headerHash = commentIndex(header);
    const prerequisites = splitWords(
      headerHash === -1 ? header : header.slice(0, headerHash)
    );
    this.openTarget(names, prerequisites);

    if (headerHash !== -1) {
      const description = inlineHelp(header.slice(headerHash));
      if (description) {
        for (const name of names) {
          this.helpEntries.set(name, description);
        }
      }
    }
    if (inlineRecipe) {
      this.appendRecipe(inlineRecipe);
    }
  }

  private takeComments(): string[] {
    const taken = this.pendingComments;
    this.pendingComments = [];
    return taken;
  }

  /** A header whose name key was seen before replaces that rule in place. */
  private openTarget(names: string[], prerequisites: string[]): void {
    const key = names.join(" ");
    const comments = this.takeComments();
    const existing = this.drafts.get(key);

    if (existing) {
      existing.prerequisites = prerequisites;
      existing.comments = comments;
      existing.recipe = [];
      this.current = existing;
    } else {
      this.current = { names, prerequisites, recipe: [], comments };
      this.drafts.set(key, this.current);
    }
  }

  private appendRecipe(line: string): void {
    const target = this.current;
    if (!target) {
      return;
    }
    target.recipe.push(line);

    if (target.names.includes("help")) {
      const match = HELP_PRINTF_PATTERN.exec(line);
      if (match && !HELP_TABLE_HEADERS.has(match[1])) {
        this.helpEntries.set(match[1], match[2]);
      }
    }
  }
}

/**
 * Parse Makefile text into a MakefileDocument.
 *
 * Parsing is permissive: orphaned recipe lines, unknown directives and
 * anything else it does not recognize are dropped, never thrown.
 * Comments attach to the next declaration only when no blank line
 * separates them.
 */
export function parseMakefile(text: string): MakefileDocument {
  return new MakefileParser().parse(text);
}
