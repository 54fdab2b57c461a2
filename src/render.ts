import { structuredPatch } from "diff";
import { isEmptyDiff } from "./compare";
import { parseMakefile } from "./parser";
import type {
  AssignmentOperator,
  DiffResult,
  MakefileDocument,
  OutputFormat,
  RenderOptions,
  Variable,
} from "./types";

const RULE = "=".repeat(50);

const OPERATOR_NAMES: Record<AssignmentOperator, string> = {
  "=": "recursive",
  ":=": "immediate",
  "::=": "immediate",
  "?=": "conditional",
  "+=": "append",
  "!=": "shell",
};

interface ResolvedOptions {
  sourceLabel: string;
  targetLabel: string;
  context: number;
}

function resolveOptions(options: RenderOptions = {}): ResolvedOptions {
  return {
    sourceLabel: options.sourceLabel ?? "source",
    targetLabel: options.targetLabel ?? "target",
    context: options.context ?? 3,
  };
}

function section(title: string, items: string[]): string[] {
  return [`${title} (${items.length})`, ...items.map((item) => `  • ${item}`), ""];
}

function helpFor(source: MakefileDocument, key: string): string | undefined {
  const names = [key, ...key.split(" ")];
  return names.map((name) => source.help_entries.get(name)).find((text) => text !== undefined);
}

function newTargetItem(key: string, source?: MakefileDocument): string {
  const description = source ? helpFor(source, key) : undefined;
  return description === undefined ? key : `${key} → ${description}`;
}

function modifiedTargetItem(key: string, source?: MakefileDocument): string {
  const target = source?.targets.find((t) => t.key === key);
  if (!target) {
    return key;
  }
  const deps = target.prerequisites.length > 0 ? target.prerequisites.join(" ") : "(none)";
  return `${key} → Dependencies: ${deps}`;
}

/**
 * Human-readable report. Only non-empty collections get a section.
 *
 * With the parsed source document, new targets carry their help text and
 * modified targets their prerequisites.
 */
export function renderAnalysis(
  result: DiffResult,
  options?: RenderOptions,
  source?: MakefileDocument
): string {
  const { sourceLabel, targetLabel } = resolveOptions(options);
  const lines = [
    "Makefile Meld Analysis",
    RULE,
    "",
    `Source: ${sourceLabel}`,
    `Target: ${targetLabel}`,
    "",
  ];

  if (isEmptyDiff(result)) {
    lines.push("No structural differences.", "");
  }

  if (result.new_targets.length > 0) {
    lines.push(
      ...section(
        "NEW TARGETS",
        result.new_targets.map((key) => newTargetItem(key, source))
      )
    );
  }
  if (result.modified_targets.length > 0) {
    lines.push(
      ...section(
        "MODIFIED TARGETS",
        result.modified_targets.map((key) => modifiedTargetItem(key, source))
      )
    );
  }
  if (result.removed_targets.length > 0) {
    lines.push(...section("REMOVED TARGETS", [...result.removed_targets]));
  }
  if (result.new_variables.size > 0) {
    const items = [...result.new_variables.values()].map(
      (v) => `${v.name} ${v.operator} ${v.value} [${OPERATOR_NAMES[v.operator]}]`
    );
    lines.push(...section("NEW VARIABLES", items));
  }
  if (result.changed_variables.size > 0) {
    const items = [...result.changed_variables].map(([name, change]) => {
      const item = `${name}: ${change.old.value} → ${change.new.value}`;
      return change.old.operator === change.new.operator
        ? item
        : `${item}\n    (operator: ${change.old.operator} → ${change.new.operator})`;
    });
    lines.push(...section("CHANGED VARIABLES", items));
  }
  if (result.new_phony.length > 0) {
    lines.push(...section("NEW .PHONY DECLARATIONS", [...result.new_phony]));
  }
  if (result.help_changes.size > 0) {
    const items = [...result.help_changes].map(([name, change]) =>
      change.old === null
        ? `${name}: ${change.new}`
        : `${name}: ${change.new}\n    (was: ${change.old})`
    );
    lines.push(...section("HELP ENTRIES", items));
  }

  lines.push(RULE);
  return lines.join("\n");
}

function variableRecord(variable: Variable) {
  return {
    operator: variable.operator,
    value: variable.value,
    comments: [...variable.comments],
  };
}

/**
 * Machine-readable record. All seven keys are always present.
 */
export function renderJson(result: DiffResult): string {
  const record = {
    new_targets: [...result.new_targets],
    modified_targets: [...result.modified_targets],
    removed_targets: [...result.removed_targets],
    new_variables: Object.fromEntries(
      [...result.new_variables].map(([name, v]) => [name, variableRecord(v)])
    ),
    changed_variables: Object.fromEntries(
      [...result.changed_variables].map(([name, change]) => [
        name,
        { old: variableRecord(change.old), new: variableRecord(change.new) },
      ])
    ),
    new_phony: [...result.new_phony],
    help_changes: Object.fromEntries(
      [...result.help_changes].map(([name, change]) => [name, change.new])
    ),
  };
  return JSON.stringify(record, null, 2);
}

/**
 * Unified diff from the target text to the source text.
 * Returns an empty string when the texts are identical.
 * Applying the result to the target text gives back the source text,
 * including when either side is empty.
 */
export function renderUnifiedDiff(
  sourceText: string,
  targetText: string,
  options?: RenderOptions
): string {
  const { sourceLabel, targetLabel, context } = resolveOptions(options);
  const patch = structuredPatch(
    targetLabel,
    sourceLabel,
    targetText,
    sourceText,
    undefined,
    undefined,
    { context }
  );

  if (patch.hunks.length === 0) {
    return "";
  }

  const lines = [`--- ${targetLabel}`, `+++ ${sourceLabel}`];
  for (const hunk of patch.hunks) {
    // an empty source has no last line to lack a newline
    const body =
      sourceText.length === 0
        ? hunk.lines.filter((line) => !line.startsWith("\\"))
        : hunk.lines;
    // an empty range is numbered from the line before it
    const oldStart = hunk.oldLines === 0 ? hunk.oldStart - 1 : hunk.oldStart;
    const newStart = hunk.newLines === 0 ? hunk.newStart - 1 : hunk.newStart;
    lines.push(
      `@@ -${oldStart},${hunk.oldLines} +${newStart},${hunk.newLines} @@`,
      ...body
    );
  }
  return `${lines.join("\n")}\n`;
}

const PROMPT_PREAMBLE = `I'm melding features from a source Makefile into a target Makefile.

For each difference between the two files, evaluate:
1. **Compatibility**: Does the target project's structure support it?
2. **Value**: Does it improve the target's workflow?
3. **Risk**: Any naming conflicts or dependency issues?
4. **Assignment operators**: Are \`?=\` vs \`:=\` vs \`=\` used correctly?
5. **Recommendation**: Include, exclude, or modify?

Please provide a structured analysis for merging these features.`;

/**
 * Self-contained prompt: instructions, both files and the unified diff.
 */
export function renderPrompt(
  sourceText: string,
  targetText: string,
  options?: RenderOptions
): string {
  const { sourceLabel, targetLabel } = resolveOptions(options);
  const diff = renderUnifiedDiff(sourceText, targetText, options);

  return [
    PROMPT_PREAMBLE,
    "",
    `SOURCE: ${sourceLabel}`,
    `TARGET: ${targetLabel}`,
    "",
    `## Full Source File (${sourceLabel})`,
    "",
    "```makefile",
    sourceText.trimEnd(),
    "```",
    "",
    `## Full Target File (${targetLabel})`,
    "",
    "```makefile",
    targetText.trimEnd(),
    "```",
    "",
    "## Unified Diff",
    "",
    "```diff",
    diff.trimEnd(),
    "```",
  ].join("\n");
}

export function render(
  result: DiffResult,
  sourceText: string,
  targetText: string,
  format: OutputFormat,
  options?: RenderOptions
): string {
  switch (format) {
    case "analysis":
      return renderAnalysis(result, options, parseMakefile(sourceText));
    case "json":
      return renderJson(result);
    case "diff":
      return renderUnifiedDiff(sourceText, targetText, options);
    case "prompt":
      return renderPrompt(sourceText, targetText, options);
  }
}
