/**
 * Assignment operators recognized in variable lines.
 * `=` recursive, `:=`/`::=` immediate, `?=` conditional, `+=` append, `!=` shell.
 */
export type AssignmentOperator = "=" | ":=" | "::=" | "?=" | "+=" | "!=";

/** One variable assignment. */
export interface Variable {
  name: string;
  operator: AssignmentOperator;
  /** Right-hand side, continuation-joined and trimmed. */
  value: string;
  /** Comment lines directly above the assignment. */
  comments: readonly string[];
}

/**
 * One rule. A header naming several targets is a single Target whose
 * identity is the full name list.
 */
export interface Target {
  names: readonly string[];
  /** `names` joined by a single space; the identity used in diff results. */
  key: string;
  prerequisites: readonly string[];
  /** Command lines with the leading tab removed. */
  recipe: readonly string[];
  comments: readonly string[];
  is_phony: boolean;
}

/**
 * A parsed Makefile.
 * Collections keep the order in which entries first appear in the file.
 */
export interface MakefileDocument {
  targets: readonly Target[];
  variables: ReadonlyMap<string, Variable>;
  phony: ReadonlySet<string>;
  help_entries: ReadonlyMap<string, string>;
  default_goal: string | null;
}

export interface VariableChange {
  /** The target file's assignment. */
  old: Variable;
  /** The source file's assignment. */
  new: Variable;
}

export interface HelpChange {
  /** Target file's description, or null when it has none. */
  old: string | null;
  new: string;
}

/**
 * What the source Makefile has that the target lacks or has differently.
 */
export interface DiffResult {
  new_targets: readonly string[];
  modified_targets: readonly string[];
  removed_targets: readonly string[];
  new_variables: ReadonlyMap<string, Variable>;
  changed_variables: ReadonlyMap<string, VariableChange>;
  new_phony: readonly string[];
  help_changes: ReadonlyMap<string, HelpChange>;
}

export const OUTPUT_FORMATS = ["analysis", "json", "diff", "prompt"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface RenderOptions {
  /** Label for the source side, usually its path. */
  sourceLabel?: string;
  targetLabel?: string;
  /** Context lines around each unified diff hunk. */
  context?: number;
}

/**
 * The resolved, validated makemeld configuration.
 */
export interface MeldConfig {
  /** Default output format when `--output` is not given. */
  output?: OutputFormat;
  /** Default unified diff context. */
  context?: number;
  /** Command template that receives the prompt through `{prompt}`. */
  runner?: string;
}
