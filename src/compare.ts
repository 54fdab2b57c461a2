import type {
  DiffResult,
  HelpChange,
  MakefileDocument,
  Target,
  Variable,
  VariableChange,
} from "./types";

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

function indexTargets(document: MakefileDocument): Map<string, Target> {
  return new Map(document.targets.map((target) => [target.key, target]));
}

/**
 * Compare a source Makefile against a target Makefile.
 * Reports what the source has that the target lacks or has differently;
 * targets present only in the target are the one reverse-direction report.
 */
export function diffDocuments(
  source: MakefileDocument,
  target: MakefileDocument
): DiffResult {
  const sourceTargets = indexTargets(source);
  const targetTargets = indexTargets(target);

  const newTargets: string[] = [];
  const modifiedTargets: string[] = [];

  for (const [key, src] of sourceTargets) {
    const tgt = targetTargets.get(key);
    if (!tgt) {
      newTargets.push(key);
      continue;
    }
    // comments alone never make a target modified
    if (
      !(
        sameSequence(src.prerequisites, tgt.prerequisites) &&
        sameSequence(src.recipe, tgt.recipe)
      )
    ) {
      modifiedTargets.push(key);
    }
  }

  const removedTargets = [...targetTargets.keys()].filter(
    (key) => !sourceTargets.has(key)
  );

  const newVariables = new Map<string, Variable>();
  const changedVariables = new Map<string, VariableChange>();

  for (const [name, src] of source.variables) {
    const tgt = target.variables.get(name);
    if (!tgt) {
      newVariables.set(name, src);
    } else if (
      src.operator !== tgt.operator ||
      src.value.trim() !== tgt.value.trim()
    ) {
      changedVariables.set(name, { old: tgt, new: src });
    }
  }

  const newPhony = [...source.phony].filter((name) => !target.phony.has(name));

  const helpChanges = new Map<string, HelpChange>();
  for (const [name, description] of source.help_entries) {
    const previous = target.help_entries.get(name);
    if (previous !== description) {
      helpChanges.set(name, { old: previous ?? null, new: description });
    }
  }

  return Object.freeze({
    new_targets: newTargets,
    modified_targets: modifiedTargets,
    removed_targets: removedTargets,
    new_variables: newVariables,
    changed_variables: changedVariables,
    new_phony: newPhony,
    help_changes: helpChanges,
  });
}

/** True when the comparison found nothing to report. */
export function isEmptyDiff(result: DiffResult): boolean {
  return (
    result.new_targets.length === 0 &&
    result.modified_targets.length === 0 &&
    result.removed_targets.length === 0 &&
    result.new_variables.size === 0 &&
    result.changed_variables.size === 0 &&
    result.new_phony.length === 0 &&
    result.help_changes.size === 0
  );
}
