import { diffDocuments } from "./compare";
import { parseMakefile } from "./parser";
import { render } from "./render";
import type {
  DiffResult,
  MakefileDocument,
  OutputFormat,
  RenderOptions,
} from "./types";

export { isEmptyDiff } from "./compare";
export {
  render,
  renderAnalysis,
  renderJson,
  renderPrompt,
  renderUnifiedDiff,
} from "./render";
export type * from "./types";
export { OUTPUT_FORMATS } from "./types";

export function parse(text: string): MakefileDocument {
  return parseMakefile(text);
}

export function diff(
  source: MakefileDocument,
  target: MakefileDocument
): DiffResult {
  return diffDocuments(source, target);
}

/**
 * Parse both texts, compare them and render the result in one call.
 */
export function meld(
  sourceText: string,
  targetText: string,
  format: OutputFormat,
  options?: RenderOptions
): string {
  const result = diffDocuments(parseMakefile(sourceText), parseMakefile(targetText));
  return render(result, sourceText, targetText, format, options);
}
