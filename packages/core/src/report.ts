import type { CompileFailureReport } from "./types.js";

/**
 * One-line description of a compile failure, for stderr and CLI output.
 *
 *   linkifier #2 (id 7): pattern "#(\d+" rejected: missing closing ): ...
 */
export function formatFailureReport(report: CompileFailureReport): string {
  const { definition, index, error } = report;
  const id = definition.id !== undefined ? ` (id ${definition.id})` : "";
  const subject =
    error.stage === "pattern"
      ? `pattern ${JSON.stringify(definition.pattern)}`
      : `url template ${JSON.stringify(definition.url_template)}`;
  return `linkifier #${index}${id}: ${subject} rejected: ${error.message}`;
}
