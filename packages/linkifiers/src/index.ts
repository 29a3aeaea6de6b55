/**
 * @relink/linkifiers - Linkifier rule engine.
 *
 * Compiles administrator-defined (pattern, URL template) rules into
 * boundary-anchored RE2 matchers, keeps them in a replaceable table, and
 * scans text for links.
 *
 * ```typescript
 * import { LinkifierTable, findLinks } from '@relink/linkifiers';
 *
 * const table = new LinkifierTable();
 * table.initialize([
 *   { pattern: "#(?P<id>[0-9]+)", url_template: "https://tracker.example/issue/{id}" },
 * ]);
 *
 * findLinks(table.get(), "fixed in #42");
 * // [{ start: 9, end: 12, text: "#42", url: "https://tracker.example/issue/42", ... }]
 * ```
 */

// Public API
export type { CompiledLinkifier, CompileResult } from "./compile.js";
export { compileLinkifier, tryCompileLinkifier } from "./compile.js";
export { findTemplateSyntaxError, parseUrlTemplate } from "./template.js";
export type { LinkifierMap, LinkifierTableOptions } from "./table.js";
export { LinkifierTable } from "./table.js";
export type { FindLinksOptions, TextSegment } from "./scan.js";
export { findLinks, matchLinkifier, segmentText } from "./scan.js";
export {
  DefinitionsFileError,
  linkifierDefinitionSchema,
  loadDefinitionsFile,
  parseDefinitions,
} from "./definitions.js";
