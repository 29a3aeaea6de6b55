/**
 * @relink/core
 *
 * Shared types and the boundary contract for the relink packages.
 * This is the contract layer: every other `@relink/*` package depends on it.
 *
 * Zero npm dependencies. No regex engine, no template library. Just types,
 * error classes and pure functions.
 *
 * @packageDocumentation
 */

// Boundary wrapper: must stay identical to the server-side renderer's
export {
  BOUNDARY_PREFIX,
  BOUNDARY_SUFFIX,
  PATTERN_GROUP,
  wrapPattern,
} from "./boundary.js";

// Compile errors: one class per failing stage
export {
  CompileError,
  PatternCompileError,
  TemplateParseError,
  errorMessage,
  type CompileStage,
} from "./errors.js";

// Failure report formatting for stderr and CLI output
export { formatFailureReport } from "./report.js";

// Core types used across all packages
export type {
  CompileFailureReport,
  FailureReporter,
  LinkMatch,
  LinkifierDefinition,
  OverlapPolicy,
  ParsedUrlTemplate,
  TemplateValues,
} from "./types.js";
