/**
 * Core types for the relink packages.
 *
 * These are the public types that the compiler, the rule table, reporters
 * and renderers depend on. Zero external dependencies.
 */

import type { CompileError } from "./errors.js";

// --- Rule definitions (configuration input) ---

/**
 * One administrator-defined linkifier, as delivered by configuration.
 *
 * Field names follow the wire format. Neither field is validated beyond
 * what compilation rejects.
 */
export interface LinkifierDefinition {
  /** Server-assigned identifier, when the source has one. */
  id?: number;
  /** Regex fragment in RE2 syntax. Named groups feed the URL template. */
  pattern: string;
  /** RFC 6570 URI template whose variables are the pattern's named groups. */
  url_template: string;
}

// --- Templates ---

/** Values substituted into a URL template, keyed by variable name. */
export type TemplateValues = Record<string, string>;

/** A validated URL template, ready to expand. */
export interface ParsedUrlTemplate {
  /** The template string as configured. */
  readonly source: string;
  expand(values: TemplateValues): string;
}

// --- Failure reporting ---

/**
 * A single rule that failed to compile during a table update.
 *
 * Passed to the table's reporter; the rule itself is dropped.
 */
export interface CompileFailureReport {
  definition: LinkifierDefinition;
  /** Position of the definition in the update's input list. */
  index: number;
  error: CompileError;
}

/**
 * Receives compile-failure reports. Fire-and-forget: return values are
 * ignored and exceptions are contained by the caller.
 */
export interface FailureReporter {
  /** Identifier for logging. */
  name: string;
  onFailure(report: CompileFailureReport): void;
}

// --- Scanning ---

/**
 * How a scanner resolves matches from different rules that cover
 * overlapping text.
 *
 * - "first-rule": rules claim spans in table order; a later rule's match
 *   is dropped if it overlaps an accepted one.
 * - "leftmost-longest": earliest start wins, then the longer span, then
 *   table order.
 * - "all": every match of every rule, overlaps included.
 */
export type OverlapPolicy = "first-rule" | "leftmost-longest" | "all";

/** A linkifier match in scanned text. */
export interface LinkMatch {
  /** Offset of the linked text (UTF-16 code units). */
  start: number;
  /** Offset just past the linked text. */
  end: number;
  /** The linked text; boundary characters are not included. */
  text: string;
  /** Expanded destination URL. */
  url: string;
  /** Values of the pattern's named groups that took part in the match. */
  groups: TemplateValues;
  /** Position of the matching rule in table order. */
  rule: number;
}
