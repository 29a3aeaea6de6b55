/**
 * Rule table: the compiled linkifiers a renderer scans text with.
 *
 * Rebuilt wholesale from the full definition list on every configuration
 * change. One broken rule is dropped and reported; the others still link.
 */

import type { RE2JS } from "re2js";

import { errorMessage, formatFailureReport } from "@relink/core";
import type {
  CompileFailureReport,
  FailureReporter,
  LinkifierDefinition,
  ParsedUrlTemplate,
} from "@relink/core";

import { tryCompileLinkifier } from "./compile.js";

/** Compiled matcher -> URL template, in definition order. */
export type LinkifierMap = ReadonlyMap<RE2JS, ParsedUrlTemplate>;

/** Configuration for {@link LinkifierTable}. */
export interface LinkifierTableOptions {
  /**
   * Receives one report per rule that fails to compile.
   * Default: one line per failure on stderr.
   */
  reporter?: FailureReporter;
  /** Log a compile summary to stderr after each update. */
  verbose?: boolean;
}

const stderrReporter: FailureReporter = {
  name: "stderr",
  onFailure(report: CompileFailureReport): void {
    console.error(`[linkifiers] Failed to compile ${formatFailureReport(report)}`);
  },
};

/**
 * Replaceable table of compiled linkifiers.
 *
 * `update` runs synchronously to completion and publishes the new map with
 * a single reference swap, so a reader sees either the previous table or
 * the new one, never a partly rebuilt one. Readers should take `get()` per
 * scan pass and not hold it across updates.
 */
export class LinkifierTable {
  private map = new Map<RE2JS, ParsedUrlTemplate>();
  private readonly reporter: FailureReporter;
  private readonly verbose: boolean;

  constructor(options: LinkifierTableOptions = {}) {
    this.reporter = options.reporter ?? stderrReporter;
    this.verbose = options.verbose ?? false;
  }

  /** Number of compiled linkifiers in the current table. */
  get size(): number {
    return this.map.size;
  }

  /** The current table. Not a copy; do not mutate. */
  get(): LinkifierMap {
    return this.map;
  }

  /** Build the first table at startup. Same as {@link update}. */
  initialize(definitions: readonly LinkifierDefinition[]): void {
    this.update(definitions);
  }

  /**
   * Replace the whole table with the compiled form of `definitions`.
   *
   * Never throws. Rules that fail to compile are left out and passed to
   * the reporter; if every rule fails the table ends up empty.
   */
  update(definitions: readonly LinkifierDefinition[]): void {
    const next = new Map<RE2JS, ParsedUrlTemplate>();

    for (const [index, definition] of definitions.entries()) {
      const result = tryCompileLinkifier(definition);
      if (result.ok) {
        next.set(result.matcher, result.template);
      } else {
        this.report({ definition, index, error: result.error });
      }
    }

    this.map = next;

    if (this.verbose) {
      console.error(
        `[linkifiers] Compiled ${next.size} of ${definitions.length} linkifier(s)`,
      );
    }
  }

  /** Hand a failure to the reporter. Reporter errors stop here. */
  private report(report: CompileFailureReport): void {
    try {
      this.reporter.onFailure(report);
    } catch (err: unknown) {
      console.error(
        `[linkifiers] Reporter "${this.reporter.name}" failed: ${errorMessage(err)}`,
      );
    }
  }
}
