/**
 * CLI configuration resolution.
 *
 * Merges command-line overrides with environment variables and applies
 * defaults before a command runs.
 */

import type { OverlapPolicy } from "@relink/core";

import { OVERLAP_POLICIES, isOverlapPolicy } from "./args.js";

/** Settings a caller may override. Undefined means "not set here". */
export interface CliConfig {
  reportDir?: string;
  maxReports?: number;
  overlap?: OverlapPolicy;
  verbose?: boolean;
}

/**
 * Fully resolved config with all defaults applied.
 */
export interface ResolvedConfig {
  /** Directory for failure report files, or null to not write any. */
  reportDir: string | null;
  maxReports: number;
  overlap: OverlapPolicy;
  verbose: boolean;
}

export type Env = Record<string, string | undefined>;

/**
 * Resolve final config from environment variables and overrides.
 *
 * Priority: overrides > environment variables > defaults.
 *
 * Environment variables:
 * - `RELINK_REPORT_DIR` writes failure reports to this directory
 * - `RELINK_MAX_REPORTS` report retention (default: 0 = unlimited)
 * - `RELINK_OVERLAP` overlap policy for `match` (default: "first-rule")
 * - `RELINK_VERBOSE=1` compile summaries on stderr
 *
 * @throws Error if an environment variable holds an invalid value.
 */
export function resolveConfig(
  overrides?: CliConfig,
  env: Env = process.env,
): ResolvedConfig {
  const reportDir = overrides?.reportDir || env.RELINK_REPORT_DIR || null;

  let maxReports = overrides?.maxReports;
  if (maxReports === undefined && env.RELINK_MAX_REPORTS) {
    maxReports = parseInt(env.RELINK_MAX_REPORTS, 10);
    if (isNaN(maxReports) || maxReports < 0) {
      throw new Error(`Invalid RELINK_MAX_REPORTS: ${env.RELINK_MAX_REPORTS}`);
    }
  }

  let overlap = overrides?.overlap;
  if (overlap === undefined && env.RELINK_OVERLAP) {
    const value = env.RELINK_OVERLAP;
    if (!isOverlapPolicy(value)) {
      throw new Error(
        `Invalid RELINK_OVERLAP: ${value}. Must be one of: ${OVERLAP_POLICIES.join(", ")}`,
      );
    }
    overlap = value;
  }

  const verbose = overrides?.verbose || env.RELINK_VERBOSE === "1";

  return {
    reportDir,
    maxReports: maxReports ?? 0,
    overlap: overlap ?? "first-rule",
    verbose,
  };
}
