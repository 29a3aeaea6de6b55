/**
 * `relink check` and `relink match`.
 *
 * Commands write through a CommandIO and return an exit code, so main.ts
 * owns the process and tests can capture output.
 */

import { formatFailureReport } from "@relink/core";
import type {
  CompileFailureReport,
  FailureReporter,
  LinkifierDefinition,
} from "@relink/core";
import {
  DefinitionsFileError,
  LinkifierTable,
  findLinks,
  loadDefinitionsFile,
} from "@relink/linkifiers";
import { combineReporters, createFileReporter } from "@relink/logger";

import type { CheckArgs, MatchArgs } from "./args.js";
import type { ResolvedConfig } from "./config.js";

export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
}

/** Exit codes shared by both commands. */
export const EXIT_OK = 0;
export const EXIT_RULE_FAILED = 1;
export const EXIT_BAD_FILE = 2;

interface LoadedTable {
  table: LinkifierTable;
  definitions: LinkifierDefinition[];
  failures: CompileFailureReport[];
}

/**
 * Collect failures in memory; also write them to disk when a report
 * directory is configured.
 */
function buildReporter(
  config: ResolvedConfig,
  failures: CompileFailureReport[],
): FailureReporter {
  const collector: FailureReporter = {
    name: "cli",
    onFailure(report: CompileFailureReport): void {
      failures.push(report);
    },
  };
  if (config.reportDir === null) return collector;

  return combineReporters(
    collector,
    createFileReporter({
      reportDir: config.reportDir,
      maxReports: config.maxReports,
    }),
  );
}

/** Load a definitions file into a fresh table. Null if the file is unusable. */
function loadTable(
  file: string,
  config: ResolvedConfig,
  io: CommandIO,
): LoadedTable | null {
  let definitions: LinkifierDefinition[];
  try {
    definitions = loadDefinitionsFile(file);
  } catch (err: unknown) {
    if (err instanceof DefinitionsFileError) {
      io.err(err.message);
      return null;
    }
    throw err;
  }

  const failures: CompileFailureReport[] = [];
  const table = new LinkifierTable({
    reporter: buildReporter(config, failures),
    verbose: config.verbose,
  });
  table.initialize(definitions);

  return { table, definitions, failures };
}

export function runCheck(
  args: CheckArgs,
  config: ResolvedConfig,
  io: CommandIO,
): number {
  const loaded = loadTable(args.file, config, io);
  if (!loaded) return EXIT_BAD_FILE;

  for (const failure of loaded.failures) {
    io.err(`FAIL ${formatFailureReport(failure)}`);
  }
  io.out(
    `${loaded.table.size} of ${loaded.definitions.length} linkifier(s) compiled`,
  );

  return loaded.failures.length > 0 ? EXIT_RULE_FAILED : EXIT_OK;
}

export function runMatch(
  args: MatchArgs,
  config: ResolvedConfig,
  io: CommandIO,
): number {
  const loaded = loadTable(args.file, config, io);
  if (!loaded) return EXIT_BAD_FILE;

  for (const failure of loaded.failures) {
    io.err(`[linkifiers] Skipping ${formatFailureReport(failure)}`);
  }

  const links = findLinks(loaded.table.get(), args.text, {
    overlap: args.overlap ?? config.overlap,
  });

  if (args.json) {
    io.out(JSON.stringify(links, null, 2));
    return EXIT_OK;
  }

  for (const link of links) {
    io.out(`${link.start}-${link.end}\t${link.text}\t${link.url}`);
  }
  return EXIT_OK;
}
