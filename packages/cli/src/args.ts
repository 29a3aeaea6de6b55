/**
 * Argument parser for the relink CLI.
 *
 * Supports subcommands, boolean flags, and options with a value.
 */

import type { OverlapPolicy } from "@relink/core";

// --- Options shared by `check` and `match` ---

interface CommonOptions {
  /** Write failure reports here. Null means "use env or don't write". */
  reportDir: string | null;
  /** Report retention. Null means "use env or default". */
  maxReports: number | null;
  verbose: boolean;
}

export interface CheckArgs extends CommonOptions {
  command: "check";
  /** Path to the definitions file. */
  file: string;
}

export interface MatchArgs extends CommonOptions {
  command: "match";
  file: string;
  /** Text to scan (remaining arguments joined with spaces). */
  text: string;
  /** Null means "use env or default". */
  overlap: OverlapPolicy | null;
  json: boolean;
}

export interface HelpArgs {
  command: "help";
  topic: string | null;
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs = CheckArgs | MatchArgs | HelpArgs | VersionArgs;

export interface ParseError {
  error: string;
}

export type ParseResult = ParsedArgs | ParseError;

export function isError(result: ParseResult): result is ParseError {
  return "error" in result;
}

export const OVERLAP_POLICIES: readonly OverlapPolicy[] = [
  "first-rule",
  "leftmost-longest",
  "all",
];

export function isOverlapPolicy(value: string): value is OverlapPolicy {
  return OVERLAP_POLICIES.some((policy) => policy === value);
}

const COMMON_OPTIONS_HELP = `
  --report-dir <path>    Also write failure reports as JSON files here
                         (env: RELINK_REPORT_DIR)
  --max-reports <n>      Keep only the last N report files (default: 0 = unlimited,
                         env: RELINK_MAX_REPORTS)
  --verbose              Log a compile summary to stderr
  -h, --help             Show this help`;

const CHECK_HELP = `
relink check [options] <file>

Compile every linkifier in a definitions file and report the ones that
fail. Exits 1 if any rule fails to compile, 2 if the file cannot be read.

Options:${COMMON_OPTIONS_HELP}

Examples:
  relink check linkifiers.json
  relink check --report-dir ./failures linkifiers.json
`.trim();

const MATCH_HELP = `
relink match [options] <file> <text...>

Scan text with the linkifiers in a definitions file and print each link
as "start-end<TAB>text<TAB>url". Rules that fail to compile are skipped.

Options:
  --overlap <policy>     first-rule, leftmost-longest, all (default: first-rule,
                         env: RELINK_OVERLAP)
  --json                 Print matches as JSON${COMMON_OPTIONS_HELP}

Examples:
  relink match linkifiers.json "fixed in #42"
  relink match --overlap all linkifiers.json -- "--flag text #7"
`.trim();

const MAIN_HELP = `
relink - linkifier rule engine toolkit

Usage:
  relink <command> [options]

Commands:
  check      Compile a definitions file and report broken rules
  match      Scan text with a definitions file
  version    Show version
  help       Show help for a command

Run 'relink help <command>' for details on a specific command.
`.trim();

export function getHelp(topic: string | null): string {
  if (topic === "check") return CHECK_HELP;
  if (topic === "match") return MATCH_HELP;
  return MAIN_HELP;
}

export function parseArgs(argv: string[]): ParseResult {
  // Strip node and script path
  const args = argv.slice(2);

  if (args.length === 0) {
    return { command: "help", topic: null };
  }

  const sub = args[0];

  if (sub === "--version" || sub === "-v" || sub === "version") {
    return { command: "version" };
  }

  if (sub === "--help" || sub === "-h" || sub === "help") {
    return { command: "help", topic: args[1] ?? null };
  }

  if (sub === "check" || sub === "match") {
    return parseCommandArgs(sub, args.slice(1));
  }

  return { error: `Unknown command: ${sub}\n\n${MAIN_HELP}` };
}

function parseCommandArgs(
  command: "check" | "match",
  args: string[],
): ParseResult {
  const help = command === "check" ? CHECK_HELP : MATCH_HELP;
  const positional: string[] = [];
  let reportDir: string | null = null;
  let maxReports: number | null = null;
  let verbose = false;
  let overlap: OverlapPolicy | null = null;
  let json = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    // -- separator: everything after is positional
    if (arg === "--") {
      positional.push(...args.slice(i + 1));
      break;
    }

    if (arg === "--help" || arg === "-h") {
      return { command: "help", topic: command };
    }

    if (arg === "--report-dir") {
      i++;
      if (i >= args.length) return { error: "--report-dir requires a value" };
      reportDir = args[i];
    } else if (arg === "--max-reports") {
      i++;
      if (i >= args.length) return { error: "--max-reports requires a value" };
      const n = parseInt(args[i], 10);
      if (isNaN(n) || n < 0) {
        return { error: `Invalid value for --max-reports: ${args[i]}` };
      }
      maxReports = n;
    } else if (arg === "--verbose") {
      verbose = true;
    } else if (command === "match" && arg === "--overlap") {
      i++;
      if (i >= args.length) return { error: "--overlap requires a value" };
      const value = args[i];
      if (!isOverlapPolicy(value)) {
        return {
          error: `Invalid overlap policy: ${value}. Must be one of: ${OVERLAP_POLICIES.join(", ")}`,
        };
      }
      overlap = value;
    } else if (command === "match" && arg === "--json") {
      json = true;
    } else if (arg.startsWith("-")) {
      return { error: `Unknown option: ${arg}\n\n${help}` };
    } else {
      positional.push(arg);
    }

    i++;
  }

  const [file, ...rest] = positional;
  if (file === undefined) {
    return { error: `No definitions file specified\n\n${help}` };
  }

  if (command === "check") {
    if (rest.length > 0) {
      return { error: `Unexpected argument: ${rest[0]}\n\n${help}` };
    }
    return { command, file, reportDir, maxReports, verbose };
  }

  if (rest.length === 0) {
    return { error: `No text specified\n\n${help}` };
  }
  return {
    command,
    file,
    text: rest.join(" "),
    overlap,
    json,
    reportDir,
    maxReports,
    verbose,
  };
}
