/**
 * relink CLI entry point.
 *
 * Wires the linkifiers and logger packages into a single binary for
 * checking definition files and trying them against sample text.
 */

import { errorMessage } from "@relink/core";

import { getHelp, isError, parseArgs } from "./args.js";
import { EXIT_BAD_FILE, runCheck, runMatch } from "./commands.js";
import type { CommandIO } from "./commands.js";
import { resolveConfig } from "./config.js";
import type { ResolvedConfig } from "./config.js";

const VERSION = "0.1.0";

const io: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function main(): number {
  const parsed = parseArgs(process.argv);
  if (isError(parsed)) {
    console.error(parsed.error);
    return EXIT_BAD_FILE;
  }

  switch (parsed.command) {
    case "version":
      console.log(VERSION);
      return 0;
    case "help":
      console.log(getHelp(parsed.topic));
      return 0;
    case "check":
    case "match": {
      let config: ResolvedConfig;
      try {
        config = resolveConfig({
          reportDir: parsed.reportDir ?? undefined,
          maxReports: parsed.maxReports ?? undefined,
          overlap:
            parsed.command === "match" ? (parsed.overlap ?? undefined) : undefined,
          verbose: parsed.verbose,
        });
      } catch (err: unknown) {
        console.error(errorMessage(err));
        return EXIT_BAD_FILE;
      }
      return parsed.command === "check"
        ? runCheck(parsed, config, io)
        : runMatch(parsed, config, io);
    }
  }
}

process.exitCode = main();
