/**
 * @relink/logger - Failure reporters for @relink/linkifiers.
 *
 * Writes each linkifier compile failure as a JSON file to a directory.
 * Uses atomic writes (write to .tmp, then rename) so readers never see
 * partial files.
 *
 * Filenames sort chronologically:
 *   1739000000000-000001.json
 */

import fs from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { errorMessage, formatFailureReport } from "@relink/core";
import type { CompileFailureReport, FailureReporter } from "@relink/core";

export interface FileReporterConfig {
  /**
   * Directory to write report files to.
   * Default: ~/.relink/failures
   */
  reportDir?: string;

  /**
   * Maximum number of report files to keep. Older files are pruned on
   * startup. Set to 0 to keep everything.
   * Default: 0 (no limit)
   */
  maxReports?: number;
}

export interface FileReporter extends FailureReporter {
  /** The resolved directory where reports are written. */
  reportDir: string;
}

/** A compile failure as written to disk. */
export interface FailureRecord {
  /** ISO-8601 time the failure was reported. */
  timestamp: string;
  index: number;
  id: number | null;
  pattern: string;
  url_template: string;
  stage: "pattern" | "template";
  message: string;
  /** Single-line summary, same as the stderr output. */
  summary: string;
}

const REPORT_FILE = /^(\d{13})-(\d{6})\.json$/;

export function toFailureRecord(report: CompileFailureReport): FailureRecord {
  return {
    timestamp: new Date().toISOString(),
    index: report.index,
    id: report.definition.id ?? null,
    pattern: report.definition.pattern,
    url_template: report.definition.url_template,
    stage: report.error.stage,
    message: report.error.message,
    summary: formatFailureReport(report),
  };
}

/**
 * Create a reporter that writes compile failures to disk.
 *
 * ```typescript
 * import { createFileReporter } from '@relink/logger';
 *
 * const reporter = createFileReporter({ maxReports: 200 });
 * const table = new LinkifierTable({ reporter });
 * console.log(reporter.reportDir); // ~/.relink/failures
 * ```
 */
export function createFileReporter(config?: FileReporterConfig): FileReporter {
  const reportDir =
    config?.reportDir || join(homedir(), ".relink", "failures");
  const maxReports = config?.maxReports ?? 0;

  let dirReady = false;
  let counter = 0;

  function ensureDir(): void {
    if (dirReady) return;
    fs.mkdirSync(reportDir, { recursive: true });
    dirReady = true;
    if (maxReports > 0) {
      pruneOldReports();
    }
  }

  /** Format: {timestamp}-{counter}.json */
  function buildFilename(): string {
    const ts = Date.now();
    const seq = String(counter++).padStart(6, "0");
    return `${ts}-${seq}.json`;
  }

  /**
   * Prune old reports, keeping the most recent `maxReports`.
   * Files that don't follow the report naming scheme are left alone.
   */
  function pruneOldReports(): void {
    let files: string[];
    try {
      files = fs.readdirSync(reportDir).filter((f) => REPORT_FILE.test(f));
    } catch (err: unknown) {
      console.error(`[logger] Cannot list ${reportDir}: ${errorMessage(err)}`);
      return;
    }

    // Zero-padded names: lexicographic order is chronological order.
    files.sort();
    const toPrune = files.slice(0, Math.max(0, files.length - maxReports));

    let pruned = 0;
    for (const file of toPrune) {
      try {
        fs.unlinkSync(join(reportDir, file));
        pruned++;
      } catch {
        // may have been removed already
      }
    }

    if (pruned > 0) {
      console.error(`[logger] Pruned ${pruned} old failure report(s)`);
    }
  }

  /**
   * Write a report to disk atomically.
   * Returns the filename, or null if the write failed.
   */
  function write(report: CompileFailureReport): string | null {
    const filename = buildFilename();
    const filePath = join(reportDir, filename);
    const tmpPath = `${filePath}.tmp`;

    try {
      fs.writeFileSync(tmpPath, JSON.stringify(toFailureRecord(report)));
      fs.renameSync(tmpPath, filePath);
      return filename;
    } catch (err: unknown) {
      console.error(`[logger] Report write error: ${errorMessage(err)}`);
      try {
        fs.unlinkSync(tmpPath);
      } catch {
        /* may not exist */
      }
      return null;
    }
  }

  // Eagerly create directory and prune on construction, not first write.
  ensureDir();

  return {
    name: "file",
    reportDir,
    onFailure(report: CompileFailureReport): void {
      write(report);
    },
  };
}

/**
 * Fan a report out to several reporters.
 *
 * Each reporter is called in order; one that throws is logged to stderr
 * and does not keep the report from the rest.
 */
export function combineReporters(
  ...reporters: FailureReporter[]
): FailureReporter {
  return {
    name: reporters.map((r) => r.name).join("+"),
    onFailure(report: CompileFailureReport): void {
      for (const reporter of reporters) {
        try {
          reporter.onFailure(report);
        } catch (err: unknown) {
          console.error(
            `[logger] Reporter "${reporter.name}" failed: ${errorMessage(err)}`,
          );
        }
      }
    },
  };
}
