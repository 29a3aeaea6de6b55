/**
 * Linkifier compile errors.
 *
 * A rule fails in exactly one stage: the wrapped pattern is rejected by the
 * regex engine, or the URL template does not parse. The pattern stage runs
 * first.
 */

export type CompileStage = "pattern" | "template";

export class CompileError extends Error {
  readonly stage: CompileStage;
  /** The caller's pattern, before boundary wrapping. */
  readonly pattern: string;
  readonly urlTemplate: string;

  constructor(
    stage: CompileStage,
    message: string,
    rule: { pattern: string; urlTemplate: string },
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "CompileError";
    this.stage = stage;
    this.pattern = rule.pattern;
    this.urlTemplate = rule.urlTemplate;
  }
}

/** The wrapped pattern is not valid in the linear-time regex dialect. */
export class PatternCompileError extends CompileError {
  constructor(
    message: string,
    rule: { pattern: string; urlTemplate: string },
    cause?: unknown,
  ) {
    super("pattern", message, rule, cause);
    this.name = "PatternCompileError";
  }
}

/** The URL template is not a syntactically valid RFC 6570 template. */
export class TemplateParseError extends CompileError {
  constructor(
    message: string,
    rule: { pattern: string; urlTemplate: string },
    cause?: unknown,
  ) {
    super("template", message, rule, cause);
    this.name = "TemplateParseError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
