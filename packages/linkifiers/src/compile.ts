/**
 * Rule compiler.
 *
 * Turns a (pattern, URL template) pair into a boundary-anchored RE2
 * matcher and a parsed template. Pure: no shared state, no logging.
 *
 * RE2 matches in linear time with no backtracking, so an administrator's
 * pattern cannot stall the renderer. The price is a smaller dialect: no
 * look-around and no back-references. Patterns using them fail here.
 */

import { RE2JS } from "re2js";

import {
  CompileError,
  PatternCompileError,
  TemplateParseError,
  errorMessage,
  wrapPattern,
} from "@relink/core";
import type { LinkifierDefinition, ParsedUrlTemplate } from "@relink/core";

import { parseUrlTemplate } from "./template.js";

/** A compiled rule: the wrapped matcher and its URL template. */
export type CompiledLinkifier = [RE2JS, ParsedUrlTemplate];

/** Outcome of compiling one definition. */
export type CompileResult =
  | { ok: true; matcher: RE2JS; template: ParsedUrlTemplate }
  | { ok: false; error: CompileError };

/**
 * Compile one linkifier.
 *
 * @throws PatternCompileError if the wrapped pattern is rejected by RE2.
 * @throws TemplateParseError if the URL template is malformed.
 */
export function compileLinkifier(
  pattern: string,
  urlTemplate: string,
): CompiledLinkifier {
  const rule = { pattern, urlTemplate };

  let matcher: RE2JS;
  try {
    matcher = RE2JS.compile(wrapPattern(pattern));
  } catch (err: unknown) {
    throw new PatternCompileError(errorMessage(err), rule, err);
  }

  let template: ParsedUrlTemplate;
  try {
    template = parseUrlTemplate(urlTemplate);
  } catch (err: unknown) {
    throw new TemplateParseError(errorMessage(err), rule, err);
  }

  return [matcher, template];
}

/**
 * Compile one definition into a result value instead of throwing.
 * The caller decides what to log.
 */
export function tryCompileLinkifier(
  definition: LinkifierDefinition,
): CompileResult {
  try {
    const [matcher, template] = compileLinkifier(
      definition.pattern,
      definition.url_template,
    );
    return { ok: true, matcher, template };
  } catch (err: unknown) {
    if (err instanceof CompileError) return { ok: false, error: err };
    throw err;
  }
}
