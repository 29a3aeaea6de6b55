/**
 * URL template parsing.
 *
 * `url-template` expands RFC 6570 templates but accepts any string: an
 * unbalanced brace is silently kept as a literal. Linkifier templates are
 * checked against the RFC 6570 expression grammar first, so a broken
 * template rejects the rule instead of producing broken links.
 */

import { parseTemplate } from "url-template";

import type { ParsedUrlTemplate, TemplateValues } from "@relink/core";

/** Expression operators from RFC 6570 levels 2-4. */
const OPERATORS = "+#./;?&";

/** Operators reserved by RFC 6570 for future extensions. */
const RESERVED_OPERATORS = "=,!@|";

const VARNAME =
  /^(?:[A-Za-z0-9_]|%[0-9A-Fa-f]{2})(?:\.?(?:[A-Za-z0-9_]|%[0-9A-Fa-f]{2}))*$/;

/** Prefix modifier length: 1-9999, no leading zero. */
const PREFIX_LENGTH = /^[1-9]\d{0,3}$/;

/** Check one expression body (the text between braces). */
function checkExpression(body: string): string | null {
  const op = body[0];
  if (RESERVED_OPERATORS.includes(op)) {
    return `reserved operator "${op}"`;
  }
  const list = OPERATORS.includes(op) ? body.slice(1) : body;

  for (const varspec of list.split(",")) {
    let name = varspec;
    if (varspec.endsWith("*")) {
      name = varspec.slice(0, -1);
    } else {
      const colon = varspec.indexOf(":");
      if (colon !== -1) {
        const length = varspec.slice(colon + 1);
        if (!PREFIX_LENGTH.test(length)) {
          return `invalid prefix length "${length}"`;
        }
        name = varspec.slice(0, colon);
      }
    }
    if (!VARNAME.test(name)) return `invalid variable name "${name}"`;
  }
  return null;
}

/**
 * Find the first syntax problem in a URI template.
 * Returns null for a valid template.
 */
export function findTemplateSyntaxError(template: string): string | null {
  let i = 0;
  while (i < template.length) {
    const ch = template[i];
    if (ch === "}") return `unexpected "}" at offset ${i}`;
    if (ch !== "{") {
      i++;
      continue;
    }

    const close = template.indexOf("}", i + 1);
    if (close === -1) return `unclosed expression at offset ${i}`;

    const body = template.slice(i + 1, close);
    if (body === "") return `empty expression at offset ${i}`;
    if (body.includes("{")) return `nested "{" in expression at offset ${i}`;

    const problem = checkExpression(body);
    if (problem) return `${problem} in expression at offset ${i}`;

    i = close + 1;
  }
  return null;
}

/**
 * Parse a URL template.
 *
 * Throws an Error naming the first syntax problem if the template is
 * malformed.
 */
export function parseUrlTemplate(source: string): ParsedUrlTemplate {
  const problem = findTemplateSyntaxError(source);
  if (problem !== null) {
    throw new Error(`Invalid URL template: ${problem}`);
  }

  const template = parseTemplate(source);
  return {
    source,
    expand(values: TemplateValues): string {
      return template.expand(values);
    },
  };
}
