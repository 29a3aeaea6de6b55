/**
 * Linkifier definition files.
 *
 * A definitions file is JSON (comments and trailing commas allowed) holding
 * either a bare array of definitions or an object with a "linkifiers" array:
 *
 * [
 *   // issue numbers
 *   { "pattern": "#(?P<id>[0-9]+)", "url_template": "https://tracker.example/issue/{id}" },
 * ]
 *
 * Only the shape is checked here. Whether a pattern or template compiles
 * is the table's business.
 */

import fs from "node:fs";

import { z } from "zod";

import { errorMessage } from "@relink/core";
import type { LinkifierDefinition } from "@relink/core";

export const linkifierDefinitionSchema = z.object({
  id: z.number().int().optional(),
  pattern: z.string(),
  url_template: z.string(),
});

const definitionListSchema = z.array(linkifierDefinitionSchema);

const definitionsObjectSchema = z
  .object({ linkifiers: definitionListSchema })
  .transform((file) => file.linkifiers);

/** A definitions file could not be read, parsed, or validated. */
export class DefinitionsFileError extends Error {
  /** One "path: message" entry per schema violation. */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "DefinitionsFileError";
    this.issues = issues;
  }
}

/** Index of the first character at or after `i` that is not whitespace or a comment. */
function skipInsignificant(text: string, i: number): number {
  while (i < text.length) {
    if (/\s/.test(text[i])) {
      i++;
    } else if (text.startsWith("//", i)) {
      const eol = text.indexOf("\n", i);
      i = eol === -1 ? text.length : eol + 1;
    } else if (text.startsWith("/*", i)) {
      const close = text.indexOf("*/", i + 2);
      i = close === -1 ? text.length : close + 2;
    } else {
      break;
    }
  }
  return i;
}

/**
 * Strip comments and trailing commas from JSON-with-comments.
 *
 * String literals are copied through untouched: patterns such as
 * `[0-9]{2,}` or `[a,]` contain what would otherwise look like a
 * trailing comma.
 */
export function stripJsonComments(text: string): string {
  let out = "";
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '"') {
      const start = i++;
      while (i < text.length && text[i] !== '"') {
        i += text[i] === "\\" ? 2 : 1;
      }
      i++;
      out += text.slice(start, i);
      continue;
    }

    if (ch === "/" && text[i + 1] === "/") {
      while (i < text.length && text[i] !== "\n") i++;
      continue;
    }

    if (ch === "/" && text[i + 1] === "*") {
      const close = text.indexOf("*/", i + 2);
      i = close === -1 ? text.length : close + 2;
      continue;
    }

    if (ch === ",") {
      const next = text[skipInsignificant(text, i + 1)];
      if (next === "]" || next === "}") {
        i++;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Validate an already-parsed value as a list of definitions.
 * Unknown keys on a definition are dropped.
 */
export function parseDefinitions(value: unknown): LinkifierDefinition[] {
  const result = Array.isArray(value)
    ? definitionListSchema.safeParse(value)
    : definitionsObjectSchema.safeParse(value);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new DefinitionsFileError(
      `Invalid linkifier definitions:\n  ${issues.join("\n  ")}`,
      issues,
    );
  }
  return result.data;
}

/** Read, parse, and validate a definitions file. */
export function loadDefinitionsFile(filePath: string): LinkifierDefinition[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err: unknown) {
    throw new DefinitionsFileError(`Cannot read ${filePath}: ${errorMessage(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(stripJsonComments(raw));
  } catch (err: unknown) {
    throw new DefinitionsFileError(`Invalid JSON in ${filePath}: ${errorMessage(err)}`);
  }

  return parseDefinitions(json);
}
