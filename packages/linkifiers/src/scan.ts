/**
 * Text scanning with compiled linkifiers.
 *
 * This is the renderer's side of the table: find where each rule fires in
 * a piece of text and expand its URL template. Only the pattern group is
 * reported; the boundary groups around it are discarded.
 */

import type { RE2JS } from "re2js";

import { PATTERN_GROUP } from "@relink/core";
import type {
  LinkMatch,
  OverlapPolicy,
  ParsedUrlTemplate,
  TemplateValues,
} from "@relink/core";

import type { LinkifierMap } from "./table.js";

export interface FindLinksOptions {
  /** Overlap resolution between rules. Default: "first-rule". */
  overlap?: OverlapPolicy;
}

/** A piece of scanned text, either plain or linked. */
export type TextSegment =
  | { type: "text"; text: string }
  | { type: "link"; text: string; url: string };

function overlaps(a: LinkMatch, b: LinkMatch): boolean {
  return a.start < b.end && b.start < a.end;
}

function byPosition(a: LinkMatch, b: LinkMatch): number {
  return a.start - b.start || a.rule - b.rule;
}

/**
 * All non-overlapping matches of one compiled rule, left to right.
 *
 * The boundary suffix consumes one character past the link. Scanning
 * resumes at the end of the link itself, so that character can be the
 * next match's boundary prefix: "#1 #2" links both.
 *
 * @param rule - Position of the rule in table order, copied into each match.
 */
export function matchLinkifier(
  matcher: RE2JS,
  template: ParsedUrlTemplate,
  text: string,
  rule = 0,
): LinkMatch[] {
  const names = Object.keys(matcher.namedGroups());
  const m = matcher.matcher(text);
  const links: LinkMatch[] = [];

  let from = 0;
  while (from <= text.length && m.find(from)) {
    const matchStart = m.start();
    const start = m.start(PATTERN_GROUP);
    const end = m.end(PATTERN_GROUP);
    from = end > matchStart ? end : matchStart + 1;

    // A pattern that can match the empty string has nothing to link.
    if (end === start) continue;

    const groups: TemplateValues = {};
    for (const name of names) {
      const value = m.group(name);
      if (value !== null) groups[name] = value;
    }

    links.push({
      start,
      end,
      text: m.group(PATTERN_GROUP) ?? "",
      url: template.expand(groups),
      groups,
      rule,
    });
  }

  return links;
}

/**
 * Scan text with every linkifier in the table.
 *
 * Returns matches sorted by position (ties broken by table order), with
 * overlaps between rules resolved per `options.overlap`.
 */
export function findLinks(
  map: LinkifierMap,
  text: string,
  options: FindLinksOptions = {},
): LinkMatch[] {
  const overlap = options.overlap ?? "first-rule";

  // Rule order, then position within each rule.
  const all: LinkMatch[] = [];
  let rule = 0;
  for (const [matcher, template] of map) {
    all.push(...matchLinkifier(matcher, template, text, rule));
    rule++;
  }

  if (overlap === "all") {
    return all.sort(byPosition);
  }

  const accepted: LinkMatch[] = [];

  if (overlap === "first-rule") {
    for (const link of all) {
      if (!accepted.some((a) => overlaps(a, link))) accepted.push(link);
    }
    return accepted.sort(byPosition);
  }

  // leftmost-longest
  const ordered = [...all].sort(
    (a, b) =>
      a.start - b.start ||
      b.end - b.start - (a.end - a.start) ||
      a.rule - b.rule,
  );
  let lastEnd = 0;
  for (const link of ordered) {
    if (link.start < lastEnd) continue;
    accepted.push(link);
    lastEnd = link.end;
  }
  return accepted;
}

/**
 * Split text into plain and linked segments.
 *
 * @throws Error if two links overlap (scan with an overlap policy other
 *   than "all" first).
 */
export function segmentText(
  text: string,
  links: readonly LinkMatch[],
): TextSegment[] {
  const segments: TextSegment[] = [];
  let cursor = 0;

  for (const link of [...links].sort(byPosition)) {
    if (link.start < cursor) {
      throw new Error(`Overlapping links at offset ${link.start}`);
    }
    if (link.start > cursor) {
      segments.push({ type: "text", text: text.slice(cursor, link.start) });
    }
    segments.push({ type: "link", text: link.text, url: link.url });
    cursor = link.end;
  }

  if (cursor < text.length) {
    segments.push({ type: "text", text: text.slice(cursor) });
  }
  return segments;
}
