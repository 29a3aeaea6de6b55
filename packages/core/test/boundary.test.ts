import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  BOUNDARY_PREFIX,
  BOUNDARY_SUFFIX,
  PATTERN_GROUP,
  wrapPattern,
} from "../src/boundary.js";

describe("wrapPattern", () => {
  it("wraps the pattern in the shared boundary expression", () => {
    assert.equal(
      wrapPattern(String.raw`#(?P<id>\d+)`),
      String.raw`(^|\s|\x{85}|\p{Z}|['"(,:<])(#(?P<id>\d+))($|[^\p{L}\p{N}])`,
    );
  });

  it("puts the pattern in the second group", () => {
    assert.equal(PATTERN_GROUP, 2);
    assert.ok(BOUNDARY_PREFIX.endsWith(")("));
    assert.ok(BOUNDARY_SUFFIX.startsWith(")("));
  });

  it("leaves the pattern text untouched", () => {
    const pattern = "[A-Z]{2,}-(?P<id>[0-9]+)";
    const wrapped = wrapPattern(pattern);
    assert.equal(
      wrapped.slice(BOUNDARY_PREFIX.length, wrapped.length - BOUNDARY_SUFFIX.length),
      pattern,
    );
  });

  it("uses no look-ahead or look-behind", () => {
    const wrapper = BOUNDARY_PREFIX + BOUNDARY_SUFFIX;
    assert.equal(/\(\?[=!<]/.test(wrapper), false);
  });
});
