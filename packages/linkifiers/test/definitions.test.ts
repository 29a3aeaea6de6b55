import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import { join } from "node:path";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";

import {
  DefinitionsFileError,
  loadDefinitionsFile,
  parseDefinitions,
  stripJsonComments,
} from "../src/definitions.js";

function tmpFile(extension = "json"): string {
  return join(
    tmpdir(),
    `relink-definitions-test-${randomBytes(4).toString("hex")}.${extension}`,
  );
}

/** Issues of the DefinitionsFileError thrown by `fn`. */
function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err: unknown) {
    assert.ok(err instanceof DefinitionsFileError);
    return err.issues;
  }
  assert.fail("expected a DefinitionsFileError");
}

describe("parseDefinitions", () => {
  it("accepts a bare array", () => {
    const definitions = parseDefinitions([
      { id: 1, pattern: "#(?P<id>[0-9]+)", url_template: "https://t.example/{id}" },
    ]);
    assert.deepEqual(definitions, [
      { id: 1, pattern: "#(?P<id>[0-9]+)", url_template: "https://t.example/{id}" },
    ]);
  });

  it("accepts an object with a linkifiers array", () => {
    const definitions = parseDefinitions({
      linkifiers: [{ pattern: "a", url_template: "https://a.example/" }],
    });
    assert.deepEqual(definitions, [{ pattern: "a", url_template: "https://a.example/" }]);
  });

  it("accepts an empty list", () => {
    assert.deepEqual(parseDefinitions([]), []);
  });

  it("drops unknown keys", () => {
    const definitions = parseDefinitions([
      { pattern: "a", url_template: "b", example_input: "a" },
    ]);
    assert.deepEqual(definitions, [{ pattern: "a", url_template: "b" }]);
  });

  it("does not compile anything", () => {
    const definitions = parseDefinitions([{ pattern: "#(", url_template: "{" }]);
    assert.equal(definitions.length, 1);
  });

  it("reports wrong field types with their path", () => {
    assert.deepEqual(
      issuesOf(() => parseDefinitions([{ pattern: 5, url_template: "x" }])),
      ["0.pattern: Expected string, received number"],
    );
  });

  it("reports missing fields", () => {
    assert.deepEqual(
      issuesOf(() => parseDefinitions({ linkifiers: [{ pattern: "a" }] })),
      ["linkifiers.0.url_template: Required"],
    );
  });

  it("rejects a non-integer id", () => {
    assert.deepEqual(
      issuesOf(() => parseDefinitions([{ id: 1.5, pattern: "a", url_template: "b" }])),
      ["0.id: Expected integer, received float"],
    );
  });

  it("rejects values that are neither array nor object", () => {
    assert.deepEqual(
      issuesOf(() => parseDefinitions("nope")),
      ["(root): Expected object, received string"],
    );
  });

  it("lists every issue in the message", () => {
    assert.throws(
      () => parseDefinitions([{ pattern: 1, url_template: 2 }]),
      (err: unknown) => {
        assert.ok(err instanceof DefinitionsFileError);
        assert.equal(
          err.message,
          "Invalid linkifier definitions:\n" +
            "  0.pattern: Expected string, received number\n" +
            "  0.url_template: Expected string, received number",
        );
        return true;
      },
    );
  });
});

describe("loadDefinitionsFile", () => {
  it("loads a JSON file", () => {
    const file = tmpFile();
    fs.writeFileSync(
      file,
      JSON.stringify([{ pattern: "RFC(?P<n>[0-9]+)", url_template: "https://rfc.example/{n}" }]),
    );

    const definitions = loadDefinitionsFile(file);
    assert.deepEqual(definitions, [
      { pattern: "RFC(?P<n>[0-9]+)", url_template: "https://rfc.example/{n}" },
    ]);

    fs.unlinkSync(file);
  });

  it("strips comments and trailing commas", () => {
    const file = tmpFile();
    fs.writeFileSync(
      file,
      `{
      // issue tracker
      "linkifiers": [
        {
          "pattern": "#(?P<id>[0-9]+)",
          "url_template": "https://t.example/{id}",
        },
      ],
    }`,
    );

    const definitions = loadDefinitionsFile(file);
    assert.equal(definitions.length, 1);
    assert.equal(definitions[0].url_template, "https://t.example/{id}");

    fs.unlinkSync(file);
  });

  it("keeps commas before closing brackets inside string values", () => {
    const file = tmpFile();
    fs.writeFileSync(
      file,
      JSON.stringify([
        { pattern: "#(?P<id>[0-9]{2,})", url_template: "https://t.example/{id}" },
        { pattern: "T(?P<id>[a,])", url_template: "https://t.example/T{id}" },
      ]),
    );

    assert.deepEqual(
      loadDefinitionsFile(file).map((d) => d.pattern),
      ["#(?P<id>[0-9]{2,})", "T(?P<id>[a,])"],
    );

    fs.unlinkSync(file);
  });

  it("throws on invalid JSON", () => {
    const file = tmpFile();
    fs.writeFileSync(file, `[{ "pattern": "a" `);

    assert.throws(
      () => loadDefinitionsFile(file),
      (err: unknown) =>
        err instanceof DefinitionsFileError && err.message.startsWith(`Invalid JSON in ${file}: `),
    );

    fs.unlinkSync(file);
  });

  it("throws on a missing file", () => {
    const file = tmpFile();
    assert.throws(() => loadDefinitionsFile(file), (err: unknown) =>
      err instanceof DefinitionsFileError && /ENOENT/.test(err.message),
    );
  });

  it("throws on a schema violation", () => {
    const file = tmpFile();
    fs.writeFileSync(file, JSON.stringify([{ pattern: "a" }]));

    assert.throws(() => loadDefinitionsFile(file), DefinitionsFileError);

    fs.unlinkSync(file);
  });
});

describe("stripJsonComments", () => {
  it("removes line and block comments", () => {
    assert.equal(
      stripJsonComments('[ // first\n  1, /* second */ 2\n]'),
      "[ \n  1,  2\n]",
    );
  });

  it("removes trailing commas, also before a comment", () => {
    assert.equal(stripJsonComments("[1, 2, ]"), "[1, 2 ]");
    assert.equal(stripJsonComments('{"a": 1, // last\n}'), '{"a": 1 \n}');
  });

  it("leaves string contents alone", () => {
    const text = String.raw`["a,]", "b,}", "// not a comment", "/* nor this */", "q\",]"]`;
    assert.equal(stripJsonComments(text), text);
  });
});
