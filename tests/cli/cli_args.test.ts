import { test } from "node:test";
import assert from "node:assert/strict";

import {
  ensureOption,
  optionAsFlag,
  optionAsInteger,
  optionAsString,
  parseCliArgs
} from "../../src/shared/cli_args.ts";

test("parseCliArgs reads values and bare flags", () => {
  const options = parseCliArgs([
    "--input",
    "story.json",
    "--enforce-known",
    "--max-chars",
    "120",
    "stray",
    "--verbose"
  ]);

  assert.deepEqual(options, {
    input: "story.json",
    "enforce-known": true,
    "max-chars": "120",
    verbose: true
  });
});

test("option helpers convert and validate values", () => {
  const options = parseCliArgs(["--max-chars", "120", "--pitch", "1.5", "--enforce-known", "false"]);

  assert.equal(optionAsInteger(options, "max-chars"), 120);
  assert.throws(() => optionAsInteger(options, "pitch"), /Option --pitch must be an integer/);
  assert.equal(optionAsFlag(options, "enforce-known"), false);
  assert.equal(optionAsFlag(options, "missing"), undefined);
  assert.equal(optionAsString(options, "missing"), undefined);
  assert.throws(() => optionAsFlag(parseCliArgs(["--enforce-known", "maybe"]), "enforce-known"), /is a flag/);
});

test("ensureOption names the command when a required option is missing", () => {
  assert.throws(
    () => ensureOption(parseCliArgs(["--output", "out.json"]), "input", "build-lines"),
    /Missing required option --input for build-lines/
  );
});
