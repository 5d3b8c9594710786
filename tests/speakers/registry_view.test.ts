import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  createSpeakerRegistryView,
  isKnownSpeaker,
  loadSpeakerRegistryView,
  matchNameMap
} from "../../src/speakers/registry_view.ts";
import { RegistryLoadError } from "../../src/shared/errors.ts";

const fixtureAssetsDir = path.resolve("tests/fixtures/assets");

test("loadSpeakerRegistryView reads both registries and keeps their provenance", async () => {
  const view = await loadSpeakerRegistryView(fixtureAssetsDir);

  assert.deepEqual([...view.speakers.keys()], ["narrator", "grandpa", "lina"]);
  assert.equal(view.fallback, "narrator");
  assert.deepEqual(
    view.matchers.map((matcher) => [matcher.kind, matcher.source, matcher.speaker]),
    [
      ["regex", "Ліна", "lina"],
      ["exact", "дідусь", "grandpa"]
    ]
  );
  assert.deepEqual(view.provenance, {
    speakers_version: 3,
    speakers_updated_at: "2026-01-05T10:00:00Z",
    name_map_version: 2,
    name_map_updated_at: "2026-01-06T08:30:00Z"
  });
  assert.deepEqual(view.warnings, [
    'Skipped name map pattern "Петро": target speaker "petro" is not registered.'
  ]);
});

test("loadSpeakerRegistryView falls back to empty registries when files are missing", async () => {
  const tempRoot = await mkdtemp(path.join(os.tmpdir(), "story-tts-lines-registry-"));
  const view = await loadSpeakerRegistryView(tempRoot);

  assert.equal(view.speakers.size, 0);
  assert.equal(view.matchers.length, 0);
  assert.equal(view.fallback, "narrator");
  assert.equal(isKnownSpeaker(view, "narrator"), true);
  assert.deepEqual(view.warnings, ['Fallback speaker "narrator" is not in the speakers registry.']);
});

test("loadSpeakerRegistryView rejects registries that break the schema", async () => {
  const tempRoot = await mkdtemp(path.join(os.tmpdir(), "story-tts-lines-registry-"));
  await mkdir(path.join(tempRoot, "registries"), { recursive: true });
  await writeFile(
    path.join(tempRoot, "registries", "speakers.json"),
    JSON.stringify({ version: 1, items: [] }),
    "utf-8"
  );

  await assert.rejects(
    () => loadSpeakerRegistryView(tempRoot),
    (error: unknown) =>
      error instanceof RegistryLoadError &&
      error.registryPath === path.join(tempRoot, "registries", "speakers.json") &&
      /Schema validation failed \(speakers_registry\.schema\.json\): \/items must be object/.test(error.message)
  );
});

test("matchNameMap treats exact entries as whole-name comparisons", () => {
  const view = createSpeakerRegistryView(
    { version: 1, updated_at: "", items: {} },
    {
      version: 1,
      updated_at: "",
      patterns: [{ pattern: "Бабуся", speaker: "narrator", match: "exact" }],
      fallback: "narrator"
    }
  );

  assert.equal(matchNameMap(view, "бабуся")?.speaker, "narrator");
  assert.equal(matchNameMap(view, "Бабуся Ганна"), undefined);
});
