import { test } from "node:test";
import assert from "node:assert/strict";
import { access, mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { buildTtsLines } from "../../src/pipeline/build_tts_lines.ts";
import { MalformedInputError, SpeakerResolutionError } from "../../src/shared/errors.ts";

const FIXTURE_ASSETS = "tests/fixtures/assets";
const FIXTURE_STORY = "tests/fixtures/story.sample.json";

const FIXTURE_PROVENANCE = {
  speakers_version: 3,
  speakers_updated_at: "2026-01-05T10:00:00Z",
  name_map_version: 2,
  name_map_updated_at: "2026-01-06T08:30:00Z"
};

async function readJsonFile(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, "utf-8"));
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

test("buildTtsLines writes lines and a report next to them", async () => {
  const tempRoot = await mkdtemp(path.join(os.tmpdir(), "story-tts-lines-build-"));
  const outputPath = path.join(tempRoot, "tts", "tts_lines.json");
  const warnings: string[] = [];

  const result = await buildTtsLines({
    inputPath: FIXTURE_STORY,
    outputPath,
    assetsDir: FIXTURE_ASSETS,
    warn: (message) => warnings.push(message)
  });

  assert.equal(result.status, "success-with-fallbacks");
  assert.equal(result.lineCount, 6);
  assert.equal(result.linesJsonPath, outputPath);
  assert.equal(result.reportJsonPath, path.join(tempRoot, "tts", "tts_lines.report.json"));
  assert.deepEqual(warnings, [
    'Warning: Skipped name map pattern "Петро": target speaker "petro" is not registered.',
    "Warning: Unresolved speakers found:",
    "  Speaker name: Оля (scene s2, 1x)"
  ]);

  const lines = await readJsonFile(outputPath);
  assert.deepEqual(lines, [
    { id: "s1_001", text: "Ранок був тихий.", speaker: "narrator" },
    { id: "s1_002", text: "... Ліна сказала:", speaker: "grandpa" },
    { id: "s1_003", text: "Ого!", speaker: "lina" },
    { id: "s1_004", text: "Ходімо далі.", speaker: "grandpa" },
    { id: "s2_005", text: "Оля прошепотіла:", speaker: "lina" },
    { id: "s2_006", text: "Тихіше.", speaker: "narrator" }
  ]);

  assert.deepEqual(await readJsonFile(result.reportJsonPath), {
    status: "success-with-fallbacks",
    line_count: 6,
    max_chars: 220,
    enforce_known: false,
    unresolved: [{ name: "Оля", source: "quote-attribution", first_scene_id: "s2", occurrences: 1 }],
    warnings: [],
    registry: FIXTURE_PROVENANCE
  });
});

test("buildTtsLines applies the max-chars override on top of a config file", async () => {
  const tempRoot = await mkdtemp(path.join(os.tmpdir(), "story-tts-lines-build-"));
  const configPath = path.join(tempRoot, "config.json");
  await writeFile(configPath, JSON.stringify({ maxChars: 150, mergeAdjacent: false }), "utf-8");

  const result = await buildTtsLines({
    inputPath: FIXTURE_STORY,
    outputPath: path.join(tempRoot, "tts_lines.json"),
    assetsDir: FIXTURE_ASSETS,
    configPath,
    maxChars: 90,
    warn: () => undefined
  });

  const report = await readJsonFile(result.reportJsonPath);
  assert.deepEqual(report, {
    status: "success-with-fallbacks",
    line_count: 6,
    max_chars: 90,
    enforce_known: false,
    unresolved: [{ name: "Оля", source: "quote-attribution", first_scene_id: "s2", occurrences: 1 }],
    warnings: [],
    registry: FIXTURE_PROVENANCE
  });
});

test("buildTtsLines writes only the report when enforced resolution fails", async () => {
  const tempRoot = await mkdtemp(path.join(os.tmpdir(), "story-tts-lines-build-"));
  const outputPath = path.join(tempRoot, "tts_lines.json");

  await assert.rejects(
    () =>
      buildTtsLines({
        inputPath: FIXTURE_STORY,
        outputPath,
        assetsDir: FIXTURE_ASSETS,
        enforceKnown: true,
        warn: () => undefined
      }),
    (error: unknown) => error instanceof SpeakerResolutionError && error.names.join("|") === "Оля"
  );

  assert.equal(await fileExists(outputPath), false);
  assert.deepEqual(await readJsonFile(path.join(tempRoot, "tts_lines.report.json")), {
    status: "failed-unresolved",
    line_count: 0,
    max_chars: 220,
    enforce_known: true,
    unresolved: [{ name: "Оля", source: "quote-attribution", first_scene_id: "s2", occurrences: 1 }],
    warnings: [],
    registry: FIXTURE_PROVENANCE
  });
});

test("buildTtsLines succeeds without fallbacks when every speaker is known", async () => {
  const tempRoot = await mkdtemp(path.join(os.tmpdir(), "story-tts-lines-build-"));
  const inputPath = path.join(tempRoot, "story.json");
  await writeFile(
    inputPath,
    JSON.stringify({ scenes: [{ id: "a", dialogue: [{ speaker: "lina", text: "Привіт." }] }] }),
    "utf-8"
  );

  const result = await buildTtsLines({
    inputPath,
    outputPath: path.join(tempRoot, "tts_lines.json"),
    assetsDir: FIXTURE_ASSETS,
    enforceKnown: true,
    warn: () => undefined
  });

  assert.equal(result.status, "success");
  assert.deepEqual(result.unresolved, []);
  assert.deepEqual(await readJsonFile(result.linesJsonPath), [{ id: "a_001", text: "Привіт.", speaker: "lina" }]);
});

test("buildTtsLines rejects a story without scenes before writing anything", async () => {
  const tempRoot = await mkdtemp(path.join(os.tmpdir(), "story-tts-lines-build-"));
  const inputPath = path.join(tempRoot, "story.json");
  const outputPath = path.join(tempRoot, "tts_lines.json");
  await writeFile(inputPath, JSON.stringify({ title: "Порожньо" }), "utf-8");

  await assert.rejects(
    () => buildTtsLines({ inputPath, outputPath, assetsDir: FIXTURE_ASSETS, warn: () => undefined }),
    (error: unknown) =>
      error instanceof MalformedInputError && error.message.includes("must have required property 'scenes'")
  );
  assert.equal(await fileExists(path.join(tempRoot, "tts_lines.report.json")), false);
});

test("buildTtsLines logs and reports extraction warnings when enforced resolution fails", async () => {
  const tempRoot = await mkdtemp(path.join(os.tmpdir(), "story-tts-lines-build-"));
  const inputPath = path.join(tempRoot, "story.json");
  const outputPath = path.join(tempRoot, "tts_lines.json");
  const warnings: string[] = [];
  await writeFile(
    inputPath,
    JSON.stringify({
      scenes: [
        {
          id: "s1",
          dialogue: [
            { speaker: "lina", text: 'Вона сказала: "Добре."' },
            { speaker: "Марта", text: "Привіт." }
          ]
        }
      ]
    }),
    "utf-8"
  );

  await assert.rejects(
    () =>
      buildTtsLines({
        inputPath,
        outputPath,
        assetsDir: FIXTURE_ASSETS,
        enforceKnown: true,
        warn: (message) => warnings.push(message)
      }),
    SpeakerResolutionError
  );

  assert.deepEqual(warnings, [
    'Warning: Skipped name map pattern "Петро": target speaker "petro" is not registered.',
    'Warning: scene s1, unit 1: Attribution cue near quote "Добре." has no speaker name.'
  ]);
  assert.equal(await fileExists(outputPath), false);
  assert.deepEqual(await readJsonFile(path.join(tempRoot, "tts_lines.report.json")), {
    status: "failed-unresolved",
    line_count: 0,
    max_chars: 220,
    enforce_known: true,
    unresolved: [{ name: "Марта", source: "dialogue-speaker", first_scene_id: "s1", occurrences: 1 }],
    warnings: [
      {
        code: "missing-speaker-name",
        sceneId: "s1",
        unitIndex: 0,
        message: 'Attribution cue near quote "Добре." has no speaker name.'
      }
    ],
    registry: FIXTURE_PROVENANCE
  });
});
