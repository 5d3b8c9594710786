import { test } from "node:test";
import assert from "node:assert/strict";

import {
  compileAttributionCueSet,
  findCueMatches,
  isNameToken,
  isSentenceEnd,
  nameAfterCue,
  nameBeforeCue
} from "../../src/pipeline/tts_lines/attribution_cues.ts";

const cueSet = compileAttributionCueSet();

test("findCueMatches finds whole cue words only", () => {
  assert.deepEqual(findCueMatches(cueSet, "Ліна сказала, а Петро сказав"), [
    { start: 5, end: 12 },
    { start: 22, end: 28 }
  ]);
  assert.deepEqual(findCueMatches(cueSet, "сказалася"), []);
});

test("isNameToken wants a capitalized word that is not ignored", () => {
  assert.equal(isNameToken(cueSet, "Ліна"), true);
  assert.equal(isNameToken(cueSet, "ліна"), false);
  assert.equal(isNameToken(cueSet, "Він"), false);
  assert.equal(isNameToken(cueSet, "А"), false);
});

test("nameAfterCue takes the next word when only punctuation separates it", () => {
  assert.equal(nameAfterCue(cueSet, "сказала Ліна тихо", { start: 0, end: 7 }), "Ліна");
  assert.equal(nameAfterCue(cueSet, "сказала, Ліна", { start: 0, end: 7 }), "Ліна");
  assert.equal(nameAfterCue(cueSet, "сказала тихо Ліна", { start: 0, end: 7 }), undefined);
  assert.equal(nameAfterCue(cueSet, "сказала 3 Ліна", { start: 0, end: 7 }), undefined);
});

test("nameBeforeCue takes the nearest name before the cue", () => {
  assert.equal(nameBeforeCue(cueSet, "Ліна тихо сказала", { start: 10, end: 17 }), "Ліна");
  assert.equal(nameBeforeCue(cueSet, "Оля і Ліна сказали", { start: 11, end: 18 }), "Ліна");
  assert.equal(nameBeforeCue(cueSet, "Ліна тихо сказала", { start: 10, end: 17 }, 5), undefined);
});

test("compileAttributionCueSet supports other languages and drops empty delimiters", () => {
  const english = compileAttributionCueSet({
    cues: ["said", "asked"],
    quoteDelimiters: [
      { open: '"', close: '"' },
      { open: "", close: "'" }
    ],
    attributionWindowChars: 40,
    ignoredNames: ["He"]
  });

  assert.deepEqual(findCueMatches(english, "Tom SAID"), [{ start: 4, end: 8 }]);
  assert.equal(nameBeforeCue(english, "Tom SAID", { start: 4, end: 8 }), "Tom");
  assert.equal(isNameToken(english, "He"), false);
  assert.deepEqual(english.delimiters, [{ open: '"', close: '"' }]);
  assert.equal(english.windowChars, 40);
});

test("an empty cue list never matches", () => {
  const silent = compileAttributionCueSet({
    cues: [],
    quoteDelimiters: [{ open: '"', close: '"' }],
    attributionWindowChars: 10,
    ignoredNames: []
  });
  assert.equal(silent.cueRe, null);
  assert.deepEqual(findCueMatches(silent, "Ліна сказала"), []);
});

test("isSentenceEnd recognises terminal punctuation", () => {
  assert.equal(isSentenceEnd("."), true);
  assert.equal(isSentenceEnd("…"), true);
  assert.equal(isSentenceEnd(","), false);
});
