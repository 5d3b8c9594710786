export interface QuoteDelimiterPair {
  open: string;
  close: string;
}

export interface AttributionConfig {
  cues: string[];
  quoteDelimiters: QuoteDelimiterPair[];
  attributionWindowChars: number;
  /** Capitalized words that never count as a speaker name (pronouns, sentence openers). */
  ignoredNames: string[];
}

/**
 * Compiled, language-agnostic view of an `AttributionConfig`.
 */
export interface AttributionCueSet {
  readonly cues: readonly string[];
  readonly delimiters: readonly QuoteDelimiterPair[];
  readonly windowChars: number;
  readonly ignoredNames: ReadonlySet<string>;
  readonly cueRe: RegExp | null;
}

export const DEFAULT_ATTRIBUTION_CUES: readonly string[] = [
  "сказав",
  "сказала",
  "каже",
  "мовив",
  "мовила",
  "промовив",
  "промовила",
  "відповів",
  "відповіла",
  "прошепотів",
  "прошепотіла",
  "вигукнув",
  "вигукнула"
];

export const DEFAULT_QUOTE_DELIMITERS: readonly QuoteDelimiterPair[] = [
  { open: '"', close: '"' },
  { open: "«", close: "»" },
  { open: "“", close: "”" },
  { open: "„", close: "“" }
];

export const DEFAULT_ATTRIBUTION_WINDOW_CHARS = 80;

export const DEFAULT_IGNORED_NAMES: readonly string[] = [
  "Я",
  "Ти",
  "Він",
  "Вона",
  "Воно",
  "Ми",
  "Ви",
  "Вони"
];

export const DEFAULT_ATTRIBUTION_CONFIG: AttributionConfig = {
  cues: [...DEFAULT_ATTRIBUTION_CUES],
  quoteDelimiters: DEFAULT_QUOTE_DELIMITERS.map((pair) => ({ ...pair })),
  attributionWindowChars: DEFAULT_ATTRIBUTION_WINDOW_CHARS,
  ignoredNames: [...DEFAULT_IGNORED_NAMES]
};

const NAME_TOKEN_RE = /^\p{Lu}[\p{L}\p{M}'’-]+$/u;
const WORD_RE = /\p{L}[\p{L}\p{M}'’-]*/gu;
const SENTENCE_END_RE = /[.!?…。！？]/u;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildCueRe(cues: readonly string[]): RegExp | null {
  const alternatives = [...new Set(cues.map((cue) => cue.trim()).filter(Boolean))]
    .sort((a, b) => b.length - a.length)
    .map((cue) => escapeRegExp(cue).replace(/\s+/g, "\\s+"));
  if (alternatives.length === 0) {
    return null;
  }
  return new RegExp(`(?<![\\p{L}\\p{M}])(?:${alternatives.join("|")})(?![\\p{L}\\p{M}])`, "giu");
}

export function compileAttributionCueSet(
  config: AttributionConfig = DEFAULT_ATTRIBUTION_CONFIG
): AttributionCueSet {
  const delimiters = config.quoteDelimiters.filter((pair) => pair.open.length > 0 && pair.close.length > 0);
  return Object.freeze({
    cues: Object.freeze([...config.cues]),
    delimiters: Object.freeze(delimiters.map((pair) => ({ ...pair }))),
    windowChars: Math.max(1, Math.trunc(config.attributionWindowChars)),
    ignoredNames: new Set(config.ignoredNames.map((name) => name.toLocaleLowerCase())),
    cueRe: buildCueRe(config.cues)
  });
}

export interface CueMatch {
  start: number;
  end: number;
}

export function findCueMatches(cueSet: AttributionCueSet, text: string): CueMatch[] {
  if (!cueSet.cueRe) {
    return [];
  }
  const matches: CueMatch[] = [];
  for (const match of text.matchAll(cueSet.cueRe)) {
    const start = match.index ?? 0;
    matches.push({ start, end: start + match[0].length });
  }
  return matches;
}

export function isNameToken(cueSet: AttributionCueSet, word: string): boolean {
  return NAME_TOKEN_RE.test(word) && !cueSet.ignoredNames.has(word.toLocaleLowerCase());
}

interface WordToken {
  word: string;
  start: number;
}

function wordsOf(text: string): WordToken[] {
  return [...text.matchAll(WORD_RE)].map((match) => ({ word: match[0], start: match.index ?? 0 }));
}

/**
 * Name token directly after the cue (`сказала Ліна`). Only punctuation and
 * whitespace may sit between them.
 */
export function nameAfterCue(cueSet: AttributionCueSet, text: string, cue: CueMatch): string | undefined {
  const rest = text.slice(cue.end);
  const [first] = wordsOf(rest);
  if (!first || /[\p{L}\p{N}]/u.test(rest.slice(0, first.start))) {
    return undefined;
  }
  return isNameToken(cueSet, first.word) ? first.word : undefined;
}

/**
 * Nearest name token before the cue (`Ліна тихо сказала`), searched inside
 * `text.slice(windowStart, cue.start)`.
 */
export function nameBeforeCue(
  cueSet: AttributionCueSet,
  text: string,
  cue: CueMatch,
  windowStart = 0
): string | undefined {
  const words = wordsOf(text.slice(windowStart, cue.start));
  for (let index = words.length - 1; index >= 0; index -= 1) {
    if (isNameToken(cueSet, words[index].word)) {
      return words[index].word;
    }
  }
  return undefined;
}

export function isSentenceEnd(char: string): boolean {
  return SENTENCE_END_RE.test(char);
}
