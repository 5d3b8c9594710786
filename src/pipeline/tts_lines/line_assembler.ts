import type { SpeakerSegment, TtsLine } from "../../shared/types.ts";

const SENTENCE_END_CHARS = new Set([".", "!", "?", "…", "。", "！", "？"]);
const WHITESPACE_RE = /\s/;

export const DEFAULT_MAX_CHARS = 220;
export const DEFAULT_ID_PAD_WIDTH = 3;

export interface LineAssemblyOptions {
  maxChars: number;
  mergeAdjacent: boolean;
}

export type LineIdAllocator = (sceneId: string) => string;

export function normalizeLineText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * `<sceneId>_<seq>` with one counter for the whole document, so ids never
 * repeat and leave no gaps within a run.
 */
export function createLineIdAllocator(padWidth: number = DEFAULT_ID_PAD_WIDTH): LineIdAllocator {
  let sequence = 0;
  return (sceneId) => {
    sequence += 1;
    return `${sceneId}_${String(sequence).padStart(padWidth, "0")}`;
  };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function lastSentenceBoundary(text: string, maxChars: number): number | undefined {
  for (let index = Math.min(maxChars, text.length) - 1; index >= 0; index -= 1) {
    if (!SENTENCE_END_CHARS.has(text[index])) {
      continue;
    }
    const next = text[index + 1];
    if (next === undefined || WHITESPACE_RE.test(next)) {
      return index + 1;
    }
  }
  return undefined;
}

function lastWhitespaceBoundary(text: string, maxChars: number): number | undefined {
  for (let index = Math.min(maxChars, text.length - 1); index > 0; index -= 1) {
    if (WHITESPACE_RE.test(text[index])) {
      return index;
    }
  }
  return undefined;
}

function hardCut(text: string, maxChars: number): number {
  if (maxChars > 1 && isHighSurrogate(text.charCodeAt(maxChars - 1))) {
    return maxChars - 1;
  }
  return maxChars;
}

/**
 * Split point for text longer than `maxChars`: sentence end, then
 * whitespace, then a hard cut. The head before the point never exceeds
 * `maxChars`.
 */
export function chooseSplitPoint(text: string, maxChars: number): number {
  return (
    lastSentenceBoundary(text, maxChars) ??
    lastWhitespaceBoundary(text, maxChars) ??
    hardCut(text, maxChars)
  );
}

export function splitTextToLimit(text: string, maxChars: number): string[] {
  const chunks: string[] = [];
  let remaining = normalizeLineText(text);

  while (remaining.length > maxChars) {
    const splitPoint = chooseSplitPoint(remaining, maxChars);
    const head = remaining.slice(0, splitPoint).trim();
    if (head) {
      chunks.push(head);
    }
    remaining = remaining.slice(splitPoint).trim();
  }

  if (remaining) {
    chunks.push(remaining);
  }
  return chunks;
}

interface LinePiece {
  text: string;
  speakerId: string;
}

/**
 * Merge neighbours of the same speaker while the result fits. Segments that
 * are already over the limit stay on their own and get split later.
 */
function mergeSegments(segments: readonly SpeakerSegment[], options: LineAssemblyOptions): LinePiece[] {
  const pieces: LinePiece[] = [];
  for (const segment of segments) {
    const text = normalizeLineText(segment.text);
    if (!text) {
      continue;
    }
    const speakerId = segment.speaker.speakerId;
    const previous = pieces.at(-1);
    if (
      options.mergeAdjacent &&
      previous &&
      previous.speakerId === speakerId &&
      previous.text.length + 1 + text.length <= options.maxChars
    ) {
      previous.text = `${previous.text} ${text}`;
      continue;
    }
    pieces.push({ text, speakerId });
  }
  return pieces;
}

export function assembleLines(
  segments: readonly SpeakerSegment[],
  sceneId: string,
  options: LineAssemblyOptions,
  allocateId: LineIdAllocator
): TtsLine[] {
  const lines: TtsLine[] = [];
  for (const piece of mergeSegments(segments, options)) {
    for (const chunk of splitTextToLimit(piece.text, options.maxChars)) {
      lines.push({ id: allocateId(sceneId), text: chunk, speaker: piece.speakerId });
    }
  }
  return lines;
}
