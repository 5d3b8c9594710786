import {
  findCueMatches,
  isSentenceEnd,
  nameAfterCue,
  nameBeforeCue,
  type AttributionCueSet,
  type CueMatch,
  type QuoteDelimiterPair
} from "./attribution_cues.ts";
import type { ExtractionWarningCode, Segment } from "../../shared/types.ts";

export interface ExtractionIssue {
  code: ExtractionWarningCode;
  message: string;
}

export interface ExtractionResult {
  segments: Segment[];
  issues: ExtractionIssue[];
}

interface QuoteSpan {
  pair: QuoteDelimiterPair;
  openIndex: number;
  innerStart: number;
  innerEnd: number;
  closeEnd: number;
}

interface Attribution {
  candidate?: string;
  cueFound: boolean;
}

const PREVIEW_CHARS = 24;
const WORD_CHAR_RE = /[\p{L}\p{M}\p{N}'’-]/u;

function preview(text: string): string {
  const compact = text.replace(/\s+/g, " ").trim();
  return compact.length > PREVIEW_CHARS ? `${compact.slice(0, PREVIEW_CHARS)}…` : compact;
}

function findNextOpening(
  text: string,
  from: number,
  delimiters: readonly QuoteDelimiterPair[]
): { pair: QuoteDelimiterPair; index: number } | undefined {
  let best: { pair: QuoteDelimiterPair; index: number } | undefined;
  for (const pair of delimiters) {
    const index = text.indexOf(pair.open, from);
    if (index < 0) {
      continue;
    }
    if (!best || index < best.index) {
      best = { pair, index };
    }
  }
  return best;
}

/**
 * Locate every delimited span left to right. Returns `null` when an opening
 * delimiter has no close, which disables extraction for the whole text.
 */
function scanQuoteSpans(text: string, delimiters: readonly QuoteDelimiterPair[]): QuoteSpan[] | null {
  const spans: QuoteSpan[] = [];
  let cursor = 0;
  for (;;) {
    const opening = findNextOpening(text, cursor, delimiters);
    if (!opening) {
      return spans;
    }
    const innerStart = opening.index + opening.pair.open.length;
    const closeIndex = text.indexOf(opening.pair.close, innerStart);
    if (closeIndex < 0) {
      return null;
    }
    const closeEnd = closeIndex + opening.pair.close.length;
    spans.push({
      pair: opening.pair,
      openIndex: opening.index,
      innerStart,
      innerEnd: closeIndex,
      closeEnd
    });
    cursor = closeEnd;
  }
}

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR_RE.test(char);
}

/**
 * A window edge that lands inside a word moves past that word, so a clipped
 * fragment never reads as a name.
 */
function snapStartOutOfWord(text: string, start: number, limit: number): number {
  if (!isWordChar(text[start - 1])) {
    return start;
  }
  let position = start;
  while (position < limit && isWordChar(text[position])) {
    position += 1;
  }
  return position;
}

function snapEndOutOfWord(text: string, end: number, limit: number): number {
  if (!isWordChar(text[end])) {
    return end;
  }
  let position = end;
  while (position > limit && isWordChar(text[position - 1])) {
    position -= 1;
  }
  return position;
}

function sentenceStartBefore(text: string, index: number, lowerBound: number): number {
  for (let position = index - 1; position >= lowerBound; position -= 1) {
    if (isSentenceEnd(text[position])) {
      return position + 1;
    }
  }
  return lowerBound;
}

function sentenceEndAfter(text: string, index: number, upperBound: number): number {
  for (let position = index; position < upperBound; position += 1) {
    if (isSentenceEnd(text[position])) {
      return position;
    }
  }
  return upperBound;
}

function candidateForCue(cueSet: AttributionCueSet, windowText: string, cue: CueMatch): string | undefined {
  return nameAfterCue(cueSet, windowText, cue) ?? nameBeforeCue(cueSet, windowText, cue);
}

function attributeFromPreceding(cueSet: AttributionCueSet, windowText: string): Attribution {
  const cues = findCueMatches(cueSet, windowText);
  const lastCue = cues.at(-1);
  if (!lastCue) {
    return { cueFound: false };
  }
  return { candidate: candidateForCue(cueSet, windowText, lastCue), cueFound: true };
}

function attributeFromFollowing(cueSet: AttributionCueSet, windowText: string): Attribution {
  const [firstCue] = findCueMatches(cueSet, windowText);
  if (!firstCue) {
    return { cueFound: false };
  }
  return { candidate: candidateForCue(cueSet, windowText, firstCue), cueFound: true };
}

/**
 * Preceding attribution wins over following attribution when both are
 * present.
 */
function attributeQuote(
  text: string,
  span: QuoteSpan,
  previousEnd: number,
  nextOpen: number,
  cueSet: AttributionCueSet
): Attribution {
  const precedingLowerBound = snapStartOutOfWord(
    text,
    Math.max(previousEnd, span.openIndex - cueSet.windowChars),
    span.openIndex
  );
  const precedingStart = sentenceStartBefore(text, span.openIndex, precedingLowerBound);
  const preceding = attributeFromPreceding(cueSet, text.slice(precedingStart, span.openIndex));
  if (preceding.candidate) {
    return preceding;
  }

  const followingUpperBound = snapEndOutOfWord(
    text,
    Math.min(nextOpen, span.closeEnd + cueSet.windowChars),
    span.closeEnd
  );
  const followingEnd = sentenceEndAfter(text, span.closeEnd, followingUpperBound);
  const following = attributeFromFollowing(cueSet, text.slice(span.closeEnd, followingEnd));
  if (following.candidate) {
    return following;
  }

  return { cueFound: preceding.cueFound || following.cueFound };
}

/**
 * Split narration text into narration and quote segments. The segments
 * partition the source: `reconstructSegments(result.segments) === text`.
 */
export function extractSegments(text: string, cueSet: AttributionCueSet): ExtractionResult {
  const spans = scanQuoteSpans(text, cueSet.delimiters);
  if (spans === null) {
    return {
      segments: [{ kind: "narration", text }],
      issues: [
        {
          code: "unbalanced-quote",
          message: `Opening quote without a closing delimiter in "${preview(text)}"; kept as narration.`
        }
      ]
    };
  }

  const segments: Segment[] = [];
  const issues: ExtractionIssue[] = [];
  let emitted = 0;

  for (const [index, span] of spans.entries()) {
    if (span.openIndex > emitted) {
      segments.push({ kind: "narration", text: text.slice(emitted, span.openIndex) });
    }

    const nextOpen = spans[index + 1]?.openIndex ?? text.length;
    const quoteText = text.slice(span.innerStart, span.innerEnd);
    const attribution = attributeQuote(text, span, emitted, nextOpen, cueSet);
    if (!attribution.candidate && attribution.cueFound) {
      issues.push({
        code: "missing-speaker-name",
        message: `Attribution cue near quote "${preview(quoteText)}" has no speaker name.`
      });
    }

    segments.push({
      kind: "quote",
      text: quoteText,
      open: span.pair.open,
      close: span.pair.close,
      ...(attribution.candidate ? { candidateSpeaker: attribution.candidate } : {})
    });
    emitted = span.closeEnd;
  }

  if (emitted < text.length) {
    segments.push({ kind: "narration", text: text.slice(emitted) });
  }
  return { segments, issues };
}

export function reconstructSegments(segments: readonly Segment[]): string {
  return segments
    .map((segment) => (segment.kind === "quote" ? `${segment.open}${segment.text}${segment.close}` : segment.text))
    .join("");
}
