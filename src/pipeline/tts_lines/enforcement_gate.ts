import { SpeakerResolutionError } from "../../shared/errors.ts";
import type { ExtractionWarning, UnresolvedSpeakerEntry } from "../../shared/types.ts";

export type GateOutcome =
  | { status: "ok"; warnings: [] }
  | { status: "fallbacks"; warnings: string[] };

export interface EnforcementOptions {
  enforceKnown: boolean;
}

function describeEntry(entry: UnresolvedSpeakerEntry): string {
  const kind = entry.source === "dialogue-speaker" ? "Speaker ID" : "Speaker name";
  return `${kind}: ${entry.name} (scene ${entry.first_scene_id}, ${entry.occurrences}x)`;
}

/**
 * Runs once after the whole document is traversed. Enforced mode turns any
 * unresolved name into a `SpeakerResolutionError`; otherwise the names come
 * back as warning lines and the affected lines keep the fallback speaker.
 * Extraction warnings ride along on the error so a failed run can still
 * report them.
 */
export function applyEnforcementGate(
  unresolved: readonly UnresolvedSpeakerEntry[],
  options: EnforcementOptions,
  warnings: readonly ExtractionWarning[] = []
): GateOutcome {
  if (unresolved.length === 0) {
    return { status: "ok", warnings: [] };
  }
  if (options.enforceKnown) {
    throw new SpeakerResolutionError([...unresolved], [...warnings]);
  }
  return { status: "fallbacks", warnings: unresolved.map(describeEntry) };
}
