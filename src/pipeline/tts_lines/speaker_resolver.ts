import { isKnownSpeaker, matchNameMap, type SpeakerRegistryView } from "../../speakers/registry_view.ts";
import type {
  ResolvedSpeaker,
  UnresolvedSource,
  UnresolvedSpeakerEntry
} from "../../shared/types.ts";

export interface SpeakerResolution extends ResolvedSpeaker {
  /** Set when a non-empty reference had to fall back. */
  unresolvedName?: string;
}

/**
 * Resolve a raw reference: registry id (`direct`), then name map in registry
 * order (`pattern`), then the fallback speaker.
 */
export function resolveSpeaker(
  rawReference: string | undefined,
  view: SpeakerRegistryView
): SpeakerResolution {
  const reference = rawReference?.trim() ?? "";
  if (!reference) {
    return { speakerId: view.fallback, method: "fallback", usedFallback: true };
  }
  if (isKnownSpeaker(view, reference)) {
    return { speakerId: reference, method: "direct", usedFallback: false };
  }
  const matcher = matchNameMap(view, reference);
  if (matcher) {
    return { speakerId: matcher.speaker, method: "pattern", usedFallback: false };
  }
  return {
    speakerId: view.fallback,
    method: "fallback",
    usedFallback: true,
    unresolvedName: reference
  };
}

/**
 * Accumulates named fallbacks across a whole document. Each distinct name is
 * kept once, in first-seen order, with its occurrence count.
 */
export class UnresolvedSpeakerCollector {
  private readonly entries = new Map<string, UnresolvedSpeakerEntry>();

  record(resolution: SpeakerResolution, source: UnresolvedSource, sceneId: string): void {
    const name = resolution.unresolvedName;
    if (!name) {
      return;
    }
    const existing = this.entries.get(name);
    if (existing) {
      existing.occurrences += 1;
      return;
    }
    this.entries.set(name, { name, source, first_scene_id: sceneId, occurrences: 1 });
  }

  get size(): number {
    return this.entries.size;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  report(): UnresolvedSpeakerEntry[] {
    return [...this.entries.values()].map((entry) => ({ ...entry }));
  }
}

export function toResolvedSpeaker(resolution: SpeakerResolution): ResolvedSpeaker {
  return {
    speakerId: resolution.speakerId,
    method: resolution.method,
    usedFallback: resolution.usedFallback
  };
}
