import { access, mkdir } from "node:fs/promises";
import { writeJson } from "../shared/json.ts";
import type {
  NameMatchMode,
  SpeakerNameMap,
  SpeakerRecord,
  SpeakersRegistry
} from "../shared/types.ts";
import { compileAttributionCueSet, type AttributionCueSet } from "../pipeline/tts_lines/attribution_cues.ts";
import { collectNarrationUnits } from "../pipeline/tts_lines/generate.ts";
import { extractSegments } from "../pipeline/tts_lines/quote_extractor.ts";
import { resolveSpeaker } from "../pipeline/tts_lines/speaker_resolver.ts";
import {
  DEFAULT_FALLBACK_SPEAKER,
  loadSpeakerNameMap,
  loadSpeakersRegistry,
  resolveRegistryPaths,
  type SpeakerRegistryView
} from "./registry_view.ts";

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

export const DEFAULT_NARRATOR_RECORD: SpeakerRecord = {
  display_name: "Оповідач",
  default_voice: "voice_narrator",
  lang: "uk",
  pitch: 0,
  rate: 1.0,
  style: "calm"
};

export interface InitRegistriesResult {
  speakersPath: string;
  nameMapPath: string;
  createdSpeakers: boolean;
  createdNameMap: boolean;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function saveRegistry<T extends { updated_at: string }>(
  filePath: string,
  registry: T,
  now: Clock
): Promise<T> {
  const stamped = { ...registry, updated_at: now().toISOString() };
  await writeJson(filePath, stamped);
  return stamped;
}

async function requireRegistryFile(filePath: string): Promise<void> {
  if (!(await exists(filePath))) {
    throw new Error(`Registry not found: ${filePath}. Run speakers-init first.`);
  }
}

/**
 * Create both registries when missing. Existing files are left untouched.
 */
export async function initRegistries(assetsDir: string, now: Clock = systemClock): Promise<InitRegistriesResult> {
  const { registriesDir, speakersPath, nameMapPath } = resolveRegistryPaths(assetsDir);
  await mkdir(registriesDir, { recursive: true });

  const createdSpeakers = !(await exists(speakersPath));
  if (createdSpeakers) {
    await saveRegistry<SpeakersRegistry>(
      speakersPath,
      { version: 1, updated_at: "", items: { [DEFAULT_FALLBACK_SPEAKER]: { ...DEFAULT_NARRATOR_RECORD } } },
      now
    );
  }

  const createdNameMap = !(await exists(nameMapPath));
  if (createdNameMap) {
    await saveRegistry<SpeakerNameMap>(
      nameMapPath,
      { version: 1, updated_at: "", patterns: [], fallback: DEFAULT_FALLBACK_SPEAKER },
      now
    );
  }

  return { speakersPath, nameMapPath, createdSpeakers, createdNameMap };
}

export async function addSpeaker(
  assetsDir: string,
  speakerId: string,
  record: SpeakerRecord,
  now: Clock = systemClock
): Promise<SpeakersRegistry> {
  const { speakersPath } = resolveRegistryPaths(assetsDir);
  await requireRegistryFile(speakersPath);
  const id = speakerId.trim();
  if (!id) {
    throw new Error("Speaker id must not be empty.");
  }

  const registry = await loadSpeakersRegistry(assetsDir);
  return saveRegistry(speakersPath, { ...registry, items: { ...registry.items, [id]: { ...record } } }, now);
}

export async function linkVoice(
  assetsDir: string,
  speakerId: string,
  voice: string,
  now: Clock = systemClock
): Promise<SpeakersRegistry> {
  const { speakersPath } = resolveRegistryPaths(assetsDir);
  await requireRegistryFile(speakersPath);

  const registry = await loadSpeakersRegistry(assetsDir);
  const current = registry.items[speakerId];
  if (!current) {
    throw new Error(`Speaker "${speakerId}" not found in registry.`);
  }
  return saveRegistry(
    speakersPath,
    { ...registry, items: { ...registry.items, [speakerId]: { ...current, default_voice: voice } } },
    now
  );
}

export async function addMapPattern(
  assetsDir: string,
  pattern: string,
  speakerId: string,
  match: NameMatchMode = "regex",
  now: Clock = systemClock
): Promise<SpeakerNameMap> {
  const { nameMapPath } = resolveRegistryPaths(assetsDir);
  await requireRegistryFile(nameMapPath);
  if (match === "regex") {
    try {
      new RegExp(pattern, "iu");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid pattern "${pattern}": ${message}`);
    }
  }

  const nameMap = await loadSpeakerNameMap(assetsDir);
  const entry = match === "regex" ? { pattern, speaker: speakerId } : { pattern, speaker: speakerId, match };
  return saveRegistry(nameMapPath, { ...nameMap, patterns: [...nameMap.patterns, entry] }, now);
}

export interface MissingSpeakerSuggestions {
  /** References that would resolve to the fallback speaker, sorted. */
  unresolvedNames: string[];
  /** Name map targets that are not registered speakers, sorted. */
  unknownPatternTargets: string[];
}

/**
 * Dry-run the resolver over every dialogue speaker and every attributed quote
 * in the story to list what the registries do not cover yet.
 */
export function suggestMissing(
  story: unknown,
  view: SpeakerRegistryView,
  nameMap: SpeakerNameMap,
  cueSet: AttributionCueSet = compileAttributionCueSet()
): MissingSpeakerSuggestions {
  const references = new Set<string>();
  for (const unit of collectNarrationUnits(story)) {
    if (unit.speaker) {
      references.add(unit.speaker.trim());
    }
    for (const segment of extractSegments(unit.text, cueSet).segments) {
      if (segment.kind === "quote" && segment.candidateSpeaker) {
        references.add(segment.candidateSpeaker);
      }
    }
  }

  const unresolvedNames = [...references]
    .filter((reference) => resolveSpeaker(reference, view).unresolvedName !== undefined)
    .sort((a, b) => a.localeCompare(b));
  const unknownPatternTargets = [
    ...new Set(
      nameMap.patterns
        .map((entry) => entry.speaker)
        .filter((speaker) => speaker !== view.fallback && !view.speakers.has(speaker))
    )
  ].sort((a, b) => a.localeCompare(b));

  return { unresolvedNames, unknownPatternTargets };
}
