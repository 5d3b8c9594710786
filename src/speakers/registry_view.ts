import { access } from "node:fs/promises";
import path from "node:path";
import { loadJson } from "../shared/json.ts";
import { RegistryLoadError } from "../shared/errors.ts";
import { SchemaPaths } from "../shared/schema_paths.ts";
import type {
  NameMapPattern,
  RegistryProvenance,
  SpeakerNameMap,
  SpeakerRecord,
  SpeakersRegistry
} from "../shared/types.ts";

export const DEFAULT_FALLBACK_SPEAKER = "narrator";

/**
 * A compiled name-map entry. Entries are evaluated in registry order by
 * `matchNameMap`; the first one whose matcher accepts the reference wins.
 */
export type NameMatcher =
  | { kind: "regex"; regex: RegExp; speaker: string; source: string }
  | { kind: "exact"; name: string; speaker: string; source: string };

export interface SpeakerRegistryView {
  readonly speakers: ReadonlyMap<string, Readonly<SpeakerRecord>>;
  readonly matchers: readonly NameMatcher[];
  readonly fallback: string;
  readonly provenance: RegistryProvenance;
  readonly warnings: readonly string[];
}

export interface RegistryPaths {
  registriesDir: string;
  speakersPath: string;
  nameMapPath: string;
}

export function resolveRegistryPaths(assetsDir: string): RegistryPaths {
  const registriesDir = path.join(path.resolve(assetsDir), "registries");
  return {
    registriesDir,
    speakersPath: path.join(registriesDir, "speakers.json"),
    nameMapPath: path.join(registriesDir, "speaker_name_map.json")
  };
}

export function emptySpeakersRegistry(): SpeakersRegistry {
  return { version: 1, updated_at: "", items: {} };
}

export function emptySpeakerNameMap(): SpeakerNameMap {
  return { version: 1, updated_at: "", patterns: [], fallback: DEFAULT_FALLBACK_SPEAKER };
}

function compileMatcher(entry: NameMapPattern): NameMatcher | string {
  if (entry.match === "exact") {
    return {
      kind: "exact",
      name: entry.pattern.trim().toLocaleLowerCase(),
      speaker: entry.speaker,
      source: entry.pattern
    };
  }
  try {
    return {
      kind: "regex",
      regex: new RegExp(entry.pattern, "iu"),
      speaker: entry.speaker,
      source: entry.pattern
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return `Skipped name map pattern "${entry.pattern}": ${message}`;
  }
}

/**
 * Build the read-only snapshot the resolver works against. The fallback is
 * always part of the known ids; patterns pointing at unknown speakers are
 * dropped so every resolution lands on a registered identity.
 */
export function createSpeakerRegistryView(
  speakersRegistry: SpeakersRegistry,
  nameMap: SpeakerNameMap
): SpeakerRegistryView {
  const fallback = nameMap.fallback?.trim() || DEFAULT_FALLBACK_SPEAKER;
  const speakers = new Map<string, Readonly<SpeakerRecord>>(
    Object.entries(speakersRegistry.items ?? {}).map(([id, record]) => [id, Object.freeze({ ...record })])
  );
  const warnings: string[] = [];
  if (!speakers.has(fallback)) {
    warnings.push(`Fallback speaker "${fallback}" is not in the speakers registry.`);
  }

  const matchers: NameMatcher[] = [];
  for (const entry of nameMap.patterns ?? []) {
    if (entry.speaker !== fallback && !speakers.has(entry.speaker)) {
      warnings.push(
        `Skipped name map pattern "${entry.pattern}": target speaker "${entry.speaker}" is not registered.`
      );
      continue;
    }
    const compiled = compileMatcher(entry);
    if (typeof compiled === "string") {
      warnings.push(compiled);
      continue;
    }
    matchers.push(compiled);
  }

  return Object.freeze({
    speakers,
    matchers: Object.freeze(matchers),
    fallback,
    provenance: {
      speakers_version: speakersRegistry.version ?? 1,
      speakers_updated_at: speakersRegistry.updated_at ?? "",
      name_map_version: nameMap.version ?? 1,
      name_map_updated_at: nameMap.updated_at ?? ""
    },
    warnings: Object.freeze(warnings)
  });
}

export function isKnownSpeaker(view: SpeakerRegistryView, speakerId: string): boolean {
  return speakerId === view.fallback || view.speakers.has(speakerId);
}

export function matchNameMap(view: SpeakerRegistryView, reference: string): NameMatcher | undefined {
  const lowered = reference.toLocaleLowerCase();
  return view.matchers.find((matcher) =>
    matcher.kind === "exact" ? matcher.name === lowered : matcher.regex.test(reference)
  );
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function loadRegistryFile<T>(filePath: string, schemaPath: string, fallback: () => T): Promise<T> {
  if (!(await fileExists(filePath))) {
    return fallback();
  }
  try {
    return await loadJson<T>(filePath, schemaPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RegistryLoadError(`Failed to load registry (${filePath}): ${message}`, filePath);
  }
}

export async function loadSpeakersRegistry(assetsDir: string): Promise<SpeakersRegistry> {
  const { speakersPath } = resolveRegistryPaths(assetsDir);
  return loadRegistryFile(speakersPath, SchemaPaths.speakersRegistry, emptySpeakersRegistry);
}

export async function loadSpeakerNameMap(assetsDir: string): Promise<SpeakerNameMap> {
  const { nameMapPath } = resolveRegistryPaths(assetsDir);
  const loaded = await loadRegistryFile(nameMapPath, SchemaPaths.speakerNameMap, emptySpeakerNameMap);
  return { ...emptySpeakerNameMap(), ...loaded };
}

/**
 * Load both registries under `<assetsDir>/registries`. Missing files fall back
 * to empty registries with the default fallback speaker.
 */
export async function loadSpeakerRegistryView(assetsDir: string): Promise<SpeakerRegistryView> {
  const [speakersRegistry, nameMap] = await Promise.all([
    loadSpeakersRegistry(assetsDir),
    loadSpeakerNameMap(assetsDir)
  ]);
  return createSpeakerRegistryView(speakersRegistry, nameMap);
}
