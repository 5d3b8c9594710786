import path from "node:path";
import { loadJson } from "../../shared/json.ts";
import { SchemaPaths } from "../../shared/schema_paths.ts";
import {
  DEFAULT_ATTRIBUTION_CONFIG,
  type AttributionConfig,
  type QuoteDelimiterPair
} from "./attribution_cues.ts";
import { DEFAULT_ID_PAD_WIDTH, DEFAULT_MAX_CHARS } from "./line_assembler.ts";

export interface TtsLinesConfig {
  maxChars: number;
  enforceKnown: boolean;
  mergeAdjacent: boolean;
  idPadWidth: number;
  attribution: AttributionConfig;
}

export interface RawTtsLinesConfig {
  maxChars?: number | string;
  enforceKnown?: boolean;
  mergeAdjacent?: boolean;
  idPadWidth?: number | string;
  attribution?: {
    cues?: string[];
    quoteDelimiters?: QuoteDelimiterPair[];
    attributionWindowChars?: number | string;
    ignoredNames?: string[];
  };
}

export const DEFAULT_TTS_LINES_CONFIG: TtsLinesConfig = {
  maxChars: DEFAULT_MAX_CHARS,
  enforceKnown: false,
  mergeAdjacent: true,
  idPadWidth: DEFAULT_ID_PAD_WIDTH,
  attribution: {
    ...DEFAULT_ATTRIBUTION_CONFIG,
    cues: [...DEFAULT_ATTRIBUTION_CONFIG.cues],
    quoteDelimiters: DEFAULT_ATTRIBUTION_CONFIG.quoteDelimiters.map((pair) => ({ ...pair })),
    ignoredNames: [...DEFAULT_ATTRIBUTION_CONFIG.ignoredNames]
  }
};

function coerceNumber(value: number | string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && value !== "" && Number.isFinite(parsed) ? parsed : fallback;
}

export function ensurePositiveInteger(value: number, label: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${label} must be a positive integer (got ${value}).`);
  }
  return value;
}

export function normalizeTtsLinesConfig(raw?: RawTtsLinesConfig): TtsLinesConfig {
  const defaults = DEFAULT_TTS_LINES_CONFIG;
  const attribution = raw?.attribution;

  return {
    maxChars: ensurePositiveInteger(coerceNumber(raw?.maxChars, defaults.maxChars), "maxChars"),
    enforceKnown: raw?.enforceKnown ?? defaults.enforceKnown,
    mergeAdjacent: raw?.mergeAdjacent ?? defaults.mergeAdjacent,
    idPadWidth: ensurePositiveInteger(coerceNumber(raw?.idPadWidth, defaults.idPadWidth), "idPadWidth"),
    attribution: {
      cues: [...(attribution?.cues ?? defaults.attribution.cues)],
      quoteDelimiters: (attribution?.quoteDelimiters ?? defaults.attribution.quoteDelimiters).map(
        (pair) => ({ open: pair.open, close: pair.close })
      ),
      attributionWindowChars: ensurePositiveInteger(
        coerceNumber(attribution?.attributionWindowChars, defaults.attribution.attributionWindowChars),
        "attributionWindowChars"
      ),
      ignoredNames: [...(attribution?.ignoredNames ?? defaults.attribution.ignoredNames)]
    }
  };
}

export async function loadTtsLinesConfig(configPath: string): Promise<TtsLinesConfig> {
  const resolvedPath = path.resolve(configPath);
  try {
    const raw = await loadJson<RawTtsLinesConfig>(resolvedPath, SchemaPaths.ttsLinesConfig);
    return normalizeTtsLinesConfig(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load TTS lines config (${resolvedPath}): ${message}`);
  }
}

export interface TtsLinesConfigOverrides {
  maxChars?: number;
  enforceKnown?: boolean;
}

/**
 * CLI flags win over file values; unset flags keep the file (or default).
 */
export function applyConfigOverrides(
  config: TtsLinesConfig,
  overrides: TtsLinesConfigOverrides
): TtsLinesConfig {
  return {
    ...config,
    maxChars:
      overrides.maxChars === undefined
        ? config.maxChars
        : ensurePositiveInteger(overrides.maxChars, "max-chars"),
    enforceKnown: overrides.enforceKnown ?? config.enforceKnown
  };
}
