import path from "node:path";
import { validateAgainstSchema } from "../quality/schema_validator.ts";
import { MalformedInputError, SpeakerResolutionError } from "../shared/errors.ts";
import { loadJson } from "../shared/json.ts";
import { SchemaPaths } from "../shared/schema_paths.ts";
import type { ExtractionWarning, StoryDocument, TtsLine, UnresolvedSpeakerEntry } from "../shared/types.ts";
import { loadSpeakerRegistryView, type SpeakerRegistryView } from "../speakers/registry_view.ts";
import {
  resolveTtsLinesArtifactPaths,
  writeTtsLines,
  writeTtsLinesReport,
  type TtsLinesReport,
  type TtsLinesRunStatus
} from "./tts_lines/artifact_writer.ts";
import { generateTtsLines } from "./tts_lines/generate.ts";
import {
  applyConfigOverrides,
  loadTtsLinesConfig,
  normalizeTtsLinesConfig,
  type TtsLinesConfig
} from "./tts_lines/tts_lines_config.ts";

export {
  collectNarrationUnits,
  generateTtsLines,
  type GenerateTtsLinesResult
} from "./tts_lines/generate.ts";

export type WarningSink = (message: string) => void;

interface BuildTtsLinesOptions {
  inputPath: string;
  outputPath: string;
  assetsDir: string;
  configPath?: string;
  maxChars?: number;
  enforceKnown?: boolean;
  warn?: WarningSink;
}

interface BuildTtsLinesResult {
  status: Exclude<TtsLinesRunStatus, "failed-unresolved">;
  linesJsonPath: string;
  reportJsonPath: string;
  lineCount: number;
  unresolved: UnresolvedSpeakerEntry[];
}

export async function loadStoryDocument(inputPath: string): Promise<StoryDocument> {
  const resolvedPath = path.resolve(inputPath);
  return loadJson<StoryDocument>(
    resolvedPath,
    SchemaPaths.story,
    (message) => new MalformedInputError(`${message} (${resolvedPath})`)
  );
}

async function resolveConfig(options: BuildTtsLinesOptions): Promise<TtsLinesConfig> {
  const base = options.configPath
    ? await loadTtsLinesConfig(options.configPath)
    : normalizeTtsLinesConfig();
  return applyConfigOverrides(base, {
    maxChars: options.maxChars,
    enforceKnown: options.enforceKnown
  });
}

function buildReport(
  status: TtsLinesRunStatus,
  lines: readonly TtsLine[],
  config: TtsLinesConfig,
  view: SpeakerRegistryView,
  details: Pick<TtsLinesReport, "unresolved" | "warnings">
): TtsLinesReport {
  return {
    status,
    line_count: lines.length,
    max_chars: config.maxChars,
    enforce_known: config.enforceKnown,
    unresolved: details.unresolved,
    warnings: details.warnings,
    registry: view.provenance
  };
}

function emitExtractionWarnings(warnings: readonly ExtractionWarning[], warn: WarningSink): void {
  for (const warning of warnings) {
    warn(`Warning: scene ${warning.sceneId}, unit ${warning.unitIndex + 1}: ${warning.message}`);
  }
}

/**
 * Load story, registries and config, generate the lines and write
 * `tts_lines.json` plus its report. On an enforced failure only the report is
 * written and the `SpeakerResolutionError` is rethrown.
 */
export async function buildTtsLines(options: BuildTtsLinesOptions): Promise<BuildTtsLinesResult> {
  const warn = options.warn ?? ((message: string) => console.warn(message));
  const paths = resolveTtsLinesArtifactPaths(options.outputPath);

  const config = await resolveConfig(options);
  const story = await loadStoryDocument(options.inputPath);
  const view = await loadSpeakerRegistryView(options.assetsDir);
  for (const message of view.warnings) {
    warn(`Warning: ${message}`);
  }

  let result: ReturnType<typeof generateTtsLines>;
  try {
    result = generateTtsLines(story, view, config);
  } catch (error) {
    if (error instanceof SpeakerResolutionError) {
      emitExtractionWarnings(error.warnings, warn);
      await writeTtsLinesReport(
        paths,
        buildReport("failed-unresolved", [], config, view, {
          unresolved: error.unresolved,
          warnings: error.warnings
        })
      );
    }
    throw error;
  }

  emitExtractionWarnings(result.warnings, warn);
  if (result.gate.status === "fallbacks") {
    warn("Warning: Unresolved speakers found:");
    for (const line of result.gate.warnings) {
      warn(`  ${line}`);
    }
  }

  await validateAgainstSchema(result.lines, SchemaPaths.ttsLines);
  const status = result.gate.status === "ok" ? "success" : "success-with-fallbacks";
  await writeTtsLines(paths, result.lines);
  await writeTtsLinesReport(
    paths,
    buildReport(status, result.lines, config, view, {
      unresolved: result.unresolved,
      warnings: result.warnings
    })
  );

  return {
    status,
    linesJsonPath: paths.linesJsonPath,
    reportJsonPath: paths.reportJsonPath,
    lineCount: result.lines.length,
    unresolved: result.unresolved
  };
}
