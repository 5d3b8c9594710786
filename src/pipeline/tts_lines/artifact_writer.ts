import path from "node:path";
import { writeJson } from "../../shared/json.ts";
import type {
  ExtractionWarning,
  RegistryProvenance,
  TtsLine,
  UnresolvedSpeakerEntry
} from "../../shared/types.ts";

export type TtsLinesRunStatus = "success" | "success-with-fallbacks" | "failed-unresolved";

export interface TtsLinesReport {
  status: TtsLinesRunStatus;
  line_count: number;
  max_chars: number;
  enforce_known: boolean;
  unresolved: UnresolvedSpeakerEntry[];
  warnings: ExtractionWarning[];
  registry: RegistryProvenance;
}

export type TtsLinesArtifactPaths = {
  linesJsonPath: string;
  reportJsonPath: string;
};

/**
 * `tts_lines.json` -> `tts_lines.report.json` next to it.
 */
export function resolveTtsLinesArtifactPaths(outputPath: string): TtsLinesArtifactPaths {
  const linesJsonPath = path.resolve(outputPath);
  const parsed = path.parse(linesJsonPath);
  return {
    linesJsonPath,
    reportJsonPath: path.join(parsed.dir, `${parsed.name}.report.json`)
  };
}

export async function writeTtsLines(paths: TtsLinesArtifactPaths, lines: readonly TtsLine[]): Promise<void> {
  await writeJson(
    paths.linesJsonPath,
    lines.map((line) => ({ id: line.id, text: line.text, speaker: line.speaker }))
  );
}

export async function writeTtsLinesReport(paths: TtsLinesArtifactPaths, report: TtsLinesReport): Promise<void> {
  await writeJson(paths.reportJsonPath, report);
}
