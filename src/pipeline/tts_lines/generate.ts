import { MalformedInputError } from "../../shared/errors.ts";
import type {
  ExtractionWarning,
  NarrationUnit,
  SpeakerSegment,
  TtsLine,
  UnresolvedSpeakerEntry
} from "../../shared/types.ts";
import type { SpeakerRegistryView } from "../../speakers/registry_view.ts";
import { compileAttributionCueSet, type AttributionCueSet } from "./attribution_cues.ts";
import { applyEnforcementGate, type GateOutcome } from "./enforcement_gate.ts";
import { assembleLines, createLineIdAllocator, type LineIdAllocator } from "./line_assembler.ts";
import { extractSegments } from "./quote_extractor.ts";
import {
  resolveSpeaker,
  toResolvedSpeaker,
  UnresolvedSpeakerCollector,
  type SpeakerResolution
} from "./speaker_resolver.ts";
import { normalizeTtsLinesConfig, type TtsLinesConfig } from "./tts_lines_config.ts";

export interface GenerateTtsLinesResult {
  lines: TtsLine[];
  unresolved: UnresolvedSpeakerEntry[];
  warnings: ExtractionWarning[];
  gate: GateOutcome;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  value: unknown,
  field: string,
  context: { sceneId: string; unitIndex?: number }
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new MalformedInputError(`Scene "${context.sceneId}": "${field}" must be a string.`, {
      ...context,
      field
    });
  }
  return value;
}

function unitsOfScene(scene: unknown, sceneIndex: number): NarrationUnit[] {
  if (!isRecord(scene)) {
    throw new MalformedInputError(`Scene #${sceneIndex + 1} is not an object.`, { field: "scenes" });
  }
  const sceneId = scene.id;
  if (typeof sceneId !== "string" || !sceneId.trim()) {
    throw new MalformedInputError(`Scene #${sceneIndex + 1} has no string "id".`, { field: "id" });
  }

  const units: NarrationUnit[] = [];
  const narration = optionalString(scene.narration, "narration", { sceneId });
  if (narration !== undefined) {
    units.push({ sceneId, index: units.length, origin: "narration", text: narration });
  }

  const dialogue = scene.dialogue;
  if (dialogue === undefined || dialogue === null) {
    return units;
  }
  if (!Array.isArray(dialogue)) {
    throw new MalformedInputError(`Scene "${sceneId}": "dialogue" must be a list.`, {
      sceneId,
      field: "dialogue"
    });
  }
  for (const [entryIndex, entry] of dialogue.entries()) {
    const unitIndex = units.length;
    if (!isRecord(entry) || typeof entry.text !== "string") {
      throw new MalformedInputError(
        `Scene "${sceneId}", dialogue entry #${entryIndex + 1}: missing required "text".`,
        { sceneId, unitIndex, field: "text" }
      );
    }
    const speaker = optionalString(entry.speaker, "speaker", { sceneId, unitIndex });
    units.push({
      sceneId,
      index: unitIndex,
      origin: "dialogue",
      text: entry.text,
      ...(speaker !== undefined ? { speaker } : {})
    });
  }
  return units;
}

/**
 * Flatten a story into narration units in traversal order: scene by scene,
 * scene narration first, then its dialogue entries.
 */
export function collectNarrationUnits(story: unknown): NarrationUnit[] {
  if (!isRecord(story) || !Array.isArray(story.scenes)) {
    throw new MalformedInputError('Story document must contain a "scenes" list.', { field: "scenes" });
  }
  return story.scenes.flatMap((scene, sceneIndex) => unitsOfScene(scene, sceneIndex));
}

interface UnitContext {
  view: SpeakerRegistryView;
  cueSet: AttributionCueSet;
  config: TtsLinesConfig;
  allocateId: LineIdAllocator;
  collector: UnresolvedSpeakerCollector;
  warnings: ExtractionWarning[];
}

function processUnit(unit: NarrationUnit, context: UnitContext): TtsLine[] {
  if (!unit.text.trim()) {
    return [];
  }

  const unitResolution = resolveSpeaker(unit.speaker, context.view);
  context.collector.record(unitResolution, "dialogue-speaker", unit.sceneId);

  const { segments, issues } = extractSegments(unit.text, context.cueSet);
  for (const issue of issues) {
    context.warnings.push({
      code: issue.code,
      sceneId: unit.sceneId,
      unitIndex: unit.index,
      message: issue.message
    });
  }

  const speakerSegments: SpeakerSegment[] = segments.map((segment) => {
    let resolution: SpeakerResolution = unitResolution;
    if (segment.kind === "quote" && segment.candidateSpeaker) {
      resolution = resolveSpeaker(segment.candidateSpeaker, context.view);
      context.collector.record(resolution, "quote-attribution", unit.sceneId);
    }
    return { kind: segment.kind, text: segment.text, speaker: toResolvedSpeaker(resolution) };
  });

  return assembleLines(
    speakerSegments,
    unit.sceneId,
    { maxChars: context.config.maxChars, mergeAdjacent: context.config.mergeAdjacent },
    context.allocateId
  );
}

/**
 * Transform a whole story into TTS lines. Throws `MalformedInputError` on
 * structural problems and, in enforced mode, `SpeakerResolutionError` after
 * the full traversal.
 */
export function generateTtsLines(
  story: unknown,
  view: SpeakerRegistryView,
  config: TtsLinesConfig = normalizeTtsLinesConfig()
): GenerateTtsLinesResult {
  const units = collectNarrationUnits(story);
  const context: UnitContext = {
    view,
    cueSet: compileAttributionCueSet(config.attribution),
    config,
    allocateId: createLineIdAllocator(config.idPadWidth),
    collector: new UnresolvedSpeakerCollector(),
    warnings: []
  };

  const lines = units.flatMap((unit) => processUnit(unit, context));
  const unresolved = context.collector.report();
  const gate = applyEnforcementGate(unresolved, { enforceKnown: config.enforceKnown }, context.warnings);

  return { lines, unresolved, warnings: context.warnings, gate };
}
