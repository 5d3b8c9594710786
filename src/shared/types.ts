export type ResolutionMethod = "direct" | "pattern" | "fallback";
export type NameMatchMode = "regex" | "exact";
export type NarrationUnitOrigin = "narration" | "dialogue";
export type UnresolvedSource = "dialogue-speaker" | "quote-attribution";
export type ExtractionWarningCode = "missing-speaker-name" | "unbalanced-quote";

export interface SpeakerRecord {
  display_name: string;
  default_voice: string;
  lang: string;
  pitch: number;
  rate: number;
  style: string;
}

export interface SpeakersRegistry {
  version: number;
  updated_at: string;
  items: Record<string, SpeakerRecord>;
}

export interface NameMapPattern {
  pattern: string;
  speaker: string;
  match?: NameMatchMode;
}

export interface SpeakerNameMap {
  version: number;
  updated_at: string;
  patterns: NameMapPattern[];
  fallback: string;
}

export interface StoryDialogueEntry {
  speaker?: string;
  text: string;
}

export interface StoryScene {
  id: string;
  narration?: string;
  summary?: string;
  visual_notes?: string;
  dialogue?: StoryDialogueEntry[];
}

export interface StoryDocument {
  title?: string;
  scenes: StoryScene[];
}

export interface NarrationUnit {
  sceneId: string;
  index: number;
  origin: NarrationUnitOrigin;
  speaker?: string;
  text: string;
}

export interface NarrationSegment {
  kind: "narration";
  text: string;
}

export interface QuoteSegment {
  kind: "quote";
  text: string;
  open: string;
  close: string;
  candidateSpeaker?: string;
}

export type Segment = NarrationSegment | QuoteSegment;

export interface ResolvedSpeaker {
  speakerId: string;
  method: ResolutionMethod;
  usedFallback: boolean;
}

export interface SpeakerSegment {
  kind: Segment["kind"];
  text: string;
  speaker: ResolvedSpeaker;
}

export interface TtsLine {
  id: string;
  text: string;
  speaker: string;
}

export interface UnresolvedSpeakerEntry {
  name: string;
  source: UnresolvedSource;
  first_scene_id: string;
  occurrences: number;
}

export interface ExtractionWarning {
  code: ExtractionWarningCode;
  sceneId: string;
  unitIndex: number;
  message: string;
}

export interface RegistryProvenance {
  speakers_version: number;
  speakers_updated_at: string;
  name_map_version: number;
  name_map_updated_at: string;
}
