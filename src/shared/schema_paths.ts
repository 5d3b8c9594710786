import path from "node:path";
import { fileURLToPath } from "node:url";

const SCHEMAS_DIR = fileURLToPath(new URL("../../schemas/", import.meta.url));

export const SchemaPaths = {
  story: path.join(SCHEMAS_DIR, "story.schema.json"),
  speakersRegistry: path.join(SCHEMAS_DIR, "speakers_registry.schema.json"),
  speakerNameMap: path.join(SCHEMAS_DIR, "speaker_name_map.schema.json"),
  ttsLines: path.join(SCHEMAS_DIR, "tts_lines.schema.json"),
  ttsLinesConfig: path.join(SCHEMAS_DIR, "tts_lines_config.schema.json")
} as const;
