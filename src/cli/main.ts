#!/usr/bin/env tsx
import path from "node:path";
import { buildTtsLines, loadStoryDocument } from "../pipeline/build_tts_lines.ts";
import { compileAttributionCueSet } from "../pipeline/tts_lines/attribution_cues.ts";
import { loadTtsLinesConfig, normalizeTtsLinesConfig } from "../pipeline/tts_lines/tts_lines_config.ts";
import {
  ensureOption,
  optionAsFlag,
  optionAsInteger,
  optionAsNumber,
  optionAsString,
  parseCliArgs
} from "../shared/cli_args.ts";
import type { CliOptions } from "../shared/cli_args.ts";
import type { NameMatchMode } from "../shared/types.ts";
import {
  addMapPattern,
  addSpeaker,
  initRegistries,
  linkVoice,
  suggestMissing
} from "../speakers/registry_store.ts";
import { createSpeakerRegistryView, loadSpeakerNameMap, loadSpeakersRegistry } from "../speakers/registry_view.ts";
import { exitCodeForError } from "./exit_codes.ts";

type CommandName =
  | "build-lines"
  | "speakers-init"
  | "speakers-add"
  | "speakers-link-voice"
  | "speakers-add-pattern"
  | "speakers-suggest";
type CommandHandler = (options: CliOptions) => Promise<void>;

const usageByCommand: Record<CommandName, string> = {
  "build-lines":
    "Usage:\n  tsx src/cli/main.ts build-lines --input <story.normalized.json> --output <tts/tts_lines.json> --assets <assets-dir> [--max-chars 220] [--enforce-known] [--config <tts_lines_config.json>]",
  "speakers-init": "Usage:\n  tsx src/cli/main.ts speakers-init --out <assets-dir>",
  "speakers-add":
    "Usage:\n  tsx src/cli/main.ts speakers-add --id <id> --display <name> --voice <voice> [--lang uk] [--pitch 0] [--rate 1.0] [--style calm] --out <assets-dir>",
  "speakers-link-voice":
    "Usage:\n  tsx src/cli/main.ts speakers-link-voice --id <id> --voice <voice> --out <assets-dir>",
  "speakers-add-pattern":
    "Usage:\n  tsx src/cli/main.ts speakers-add-pattern --pattern <regex|name> --speaker <id> [--match regex|exact] --out <assets-dir>",
  "speakers-suggest":
    "Usage:\n  tsx src/cli/main.ts speakers-suggest --input <story.normalized.json> --out <assets-dir> [--config <tts_lines_config.json>]"
};

function isCommandName(value: string): value is CommandName {
  return value in usageByCommand;
}

function printUsage(command?: string) {
  if (command && isCommandName(command)) {
    console.log(usageByCommand[command]);
    return;
  }

  const lines = Object.values(usageByCommand).map((usage) => `  ${usage.replace("Usage:\n  ", "")}`);
  console.log(`Usage:\n${lines.join("\n")}\n`);
}

function parseMatchMode(value: string | undefined): NameMatchMode {
  if (value === undefined || value === "regex" || value === "exact") {
    return value ?? "regex";
  }
  throw new Error(`Option --match must be "regex" or "exact" (got "${value}").`);
}

const commandHandlers: Record<CommandName, CommandHandler> = {
  "build-lines": async (options) => {
    const result = await buildTtsLines({
      inputPath: ensureOption(options, "input", "build-lines"),
      outputPath: ensureOption(options, "output", "build-lines"),
      assetsDir: ensureOption(options, "assets", "build-lines"),
      configPath: optionAsString(options, "config"),
      maxChars: optionAsInteger(options, "max-chars"),
      enforceKnown: optionAsFlag(options, "enforce-known")
    });

    console.log(
      `Build lines done: lines=${result.lineCount}, unresolved=${result.unresolved.length}, status=${result.status}`
    );
    console.log(`- ${path.relative(process.cwd(), result.linesJsonPath)}`);
    console.log(`- ${path.relative(process.cwd(), result.reportJsonPath)}`);
  },
  "speakers-init": async (options) => {
    const result = await initRegistries(ensureOption(options, "out", "speakers-init"));
    console.log(
      `${result.createdSpeakers ? "Initialized" : "Already exists"}: ${path.relative(process.cwd(), result.speakersPath)}`
    );
    console.log(
      `${result.createdNameMap ? "Initialized" : "Already exists"}: ${path.relative(process.cwd(), result.nameMapPath)}`
    );
  },
  "speakers-add": async (options) => {
    const speakerId = ensureOption(options, "id", "speakers-add");
    const displayName = ensureOption(options, "display", "speakers-add");
    await addSpeaker(ensureOption(options, "out", "speakers-add"), speakerId, {
      display_name: displayName,
      default_voice: ensureOption(options, "voice", "speakers-add"),
      lang: optionAsString(options, "lang") ?? "uk",
      pitch: optionAsInteger(options, "pitch") ?? 0,
      rate: optionAsNumber(options, "rate") ?? 1.0,
      style: optionAsString(options, "style") ?? "calm"
    });
    console.log(`Added/updated speaker '${speakerId}': ${displayName}`);
  },
  "speakers-link-voice": async (options) => {
    const speakerId = ensureOption(options, "id", "speakers-link-voice");
    const voice = ensureOption(options, "voice", "speakers-link-voice");
    await linkVoice(ensureOption(options, "out", "speakers-link-voice"), speakerId, voice);
    console.log(`Updated voice for speaker '${speakerId}': ${voice}`);
  },
  "speakers-add-pattern": async (options) => {
    const pattern = ensureOption(options, "pattern", "speakers-add-pattern");
    const speakerId = ensureOption(options, "speaker", "speakers-add-pattern");
    await addMapPattern(
      ensureOption(options, "out", "speakers-add-pattern"),
      pattern,
      speakerId,
      parseMatchMode(optionAsString(options, "match"))
    );
    console.log(`Added mapping pattern: '${pattern}' -> '${speakerId}'`);
  },
  "speakers-suggest": async (options) => {
    const assetsDir = ensureOption(options, "out", "speakers-suggest");
    const story = await loadStoryDocument(ensureOption(options, "input", "speakers-suggest"));
    const configPath = optionAsString(options, "config");
    const config = configPath ? await loadTtsLinesConfig(configPath) : normalizeTtsLinesConfig();
    const [speakersRegistry, nameMap] = await Promise.all([
      loadSpeakersRegistry(assetsDir),
      loadSpeakerNameMap(assetsDir)
    ]);
    const suggestions = suggestMissing(
      story,
      createSpeakerRegistryView(speakersRegistry, nameMap),
      nameMap,
      compileAttributionCueSet(config.attribution)
    );

    if (suggestions.unresolvedNames.length > 0) {
      console.log("# Unresolved names (add a speaker or a name map pattern):");
      suggestions.unresolvedNames.forEach((name) => console.log(name));
    }
    if (suggestions.unknownPatternTargets.length > 0) {
      console.log("# Name map targets missing from the speakers registry:");
      suggestions.unknownPatternTargets.forEach((name) => console.log(name));
    }
    if (suggestions.unresolvedNames.length === 0 && suggestions.unknownPatternTargets.length === 0) {
      console.log("# All speakers and names are covered");
    }
  }
};

async function main() {
  const command = process.argv[2] ?? "";
  const options = parseCliArgs(process.argv.slice(3));

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    return;
  }
  if (options.help || options.h) {
    printUsage(command);
    return;
  }

  if (!isCommandName(command)) {
    printUsage();
    throw new Error(`Unknown command: ${command}`);
  }
  await commandHandlers[command](options);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = exitCodeForError(error);
});
