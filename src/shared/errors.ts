import type { ExtractionWarning, UnresolvedSpeakerEntry } from "./types.ts";

export interface MalformedInputErrorOptions {
  sceneId?: string;
  unitIndex?: number;
  field?: string;
}

export class MalformedInputError extends Error {
  readonly sceneId?: string;
  readonly unitIndex?: number;
  readonly field?: string;

  constructor(message: string, options: MalformedInputErrorOptions = {}) {
    super(message);
    this.name = "MalformedInputError";
    this.sceneId = options.sceneId;
    this.unitIndex = options.unitIndex;
    this.field = options.field;
  }
}

/**
 * Raised in enforced mode once the whole document has been traversed, so
 * `names` is the complete list of offending references in first-seen order.
 * `warnings` carries the extraction warnings gathered on the way.
 */
export class SpeakerResolutionError extends Error {
  readonly names: string[];
  readonly unresolved: UnresolvedSpeakerEntry[];
  readonly warnings: ExtractionWarning[];

  constructor(unresolved: UnresolvedSpeakerEntry[], warnings: ExtractionWarning[] = []) {
    const names = unresolved.map((entry) => entry.name);
    super(`Unresolved speakers found (${names.length}): ${names.join(", ")}`);
    this.name = "SpeakerResolutionError";
    this.names = names;
    this.unresolved = unresolved;
    this.warnings = warnings;
  }
}

export class RegistryLoadError extends Error {
  readonly registryPath: string;

  constructor(message: string, registryPath: string) {
    super(message);
    this.name = "RegistryLoadError";
    this.registryPath = registryPath;
  }
}
