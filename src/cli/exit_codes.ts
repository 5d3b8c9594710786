import { SpeakerResolutionError } from "../shared/errors.ts";

export const EXIT_FAILURE = 1;
export const EXIT_UNRESOLVED_SPEAKERS = 2;

/**
 * Enforced runs that stop on unknown speakers exit with 2 so callers can tell
 * them apart from every other failure.
 */
export function exitCodeForError(error: unknown): number {
  return error instanceof SpeakerResolutionError ? EXIT_UNRESOLVED_SPEAKERS : EXIT_FAILURE;
}
