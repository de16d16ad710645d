// Per-reference failures (InvalidReference, FetchFailure) are skipped by the
// orchestrator; everything else aborts the run with exit code 1.

export class InvalidReferenceError extends Error {
  readonly reference: string;

  constructor(reference: string) {
    super(`Could not extract video ID from: ${JSON.stringify(reference)}`);
    this.name = "InvalidReferenceError";
    this.reference = reference;
  }
}

export class FetchFailureError extends Error {
  readonly videoId: string;

  constructor(videoId: string, cause?: unknown) {
    super(`Transcript unavailable for videoId=${videoId}: ${describeError(cause)}`, { cause });
    this.name = "FetchFailureError";
    this.videoId = videoId;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class GenerationFailureError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
    this.name = "GenerationFailureError";
  }
}

export class NoInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NoInputError";
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (e === undefined) return "unknown error";
  return String(e);
}
