export type PipelineErrorCode =
  | "InvalidRegion"
  | "AmbiguousSpectralRange"
  | "NameResolutionError"
  | "ArchiveQueryError"
  | "NoCandidatesFound"
  | "StagingError"
  | "DownloadFailed"
  | "DownloadIntegrityError"
  | "EmptyMosaic"
  | "MosaicToolFailed"
  | "MosaicOutputMissing"
  | "ConfigError";

/**
 * Base class for every failure the pipeline reports by name.
 *
 * `fatal` errors end the run; the rest are recorded against a single
 * candidate and the run carries on without it.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly fatal: boolean;

  constructor(code: PipelineErrorCode, message: string, fatal: boolean) {
    super(message);
    this.name = code;
    this.code = code;
    this.fatal = fatal;
  }
}

export class InvalidRegion extends PipelineError {
  constructor(message: string) {
    super("InvalidRegion", message, true);
  }
}

export class AmbiguousSpectralRange extends PipelineError {
  constructor(message: string) {
    super("AmbiguousSpectralRange", message, true);
  }
}

export class NameResolutionError extends PipelineError {
  constructor(message: string) {
    super("NameResolutionError", message, true);
  }
}

export class ArchiveQueryError extends PipelineError {
  constructor(message: string) {
    super("ArchiveQueryError", message, true);
  }
}

export class NoCandidatesFound extends PipelineError {
  constructor(message = "No observations matched the search parameters") {
    super("NoCandidatesFound", message, true);
  }
}

export class StagingError extends PipelineError {
  constructor(message: string) {
    super("StagingError", message, false);
  }
}

export class DownloadFailed extends PipelineError {
  constructor(message: string) {
    super("DownloadFailed", message, false);
  }
}

export class DownloadIntegrityError extends PipelineError {
  constructor(message: string) {
    super("DownloadIntegrityError", message, false);
  }
}

export class EmptyMosaic extends PipelineError {
  constructor(message = "No candidate produced a complete image/weight pair") {
    super("EmptyMosaic", message, true);
  }
}

export class MosaicToolFailed extends PipelineError {
  readonly exitCode: number | null;
  readonly logTail: string;

  constructor(exitCode: number | null, logTail: string) {
    super(
      "MosaicToolFailed",
      `Mosaicking tool exited with status ${exitCode ?? "unknown"}`,
      true,
    );
    this.exitCode = exitCode;
    this.logTail = logTail;
  }
}

export class MosaicOutputMissing extends PipelineError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(
      "MosaicOutputMissing",
      `Mosaicking tool reported success but produced no usable output: ${missing.join(", ")}`,
      true,
    );
    this.missing = missing;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("ConfigError", message, true);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
