export type StagingState =
  | "SUBMITTED"
  | "EXECUTING"
  | "READY"
  | "ERROR"
  | "TIMED_OUT";

export const TERMINAL_STATES: ReadonlySet<StagingState> = new Set([
  "READY",
  "ERROR",
  "TIMED_OUT",
]);

export interface ArtifactRef {
  url: string;
  filename: string;
  expectedSize?: number;
  /** Sidecar holding the archive's digest of this file, when published. */
  checksumUrl?: string;
}

export interface StagingJob {
  candidateId: string;
  jobUrl?: string;
  state: StagingState;
  submittedAt: string;
  lastPolledAt?: string;
  image?: ArtifactRef;
  weight?: ArtifactRef;
  reason?: string;
}

export interface ReadyJob extends StagingJob {
  state: "READY";
  jobUrl: string;
  image: ArtifactRef;
  weight: ArtifactRef;
}

/** Result of one status poll, already mapped onto the job states. */
export interface JobStatus {
  state: Exclude<StagingState, "TIMED_OUT">;
  results: ArtifactRef[];
  errorSummary?: string;
}
