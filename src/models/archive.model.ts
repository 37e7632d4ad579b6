import type { Readable } from "stream";
import type { Candidate, ObscoreRow } from "./candidate.model";
import type { CutoutRequest } from "./region.model";
import type { JobStatus } from "./staging.model";

export interface ObservationArchive {
  queryObservations(collection: string, signal?: AbortSignal): Promise<ObscoreRow[]>;
}

export interface StagingArchive {
  /** Creates and starts a cutout job for both products of a candidate; returns the job URL. */
  submitCutout(
    candidate: Candidate,
    request: CutoutRequest,
    signal?: AbortSignal,
  ): Promise<string>;
  getJobStatus(jobUrl: string, signal?: AbortSignal): Promise<JobStatus>;
  abortJob?(jobUrl: string): Promise<void>;
}

export interface ArtifactStream {
  stream: Readable;
  contentLength?: number;
}

export interface ArtifactSource {
  openArtifact(url: string, signal?: AbortSignal): Promise<ArtifactStream>;
  fetchText(url: string, signal?: AbortSignal): Promise<string>;
}

export interface NameResolver {
  resolve(name: string): Promise<{ ra: number; dec: number }>;
}
