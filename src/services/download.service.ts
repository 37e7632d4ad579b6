import crypto from "crypto";
import fs from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import type { ChecksumAlgorithm } from "../config";
import type { ArtifactSource } from "../models/archive.model";
import type { Candidate } from "../models/candidate.model";
import type {
  ArtifactKind,
  DownloadedPair,
  LocalArtifact,
} from "../models/mosaic.model";
import type { CandidateResult } from "../models/pipeline.model";
import type { ArtifactRef, ReadyJob } from "../models/staging.model";
import { abortReason, backoffDelayMs, mapWithConcurrency, sleep } from "../utils/concurrency";
import {
  DownloadFailed,
  DownloadIntegrityError,
  errorMessage,
  PipelineError,
} from "../utils/errors";
import { describeHttpError, isCancellation, isTransientHttpError } from "../utils/http";
import logger from "../utils/logger";
import { sanitizePathSegment } from "../utils/sanitizer";

export interface DownloadOptions {
  concurrency: number;
  maxAttempts: number;
  baseDelayMs: number;
  checksumAlgorithm: ChecksumAlgorithm;
}

export interface StagedCandidate {
  candidate: Candidate;
  job: ReadyJob;
}

export type DownloadResult = CandidateResult<DownloadedPair>;

export const PARTIAL_SUFFIX = ".part";

/** `<scratch>/<id>/<id>.<kind>.fits`, one directory per candidate. */
export function artifactPath(
  scratchDir: string,
  candidateId: string,
  kind: ArtifactKind,
): string {
  const id = sanitizePathSegment(candidateId, "candidate");
  return path.join(scratchDir, id, `${id}.${kind}.fits`);
}

/** The first token of a checksum sidecar, lower-cased. */
export function parseChecksum(body: string): string | undefined {
  const token = body.trim().split(/\s+/)[0];
  return token ? token.toLowerCase() : undefined;
}

export class DownloaderService {
  constructor(
    private source: ArtifactSource,
    private options: DownloadOptions,
  ) {}

  async downloadAll(
    staged: readonly StagedCandidate[],
    scratchDir: string,
    signal?: AbortSignal,
  ): Promise<DownloadResult[]> {
    logger.info(`Downloading cutouts for ${staged.length} observations`, { scratchDir });
    const results = await mapWithConcurrency(staged, this.options.concurrency, (item) =>
      this.downloadCandidate(item, scratchDir, signal),
    );

    const files = results.flatMap((r) => (r.ok ? [r.value.image, r.value.weight] : []));
    const totalSize = files.reduce((sum, f) => sum + f.size, 0);
    logger.info(
      `Downloaded ${files.length} files with total size ${(totalSize / 1e6).toFixed(4)} MB`,
    );
    return results;
  }

  async downloadCandidate(
    { candidate, job }: StagedCandidate,
    scratchDir: string,
    signal?: AbortSignal,
  ): Promise<DownloadResult> {
    const candidateId = job.candidateId;
    try {
      const image = await this.downloadWithRetry(
        scratchDir,
        candidateId,
        "image",
        job.image,
        candidate.image.filename,
        signal,
      );
      const weight = await this.downloadWithRetry(
        scratchDir,
        candidateId,
        "weight",
        job.weight,
        candidate.weight.filename,
        signal,
      );
      return { ok: true, candidateId, value: { candidateId, image, weight } };
    } catch (error) {
      if (error instanceof PipelineError && error.fatal) throw error;
      const reason =
        error instanceof PipelineError
          ? `${error.code}: ${error.message}`
          : errorMessage(error);
      logger.warn(`Download failed for ${candidateId}: ${reason}`);
      return { ok: false, candidateId, stage: "download", reason };
    }
  }

  private async expectedChecksum(
    ref: ArtifactRef,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    if (this.options.checksumAlgorithm === "none" || !ref.checksumUrl) {
      return undefined;
    }
    try {
      return parseChecksum(await this.source.fetchText(ref.checksumUrl, signal));
    } catch (error) {
      logger.warn(
        `Checksum for ${ref.filename} unavailable, verifying size only: ${describeHttpError(error)}`,
      );
      return undefined;
    }
  }

  private async downloadWithRetry(
    scratchDir: string,
    candidateId: string,
    kind: ArtifactKind,
    ref: ArtifactRef,
    sourceFilename: string,
    signal?: AbortSignal,
  ): Promise<LocalArtifact> {
    const target = artifactPath(scratchDir, candidateId, kind);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const checksum = await this.expectedChecksum(ref, signal);

    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        logger.debug(
          `Download attempt ${attempt}/${this.options.maxAttempts} for ${candidateId} ${kind}`,
        );
        const { size, sha256 } = await this.downloadFile(ref, target, checksum, signal);
        logger.info(`Downloaded ${kind} for ${candidateId}`, { path: target, size });
        return { candidateId, kind, path: target, size, sha256, sourceFilename };
      } catch (error) {
        if (signal?.aborted || isCancellation(error)) {
          throw new DownloadFailed(
            `${kind} transfer cancelled: ${abortReason(signal, "run cancelled")}`,
          );
        }
        if (!(error instanceof DownloadIntegrityError) && !isTransientHttpError(error)) {
          throw new DownloadFailed(`${kind} transfer failed: ${describeHttpError(error)}`);
        }

        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn(
          `Download attempt ${attempt} failed for ${candidateId} ${kind}: ${describeHttpError(error)}`,
        );

        if (attempt < this.options.maxAttempts) {
          const delay = backoffDelayMs(attempt, this.options.baseDelayMs);
          logger.info(`Retrying in ${delay}ms...`);
          try {
            await sleep(delay, signal);
          } catch {
            throw new DownloadFailed(
              `${kind} transfer cancelled: ${abortReason(signal, "run cancelled")}`,
            );
          }
        }
      }
    }

    if (lastError instanceof DownloadIntegrityError) {
      throw new DownloadIntegrityError(
        `${kind} failed verification after ${this.options.maxAttempts} attempts: ${lastError.message}`,
      );
    }
    throw new DownloadFailed(
      `${kind} transfer failed after ${this.options.maxAttempts} attempts: ${describeHttpError(lastError)}`,
    );
  }

  /**
   * Streams one file to `<target>.part`, hashing as data flows, and renames it
   * into place only after size and checksum match.
   */
  private async downloadFile(
    ref: ArtifactRef,
    target: string,
    checksum: string | undefined,
    signal?: AbortSignal,
  ): Promise<{ size: number; sha256: string }> {
    const partPath = `${target}${PARTIAL_SUFFIX}`;

    try {
      const { stream, contentLength } = await this.source.openArtifact(ref.url, signal);

      const sha256Hash = crypto.createHash("sha256");
      const md5Hash =
        this.options.checksumAlgorithm === "md5" ? crypto.createHash("md5") : undefined;
      let size = 0;

      stream.on("data", (chunk: Buffer) => {
        sha256Hash.update(chunk);
        md5Hash?.update(chunk);
        size += chunk.length;
      });

      await pipeline(stream, fs.createWriteStream(partPath));

      const sha256 = sha256Hash.digest("hex");
      const expectedSize = ref.expectedSize ?? contentLength;
      if (expectedSize !== undefined && size !== expectedSize) {
        throw new DownloadIntegrityError(
          `size mismatch for ${ref.filename}: expected ${expectedSize}, got ${size}`,
        );
      }

      if (checksum !== undefined) {
        const actual = md5Hash ? md5Hash.digest("hex") : sha256;
        if (actual !== checksum) {
          throw new DownloadIntegrityError(
            `checksum mismatch for ${ref.filename}: expected ${checksum}, got ${actual}`,
          );
        }
      }

      await fs.promises.rename(partPath, target);
      return { size, sha256 };
    } catch (error) {
      await fs.promises.rm(partPath, { force: true });
      throw error;
    }
  }
}
