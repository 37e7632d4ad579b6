import type { StagingArchive } from "../models/archive.model";
import type { Candidate } from "../models/candidate.model";
import type { CandidateResult } from "../models/pipeline.model";
import type { CutoutRequest } from "../models/region.model";
import {
  TERMINAL_STATES,
  type ArtifactRef,
  type JobStatus,
  type ReadyJob,
  type StagingJob,
  type StagingState,
} from "../models/staging.model";
import { errorMessage, PipelineError } from "../utils/errors";
import { abortReason, mapWithConcurrency, sleep, withDeadline } from "../utils/concurrency";
import { describeHttpError, isTransientHttpError } from "../utils/http";
import logger from "../utils/logger";

export interface StagingOptions {
  concurrency: number;
  pollIntervalMs: number;
  pollMaxIntervalMs: number;
  maxWaitMs: number;
  maxPollFailures: number;
  now?: () => number;
}

export type StagingResult = CandidateResult<ReadyJob>;

const STATE_RANK: Record<StagingState, number> = {
  SUBMITTED: 0,
  EXECUTING: 1,
  READY: 2,
  ERROR: 2,
  TIMED_OUT: 2,
};

/**
 * Moves a job forward. Reports of an earlier state (an archive answering
 * QUEUED after EXECUTING) are ignored, and terminal jobs never change.
 */
export function advance(
  job: StagingJob,
  next: StagingState,
  patch: Partial<StagingJob> = {},
): StagingJob {
  if (TERMINAL_STATES.has(job.state)) return job;
  if (STATE_RANK[next] < STATE_RANK[job.state]) return job;
  return { ...job, ...patch, state: next };
}

function isWeight(ref: ArtifactRef): boolean {
  return /weight/i.test(ref.filename);
}

/** Picks the image and weight cube out of a completed job's results. */
export function classifyResults(results: ArtifactRef[]): {
  image?: ArtifactRef;
  weight?: ArtifactRef;
} {
  return {
    image: results.find((ref) => !isWeight(ref)),
    weight: results.find(isWeight),
  };
}

function isReady(job: StagingJob): job is ReadyJob {
  return (
    job.state === "READY" &&
    job.jobUrl !== undefined &&
    job.image !== undefined &&
    job.weight !== undefined
  );
}

export class StagingClient {
  private now: () => number;

  constructor(
    private archive: StagingArchive,
    private options: StagingOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async stageAll(
    candidates: readonly Candidate[],
    request: CutoutRequest,
    signal?: AbortSignal,
  ): Promise<StagingResult[]> {
    logger.info(`Staging cutouts for ${candidates.length} observations`, {
      concurrency: this.options.concurrency,
    });
    return mapWithConcurrency(candidates, this.options.concurrency, (candidate) =>
      this.stage(candidate, request, signal),
    );
  }

  async stage(
    candidate: Candidate,
    request: CutoutRequest,
    signal?: AbortSignal,
  ): Promise<StagingResult> {
    const job = await this.run(candidate, request, signal);
    const candidateId = candidate.observationId;

    if (isReady(job)) {
      return { ok: true, candidateId, value: job };
    }
    return {
      ok: false,
      candidateId,
      stage: "staging",
      reason: `${job.state}: ${job.reason ?? "unknown failure"}`,
    };
  }

  /** Drives one job from submission to a terminal state. */
  async run(
    candidate: Candidate,
    request: CutoutRequest,
    signal?: AbortSignal,
  ): Promise<StagingJob> {
    const id = candidate.observationId;
    const started = this.now();
    const limit = `no result after ${this.options.maxWaitMs} ms`;
    const deadline = withDeadline(this.options.maxWaitMs, signal, limit);
    let job: StagingJob = {
      candidateId: id,
      state: "SUBMITTED",
      submittedAt: new Date(started).toISOString(),
    };

    const timedOut = (): StagingJob => {
      // a parent abort carries its own reason (budget, shutdown)
      const reason = deadline.signal.aborted
        ? abortReason(deadline.signal, "run cancelled")
        : limit;
      logger.warn(`Staging timed out for ${id}: ${reason}`);
      if (job.jobUrl) this.abandon(job.jobUrl);
      return advance(job, "TIMED_OUT", { reason });
    };

    try {
      let jobUrl: string;
      try {
        jobUrl = await this.archive.submitCutout(candidate, request, deadline.signal);
        job = { ...job, jobUrl };
      } catch (error) {
        if (deadline.signal.aborted) return timedOut();
        if (error instanceof PipelineError && error.fatal) throw error;
        logger.warn(`Cutout submission failed for ${id}: ${describeHttpError(error)}`);
        return advance(job, "ERROR", {
          reason: `submission failed: ${describeHttpError(error)}`,
        });
      }

      let interval = this.options.pollIntervalMs;
      let failures = 0;

      for (;;) {
        const remaining = this.options.maxWaitMs - (this.now() - started);
        if (remaining <= 0) return timedOut();

        try {
          await sleep(Math.min(interval, remaining), deadline.signal);
        } catch {
          return timedOut();
        }
        interval = Math.min(interval * 2, this.options.pollMaxIntervalMs);

        let status: JobStatus;
        try {
          status = await this.archive.getJobStatus(jobUrl, deadline.signal);
          failures = 0;
        } catch (error) {
          if (deadline.signal.aborted) return timedOut();
          if (error instanceof PipelineError && error.fatal) throw error;
          failures += 1;
          const message = describeHttpError(error);
          if (!isTransientHttpError(error) || failures >= this.options.maxPollFailures) {
            logger.warn(`Giving up on ${id} after ${failures} failed status checks`, {
              error: message,
            });
            return advance(job, "ERROR", {
              reason: `status polling failed ${failures} time(s): ${message}`,
            });
          }
          logger.debug(`Status check ${failures} failed for ${id}: ${message}`);
          continue;
        }

        job = { ...job, lastPolledAt: new Date(this.now()).toISOString() };

        if (status.state === "READY") {
          const { image, weight } = classifyResults(status.results);
          if (!image || !weight) {
            return advance(job, "ERROR", {
              reason: `incomplete results: ${status.results.length} file(s), missing ${image ? "weight" : "image"}`,
            });
          }
          logger.info(`Cutouts ready for ${id}`, { jobUrl: job.jobUrl });
          return advance(job, "READY", { image, weight });
        }

        if (status.state === "ERROR") {
          logger.warn(`Cutout job failed for ${id}: ${status.errorSummary ?? "no summary"}`);
          return advance(job, "ERROR", {
            reason: status.errorSummary ?? "archive reported an error",
          });
        }

        const next = advance(job, status.state);
        if (next.state !== job.state) {
          logger.info(`Cutout job for ${id} is ${next.state}`);
        }
        job = next;
      }
    } finally {
      deadline.dispose();
    }
  }

  private abandon(jobUrl: string): void {
    if (!this.archive.abortJob) return;
    this.archive.abortJob(jobUrl).catch((error: unknown) => {
      logger.debug(`Could not abort job ${jobUrl}: ${errorMessage(error)}`);
    });
  }
}
