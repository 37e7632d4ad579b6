import fs from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import type { LocalArtifact } from "../models/mosaic.model";
import type {
  CandidateResult,
  ExcludedCandidate,
  PipelineInput,
  PipelineOutcome,
} from "../models/pipeline.model";
import type { CutoutRequest } from "../models/region.model";
import { withDeadline } from "../utils/concurrency";
import { errorMessage, MosaicToolFailed, PipelineError } from "../utils/errors";
import logger from "../utils/logger";
import type { CandidateSelector } from "./candidate.service";
import type { DownloaderService, StagedCandidate } from "./download.service";
import type { MosaicRunner } from "./mosaic.service";
import type { MosaicConfigBuilder } from "./mosaicConfig.service";
import type { RegionResolver } from "./region.service";
import type { StagingClient } from "./staging.service";

export const OUTCOME_FILENAME = "outcome.json";
export const RUN_BUDGET_EXHAUSTED = "run budget exhausted";

export interface PipelineServices {
  regions: RegionResolver;
  selector: CandidateSelector;
  staging: StagingClient;
  downloader: DownloaderService;
  mosaicConfig: MosaicConfigBuilder;
  mosaic: MosaicRunner;
}

export interface PipelineOptions {
  runBudgetMs: number;
}

export function defaultScratchDir(outputDir: string): string {
  return path.join(outputDir, "scratch");
}

/** Splits tagged per-candidate results into successes and exclusions. */
export function partitionResults<T>(results: readonly CandidateResult<T>[]): {
  succeeded: { candidateId: string; value: T }[];
  excluded: ExcludedCandidate[];
} {
  const succeeded: { candidateId: string; value: T }[] = [];
  const excluded: ExcludedCandidate[] = [];
  for (const result of results) {
    if (result.ok) {
      succeeded.push({ candidateId: result.candidateId, value: result.value });
    } else {
      excluded.push({
        candidateId: result.candidateId,
        stage: result.stage,
        reason: result.reason,
      });
    }
  }
  return { succeeded, excluded };
}

export class PipelineOrchestrator {
  constructor(
    private services: PipelineServices,
    private options: PipelineOptions,
  ) {}

  async run(input: PipelineInput, signal?: AbortSignal): Promise<PipelineOutcome> {
    const runId = uuidv4();
    const startedAt = new Date().toISOString();
    const scratchDir = input.scratchDir ?? defaultScratchDir(input.outputDir);
    const budget = withDeadline(this.options.runBudgetMs, signal, RUN_BUDGET_EXHAUSTED);

    const outcome: PipelineOutcome = {
      runId,
      success: false,
      included: [],
      excluded: [],
      warnings: [],
      startedAt,
      finishedAt: startedAt,
    };

    logger.info(`Starting mosaic run ${runId}`, {
      outputDir: input.outputDir,
      scratchDir,
    });

    try {
      await fs.promises.mkdir(input.outputDir, { recursive: true });
      await fs.promises.mkdir(scratchDir, { recursive: true });

      const resolved = await this.services.regions.resolve(input);
      outcome.conversion = resolved.conversion;
      const request: CutoutRequest = {
        ...resolved,
        collection: input.collection,
        observationIds: input.observationIds,
        milkyWay: input.milkyWay,
      };

      const selection = await this.services.selector.select(request, budget.signal);
      outcome.warnings.push(...selection.warnings);
      const candidates = new Map(
        selection.candidates.map((c) => [c.observationId, c]),
      );

      const staged = partitionResults(
        await this.services.staging.stageAll(selection.candidates, request, budget.signal),
      );
      const ready: StagedCandidate[] = [];
      for (const { candidateId, value } of staged.succeeded) {
        const candidate = candidates.get(candidateId);
        if (candidate) ready.push({ candidate, job: value });
      }

      if (budget.signal.aborted && !signal?.aborted) {
        logger.warn(
          `Run budget exhausted while staging, continuing with ${ready.length} ready observations`,
        );
      }

      // The budget bounds staging only. Jobs that reached READY are still
      // downloaded and mosaicked; only the caller's signal stops those steps.
      const downloaded = partitionResults(
        ready.length > 0
          ? await this.services.downloader.downloadAll(ready, scratchDir, signal)
          : [],
      );

      // the single join point for per-candidate failures
      outcome.excluded = [...staged.excluded, ...downloaded.excluded].sort((a, b) =>
        a.candidateId === b.candidateId ? 0 : a.candidateId < b.candidateId ? -1 : 1,
      );

      const artifacts: LocalArtifact[] = downloaded.succeeded.flatMap(({ value }) => [
        value.image,
        value.weight,
      ]);
      const manifest = this.services.mosaicConfig.build(artifacts, {
        outputDir: input.outputDir,
        region: resolved.region,
        filename: input.filename,
        weighting: input.weighting,
      });
      outcome.included = manifest.entries.map((e) => e.candidateId);

      const { configPath, manifestPath } = await this.services.mosaicConfig.write(
        manifest,
        input.outputDir,
      );
      outcome.manifestPath = manifestPath;

      outcome.mosaic = await this.services.mosaic.run(manifest, configPath, {
        environment: input.environment,
        container: input.container,
        bindPaths: [scratchDir, input.outputDir],
        signal,
      });
      outcome.success = true;

      if (input.cleanup) {
        logger.info(`Removing scratch directory ${scratchDir}`);
        await fs.promises.rm(scratchDir, { recursive: true, force: true });
      }
    } catch (error) {
      outcome.error = this.describeFailure(error);
    } finally {
      budget.dispose();
    }

    outcome.finishedAt = new Date().toISOString();
    this.logSummary(outcome);
    await this.writeOutcome(outcome, input.outputDir);
    return outcome;
  }

  private describeFailure(error: unknown): NonNullable<PipelineOutcome["error"]> {
    if (error instanceof MosaicToolFailed) {
      logger.error(`Run failed: ${error.message}`);
      return { code: error.code, message: error.message, logTail: error.logTail };
    }
    if (error instanceof PipelineError) {
      logger.error(`Run failed: ${error.message}`, { code: error.code });
      return { code: error.code, message: error.message };
    }
    logger.error("Unexpected error during mosaic run:", error);
    return { code: "UnexpectedError", message: errorMessage(error) };
  }

  private logSummary(outcome: PipelineOutcome): void {
    for (const excluded of outcome.excluded) {
      logger.warn(
        `Excluded ${excluded.candidateId} at ${excluded.stage}: ${excluded.reason}`,
      );
    }
    if (outcome.success) {
      logger.info(
        `Mosaic built from ${outcome.included.length} observations, ${outcome.excluded.length} excluded`,
        { included: outcome.included, image: outcome.mosaic?.image },
      );
    } else {
      logger.error(`Run ${outcome.runId} finished without a mosaic`, {
        code: outcome.error?.code,
        excluded: outcome.excluded.length,
      });
    }
  }

  private async writeOutcome(outcome: PipelineOutcome, outputDir: string): Promise<void> {
    const outcomePath = path.join(outputDir, OUTCOME_FILENAME);
    try {
      await fs.promises.mkdir(outputDir, { recursive: true });
      await fs.promises.writeFile(
        outcomePath,
        `${JSON.stringify(outcome, null, 2)}\n`,
        "utf8",
      );
    } catch (error) {
      logger.error(`Could not write ${outcomePath}:`, error);
    }
  }
}
