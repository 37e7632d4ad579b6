import type { RegionInput, SpectralConversion } from "./region.model";
import type {
  ExecutionEnvironment,
  MosaicResult,
  WeightingMode,
} from "./mosaic.model";

export type CandidateStage = "staging" | "download";

/** Tagged per-candidate result, merged by the orchestrator at one join point. */
export type CandidateResult<T> =
  | { ok: true; candidateId: string; value: T }
  | { ok: false; candidateId: string; stage: CandidateStage; reason: string };

export interface ExcludedCandidate {
  candidateId: string;
  stage: CandidateStage;
  reason: string;
}

export interface PipelineInput extends RegionInput {
  collection: string;
  observationIds?: string[];
  milkyWay: boolean;
  outputDir: string;
  scratchDir?: string;
  filename?: string;
  weighting?: WeightingMode;
  environment: ExecutionEnvironment;
  container?: string;
  cleanup: boolean;
}

export interface PipelineOutcome {
  runId: string;
  success: boolean;
  included: string[];
  excluded: ExcludedCandidate[];
  warnings: string[];
  conversion?: SpectralConversion;
  manifestPath?: string;
  mosaic?: MosaicResult;
  error?: {
    code: string;
    message: string;
    logTail?: string;
  };
  startedAt: string;
  finishedAt: string;
}
