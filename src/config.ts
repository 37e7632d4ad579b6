import dotenv from "dotenv";
import fs from "fs";
import Joi from "joi";
import { MAX_TIMER_MS } from "./utils/concurrency";
import { ConfigError } from "./utils/errors";

export type ChecksumAlgorithm = "none" | "sha256" | "md5";

export interface AppConfig {
  casda: {
    tapUrl: string;
    username?: string;
    password?: string;
  };
  sesameUrl: string;
  obsCollection: string;
  httpTimeoutMs: number;
  staging: {
    concurrency: number;
    pollIntervalMs: number;
    pollMaxIntervalMs: number;
    maxWaitMs: number;
    maxPollFailures: number;
  };
  download: {
    concurrency: number;
    maxAttempts: number;
    baseDelayMs: number;
    checksumAlgorithm: ChecksumAlgorithm;
  };
  runBudgetMs: number;
  linmos: {
    bin: string;
    singularityBin: string;
    logTailLines: number;
  };
  logLevel: string;
}

interface ValidatedEnv {
  CASDA_TAP_URL: string;
  CASDA_USERNAME?: string;
  CASDA_PASSWORD?: string;
  SESAME_URL: string;
  OBS_COLLECTION: string;
  HTTP_TIMEOUT_MS: number;
  STAGING_CONCURRENCY: number;
  POLL_INTERVAL_MS: number;
  POLL_MAX_INTERVAL_MS: number;
  STAGING_MAX_WAIT_MS: number;
  POLL_MAX_FAILURES: number;
  DOWNLOAD_CONCURRENCY: number;
  DOWNLOAD_MAX_ATTEMPTS: number;
  DOWNLOAD_BASE_DELAY_MS: number;
  CHECKSUM_ALGORITHM: ChecksumAlgorithm;
  RUN_BUDGET_MS: number;
  LINMOS_BIN: string;
  SINGULARITY_BIN: string;
  LOG_TAIL_LINES: number;
  LOG_LEVEL: string;
}

const envSchema = Joi.object<ValidatedEnv>({
  CASDA_TAP_URL: Joi.string()
    .uri()
    .default("https://casda.csiro.au/casda_vo_tools/tap"),
  CASDA_USERNAME: Joi.string().optional(),
  CASDA_PASSWORD: Joi.string().optional(),
  SESAME_URL: Joi.string()
    .uri()
    .default("https://cds.unistra.fr/cgi-bin/nph-sesame"),
  OBS_COLLECTION: Joi.string().default("WALLABY"),
  HTTP_TIMEOUT_MS: Joi.number().integer().min(1).max(MAX_TIMER_MS).default(60_000),
  STAGING_CONCURRENCY: Joi.number().integer().min(1).default(4),
  POLL_INTERVAL_MS: Joi.number().integer().min(1).max(MAX_TIMER_MS).default(5_000),
  POLL_MAX_INTERVAL_MS: Joi.number().integer().min(1).max(MAX_TIMER_MS).default(300_000),
  STAGING_MAX_WAIT_MS: Joi.number().integer().min(1).max(MAX_TIMER_MS).default(21_600_000),
  POLL_MAX_FAILURES: Joi.number().integer().min(1).default(5),
  DOWNLOAD_CONCURRENCY: Joi.number().integer().min(1).default(2),
  DOWNLOAD_MAX_ATTEMPTS: Joi.number().integer().min(1).default(5),
  DOWNLOAD_BASE_DELAY_MS: Joi.number().integer().min(0).default(1_000),
  CHECKSUM_ALGORITHM: Joi.string().valid("none", "sha256", "md5").default("none"),
  RUN_BUDGET_MS: Joi.number().integer().min(1).max(MAX_TIMER_MS).default(43_200_000),
  LINMOS_BIN: Joi.string().default("linmos"),
  SINGULARITY_BIN: Joi.string().default("singularity"),
  LOG_TAIL_LINES: Joi.number().integer().min(1).default(40),
  LOG_LEVEL: Joi.string()
    .valid("error", "warn", "info", "debug")
    .default("info"),
}).unknown(true);

/**
 * Reads `.env` from the working directory, then the credentials file when
 * one is given. Values already present in the environment are never
 * overwritten.
 */
export function loadEnvFiles(credentialsFile?: string): void {
  dotenv.config();
  if (!credentialsFile) return;

  if (!fs.existsSync(credentialsFile)) {
    throw new ConfigError(`Config file not found at ${credentialsFile}`);
  }
  dotenv.config({ path: credentialsFile });
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const { error, value } = envSchema.validate(env, {
    abortEarly: false,
    convert: true,
  });
  if (error || value === undefined) {
    const keys = error ? error.details.map((d) => d.message).join("; ") : "";
    throw new ConfigError(`Invalid configuration: ${keys}`);
  }

  const v = value;
  return {
    casda: {
      tapUrl: v.CASDA_TAP_URL,
      username: v.CASDA_USERNAME,
      password: v.CASDA_PASSWORD,
    },
    sesameUrl: v.SESAME_URL,
    obsCollection: v.OBS_COLLECTION,
    httpTimeoutMs: v.HTTP_TIMEOUT_MS,
    staging: {
      concurrency: v.STAGING_CONCURRENCY,
      pollIntervalMs: v.POLL_INTERVAL_MS,
      pollMaxIntervalMs: Math.max(v.POLL_INTERVAL_MS, v.POLL_MAX_INTERVAL_MS),
      maxWaitMs: v.STAGING_MAX_WAIT_MS,
      maxPollFailures: v.POLL_MAX_FAILURES,
    },
    download: {
      concurrency: v.DOWNLOAD_CONCURRENCY,
      maxAttempts: v.DOWNLOAD_MAX_ATTEMPTS,
      baseDelayMs: v.DOWNLOAD_BASE_DELAY_MS,
      checksumAlgorithm: v.CHECKSUM_ALGORITHM,
    },
    runBudgetMs: v.RUN_BUDGET_MS,
    linmos: {
      bin: v.LINMOS_BIN,
      singularityBin: v.SINGULARITY_BIN,
      logTailLines: v.LOG_TAIL_LINES,
    },
    logLevel: v.LOG_LEVEL,
  };
}
