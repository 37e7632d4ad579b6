import Joi from "joi";
import path from "path";
import { parseArgs } from "util";
import { loadConfig, loadEnvFiles, type AppConfig } from "../config";
import type { ExecutionEnvironment, WeightingMode } from "../models/mosaic.model";
import type { PipelineInput, PipelineOutcome } from "../models/pipeline.model";
import { CasdaArchiveService } from "../services/archive.service";
import { CandidateSelector } from "../services/candidate.service";
import { DownloaderService } from "../services/download.service";
import { SpawnExecutor } from "../services/executor.service";
import { MosaicRunner } from "../services/mosaic.service";
import { MosaicConfigBuilder } from "../services/mosaicConfig.service";
import { PipelineOrchestrator } from "../services/pipeline.service";
import { RegionResolver } from "../services/region.service";
import { SesameNameResolver } from "../services/sesame.service";
import { StagingClient } from "../services/staging.service";
import { MAX_TIMER_MS } from "../utils/concurrency";
import { errorMessage } from "../utils/errors";
import logger, { setLogLevel } from "../utils/logger";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: cutout-mosaic --radius <arcmin> --output <dir> (--name <source> | --ra <deg> --dec <deg>)
                     (--freq "<lo> <hi>" | --vel "<lo> <hi>") [options]

Options:
  --name <source>           Source name resolved to coordinates
  --ra <deg>, --dec <deg>   Centre of the region
  --radius <arcmin>         Cutout radius
  --freq "<lo> <hi>"        Frequency range [MHz]
  --vel "<lo> <hi>"         Velocity range [km/s]
  --obs_collection <name>   Archive collection (default WALLABY)
  --output <dir>            Directory for the mosaic and its records
  --config <file>           Credentials file (CASDA_USERNAME, CASDA_PASSWORD)
  --url <url>               TAP service URL
  --query <adql>            Query template; $OBS_COLLECTION is substituted
  --sbids <id ...>          Only use these observations
  --milkyway                Use the Milky Way cubes
  --filename <name>         Mosaic file name
  --weighting <mode>        FromWeightImages or FromPrimaryBeamModel
  --env <local|singularity> Where linmos runs (default local)
  --container <image>       Singularity image providing linmos
  --scratch <dir>           Download directory (default <output>/scratch)
  --max_wait <seconds>      Staging time limit per observation
  --cleanup                 Remove the scratch directory after success
  --verbose                 Debug logging
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  name?: string;
  ra?: number;
  dec?: number;
  radius: number;
  freq?: number[];
  vel?: number[];
  obs_collection?: string;
  output: string;
  config?: string;
  url?: string;
  query?: string;
  sbids?: string[];
  milkyway: boolean;
  filename?: string;
  weighting?: WeightingMode;
  env: ExecutionEnvironment;
  container?: string;
  scratch?: string;
  max_wait?: number;
  cleanup: boolean;
  verbose: boolean;
}

const rangeSchema = Joi.array().items(Joi.number()).min(1);

const cliSchema = Joi.object<CliArgs>({
  name: Joi.string().trim().min(1).optional(),
  ra: Joi.number().optional(),
  dec: Joi.number().optional(),
  radius: Joi.number().required(),
  freq: rangeSchema.optional(),
  vel: rangeSchema.optional(),
  obs_collection: Joi.string().trim().min(1).optional(),
  output: Joi.string().required(),
  config: Joi.string().optional(),
  url: Joi.string().uri().optional(),
  query: Joi.string().optional(),
  sbids: Joi.array().items(Joi.string().trim().min(1)).optional(),
  milkyway: Joi.boolean().default(false),
  filename: Joi.string().max(255).optional(),
  weighting: Joi.string().valid("FromWeightImages", "FromPrimaryBeamModel").optional(),
  env: Joi.string().valid("local", "singularity").default("local"),
  container: Joi.string().when("env", {
    is: "singularity",
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
  scratch: Joi.string().optional(),
  max_wait: Joi.number().positive().max(Math.floor(MAX_TIMER_MS / 1000)).optional(),
  cleanup: Joi.boolean().default(false),
  verbose: Joi.boolean().default(false),
})
  .and("ra", "dec")
  .or("name", "ra");

/** Splits "950 1550", "950,1550" and repeated flags into one list of tokens. */
function splitList(values: string[] | undefined): string[] | undefined {
  if (!values) return undefined;
  return values.flatMap((v) => v.split(/[\s,]+/)).filter(Boolean);
}

function toNumbers(values: string[] | undefined): (number | string)[] | undefined {
  return splitList(values)?.map((v) => (Number.isFinite(Number(v)) ? Number(v) : v));
}

/** Attaches negative numbers to their flag (`--dec -15.5` becomes `--dec=-15.5`). */
function attachNegativeValues(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg.startsWith("--") && !arg.includes("=") && next !== undefined && /^-\d/.test(next)) {
      out.push(`${arg}=${next}`);
      i += 1;
    } else {
      out.push(arg);
    }
  }
  return out;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: attachNegativeValues(argv),
      strict: true,
      allowPositionals: false,
      options: {
        name: { type: "string" },
        ra: { type: "string" },
        dec: { type: "string" },
        radius: { type: "string" },
        freq: { type: "string", multiple: true },
        vel: { type: "string", multiple: true },
        obs_collection: { type: "string" },
        output: { type: "string" },
        config: { type: "string" },
        url: { type: "string" },
        query: { type: "string" },
        sbids: { type: "string", multiple: true },
        milkyway: { type: "boolean" },
        filename: { type: "string" },
        weighting: { type: "string" },
        env: { type: "string" },
        container: { type: "string" },
        scratch: { type: "string" },
        max_wait: { type: "string" },
        cleanup: { type: "boolean" },
        verbose: { type: "boolean" },
      },
    }).values;
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

export function parseCommandLine(argv: string[]): CliArgs {
  const values = readFlags(argv);
  const { error, value } = cliSchema.validate(
    {
      ...values,
      freq: toNumbers(values.freq),
      vel: toNumbers(values.vel),
      sbids: splitList(values.sbids),
    },
    { abortEarly: false, convert: true },
  );
  if (error || value === undefined) {
    const details = error ? error.details.map((d) => d.message).join("; ") : "";
    throw new UsageError(`Invalid arguments: ${details}`);
  }
  return value;
}

export function buildPipelineInput(args: CliArgs, config: AppConfig): PipelineInput {
  const outputDir = path.resolve(args.output);
  return {
    name: args.name,
    ra: args.ra,
    dec: args.dec,
    radiusArcmin: args.radius,
    freqMHz: args.freq,
    velocityKms: args.vel,
    collection: args.obs_collection ?? config.obsCollection,
    observationIds: args.sbids,
    milkyWay: args.milkyway,
    outputDir,
    scratchDir: args.scratch ? path.resolve(args.scratch) : undefined,
    filename: args.filename,
    weighting: args.weighting,
    environment: args.env,
    container: args.container ? path.resolve(args.container) : undefined,
    cleanup: args.cleanup,
  };
}

/** Applies command line overrides on top of the environment configuration. */
export function applyOverrides(config: AppConfig, args: CliArgs): AppConfig {
  return {
    ...config,
    casda: { ...config.casda, tapUrl: args.url ?? config.casda.tapUrl },
    staging: {
      ...config.staging,
      maxWaitMs:
        args.max_wait !== undefined ? args.max_wait * 1000 : config.staging.maxWaitMs,
    },
  };
}

export function createOrchestrator(config: AppConfig, queryTemplate?: string): PipelineOrchestrator {
  const archive = new CasdaArchiveService({
    tapUrl: config.casda.tapUrl,
    username: config.casda.username,
    password: config.casda.password,
    timeoutMs: config.httpTimeoutMs,
    queryTemplate,
  });

  return new PipelineOrchestrator(
    {
      regions: new RegionResolver(
        new SesameNameResolver(config.sesameUrl, config.httpTimeoutMs),
      ),
      selector: new CandidateSelector(archive),
      staging: new StagingClient(archive, config.staging),
      downloader: new DownloaderService(archive, config.download),
      mosaicConfig: new MosaicConfigBuilder(),
      mosaic: new MosaicRunner(new SpawnExecutor(config.linmos.logTailLines), {
        linmosBin: config.linmos.bin,
        singularityBin: config.linmos.singularityBin,
      }),
    },
    { runBudgetMs: config.runBudgetMs },
  );
}

export function exitCodeFor(outcome: PipelineOutcome): number {
  return outcome.success ? EXIT_OK : EXIT_FAILURE;
}

export async function runCli(argv: string[], signal?: AbortSignal): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCommandLine(argv);
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  let config: AppConfig;
  try {
    loadEnvFiles(args.config);
    config = applyOverrides(loadConfig(), args);
  } catch (error) {
    logger.error("Error loading configuration:", error);
    return EXIT_FAILURE;
  }
  setLogLevel(args.verbose ? "debug" : config.logLevel);

  const orchestrator = createOrchestrator(config, args.query);
  const outcome = await orchestrator.run(buildPipelineInput(args, config), signal);

  if (outcome.success && outcome.mosaic) {
    logger.info(`Mosaic written to ${outcome.mosaic.image}`);
  } else if (outcome.error) {
    logger.error(`${outcome.error.code}: ${outcome.error.message}`);
    if (outcome.error.logTail) {
      process.stderr.write(`${outcome.error.logTail}\n`);
    }
  }
  return exitCodeFor(outcome);
}
