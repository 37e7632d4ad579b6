import fs from "fs";
import path from "path";
import type {
  ExecutionEnvironment,
  MosaicManifest,
  MosaicResult,
} from "../models/mosaic.model";
import { ConfigError, MosaicOutputMissing, MosaicToolFailed } from "../utils/errors";
import logger from "../utils/logger";
import { buildCommand, type ProcessExecutor } from "./executor.service";

export const LOG_FILENAME = "linmos.log";

export interface MosaicRunnerOptions {
  linmosBin: string;
  singularityBin: string;
}

export interface MosaicRunOptions {
  environment: ExecutionEnvironment;
  container?: string;
  /** Directories the container must see: scratch and output. */
  bindPaths: string[];
  signal?: AbortSignal;
}

async function isNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

export class MosaicRunner {
  constructor(
    private executor: ProcessExecutor,
    private options: MosaicRunnerOptions,
  ) {}

  async run(
    manifest: MosaicManifest,
    configPath: string,
    run: MosaicRunOptions,
  ): Promise<MosaicResult> {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Linmos config not found at ${configPath}`);
    }
    if (run.environment === "singularity") {
      const container = run.container;
      if (!container || !fs.existsSync(container)) {
        throw new ConfigError(`Singularity image not found at ${container ?? "(unset)"}`);
      }
    }

    const { command, args } = buildCommand({
      environment: run.environment,
      linmosBin: this.options.linmosBin,
      singularityBin: this.options.singularityBin,
      container: run.container,
      bindPaths: run.bindPaths,
      configPath,
    });
    const logPath = path.join(path.dirname(configPath), LOG_FILENAME);

    logger.info("Running linmos", { inputs: manifest.entries.length, logPath });
    const result = await this.executor.run(command, args, {
      logPath,
      cwd: path.dirname(configPath),
      signal: run.signal,
    });

    if (result.exitCode !== 0) {
      logger.error(`linmos exited with status ${result.exitCode}`, {
        logTail: result.logTail,
      });
      throw new MosaicToolFailed(result.exitCode, result.logTail);
    }

    // a zero exit status alone does not prove the mosaic was written
    const missing: string[] = [];
    for (const output of [manifest.outputImage, manifest.outputWeight]) {
      if (!(await isNonEmptyFile(output))) missing.push(output);
    }
    if (missing.length > 0) {
      logger.error("linmos produced no usable output", { missing });
      throw new MosaicOutputMissing(missing);
    }

    logger.info(`Mosaic image file written to ${manifest.outputImage}`);
    logger.info(`Mosaic weights file written to ${manifest.outputWeight}`);
    return {
      image: manifest.outputImage,
      weight: manifest.outputWeight,
      exitCode: 0,
      logPath,
    };
  }
}
