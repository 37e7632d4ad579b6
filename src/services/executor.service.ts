import { spawn } from "child_process";
import fs from "fs";
import type { ExecutionEnvironment } from "../models/mosaic.model";
import { MosaicToolFailed } from "../utils/errors";
import logger from "../utils/logger";

export interface ExecOptions {
  logPath: string;
  cwd?: string;
  signal?: AbortSignal;
}

export interface ExecResult {
  exitCode: number | null;
  logTail: string;
}

export interface ProcessExecutor {
  run(command: string, args: string[], options: ExecOptions): Promise<ExecResult>;
}

export interface CommandOptions {
  environment: ExecutionEnvironment;
  linmosBin: string;
  singularityBin: string;
  container?: string;
  bindPaths: string[];
  configPath: string;
}

/** The argv that runs linmos on a parset, directly or inside a Singularity image. */
export function buildCommand(options: CommandOptions): { command: string; args: string[] } {
  const linmos = [options.linmosBin, "-c", options.configPath];
  if (options.environment === "local") {
    const [command, ...args] = linmos;
    return { command, args };
  }

  const binds = [...new Set(options.bindPaths)].flatMap((p) => ["--bind", `${p}:${p}`]);
  return {
    command: options.singularityBin,
    args: ["exec", ...binds, options.container ?? "", ...linmos],
  };
}

/** Keeps the last `limit` complete lines of a byte stream. */
export class LogTail {
  private lines: string[] = [];
  private partial = "";

  constructor(private limit: number) {}

  push(chunk: Buffer | string): void {
    const text = this.partial + chunk.toString();
    const parts = text.split(/\r?\n/);
    this.partial = parts.pop() ?? "";
    this.lines.push(...parts);
    if (this.lines.length > this.limit) {
      this.lines = this.lines.slice(-this.limit);
    }
  }

  toString(): string {
    const all = this.partial ? [...this.lines, this.partial] : this.lines;
    return all.slice(-this.limit).join("\n");
  }
}

/** Spawns the tool, tees stdout and stderr into a log file, and waits for exit. */
export class SpawnExecutor implements ProcessExecutor {
  constructor(private tailLines: number) {}

  run(command: string, args: string[], options: ExecOptions): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      const log = fs.createWriteStream(options.logPath);
      const tail = new LogTail(this.tailLines);

      logger.info(`Running ${command} ${args.join(" ")}`);
      const child = spawn(command, args, {
        cwd: options.cwd,
        signal: options.signal,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const onOutput = (chunk: Buffer) => {
        log.write(chunk);
        tail.push(chunk);
      };
      child.stdout.on("data", onOutput);
      child.stderr.on("data", onOutput);

      // a failed spawn can report both events
      let settled = false;
      child.on("error", (error) => {
        if (settled) return;
        settled = true;
        log.end();
        const output = tail.toString();
        reject(
          new MosaicToolFailed(null, output ? `${output}\n${error.message}` : error.message),
        );
      });

      child.on("close", (code) => {
        if (settled) return;
        settled = true;
        log.end(() => resolve({ exitCode: code, logTail: tail.toString() }));
      });
    });
  }
}
