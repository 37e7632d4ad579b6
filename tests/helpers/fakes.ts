import { CanceledError } from "axios";
import fs from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import type {
  ArtifactSource,
  ArtifactStream,
  NameResolver,
  ObservationArchive,
  StagingArchive,
} from "../../src/models/archive.model";
import {
  IMAGE_SUBTYPE,
  WEIGHT_SUBTYPE,
  type Candidate,
  type ObscoreRow,
} from "../../src/models/candidate.model";
import type { CutoutRequest } from "../../src/models/region.model";
import type { JobStatus } from "../../src/models/staging.model";
import type {
  ExecOptions,
  ExecResult,
  ProcessExecutor,
} from "../../src/services/executor.service";
import { resolveSpectral } from "../../src/services/region.service";
import { MosaicToolFailed } from "../../src/utils/errors";

export async function makeTempDir(prefix = "mosaic-test-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function candidate(id: string, ra = 197.2, dec = -15.5): Candidate {
  return {
    observationId: id,
    collection: "WALLABY",
    footprint: { ra, dec },
    image: {
      filename: `image.restored.${id}.contsub.fits`,
      accessUrl: `https://archive.test/datalink?ID=${id}-image`,
      subtype: IMAGE_SUBTYPE,
    },
    weight: {
      filename: `weights.${id}.contsub.fits`,
      accessUrl: `https://archive.test/datalink?ID=${id}-weight`,
      subtype: WEIGHT_SUBTYPE,
    },
  };
}

/** The image and weight rows the archive would list for one observation. */
export function obscoreRows(id: string, ra: number, dec: number): ObscoreRow[] {
  const c = candidate(id, ra, dec);
  return [
    {
      obs_id: id,
      obs_collection: "WALLABY",
      filename: c.image.filename,
      dataproduct_subtype: IMAGE_SUBTYPE,
      access_url: c.image.accessUrl,
      s_ra: ra,
      s_dec: dec,
    },
    {
      obs_id: id,
      obs_collection: "WALLABY",
      filename: c.weight.filename,
      dataproduct_subtype: WEIGHT_SUBTYPE,
      access_url: c.weight.accessUrl,
      s_ra: ra,
      s_dec: dec,
    },
  ];
}

export function cutoutRequest(overrides: Partial<CutoutRequest> = {}): CutoutRequest {
  return {
    region: { ra: 197.24113, dec: -15.51682, radiusArcmin: 85.9434683 },
    ...resolveSpectral({ velocityKms: [950, 1550] }),
    collection: "WALLABY",
    milkyWay: false,
    ...overrides,
  };
}

export class FakeNameResolver implements NameResolver {
  lookups: string[] = [];

  constructor(private known: Record<string, { ra: number; dec: number }>) {}

  async resolve(name: string): Promise<{ ra: number; dec: number }> {
    this.lookups.push(name);
    const position = this.known[name];
    if (!position) throw new Error(`no such source ${name}`);
    return position;
  }
}

export type JobScript = (JobStatus | Error)[];

/** Rejects the way axios does once a request's signal has fired. */
function checkSignal(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CanceledError();
}

/**
 * In-memory archive. Each observation gets a scripted sequence of status
 * replies; the last entry repeats once the script runs out.
 */
export class FakeArchive implements ObservationArchive, StagingArchive, ArtifactSource {
  rows: ObscoreRow[] = [];
  scripts = new Map<string, JobScript>();
  submitErrors = new Map<string, Error>();
  files = new Map<string, Buffer>();
  /** Failures served before a file's content, per URL. */
  transferFailures = new Map<string, Error[]>();
  contentLengths = new Map<string, number>();
  checksums = new Map<string, string>();
  submitted: string[] = [];
  aborted: string[] = [];
  polls = new Map<string, number>();

  async queryObservations(): Promise<ObscoreRow[]> {
    return this.rows;
  }

  async submitCutout(
    c: Candidate,
    _request: CutoutRequest,
    signal?: AbortSignal,
  ): Promise<string> {
    checkSignal(signal);
    const error = this.submitErrors.get(c.observationId);
    if (error) throw error;
    this.submitted.push(c.observationId);
    return `https://archive.test/jobs/${c.observationId}`;
  }

  async getJobStatus(jobUrl: string, signal?: AbortSignal): Promise<JobStatus> {
    checkSignal(signal);
    const id = jobUrl.split("/").pop() ?? "";
    const count = this.polls.get(id) ?? 0;
    this.polls.set(id, count + 1);

    const script = this.scripts.get(id) ?? [{ state: "EXECUTING", results: [] }];
    const step = script[Math.min(count, script.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  }

  async abortJob(jobUrl: string): Promise<void> {
    this.aborted.push(jobUrl);
  }

  async openArtifact(url: string, signal?: AbortSignal): Promise<ArtifactStream> {
    checkSignal(signal);
    const failure = this.transferFailures.get(url)?.shift();
    if (failure) throw failure;
    const content = this.files.get(url);
    if (!content) throw new Error(`no file at ${url}`);
    return {
      stream: Readable.from([content]),
      contentLength: this.contentLengths.get(url) ?? content.length,
    };
  }

  async fetchText(url: string, signal?: AbortSignal): Promise<string> {
    checkSignal(signal);
    const checksum = this.checksums.get(url);
    if (checksum === undefined) throw new Error(`no checksum at ${url}`);
    return checksum;
  }

  /** Scripts a job that completes immediately with an image and a weight cube. */
  completes(id: string, content = `${id}-cube`): void {
    const image = `https://archive.test/files/${id}.image.fits`;
    const weight = `https://archive.test/files/${id}.weights.fits`;
    this.files.set(image, Buffer.from(`${content}-image`));
    this.files.set(weight, Buffer.from(`${content}-weight`));
    this.scripts.set(id, [
      {
        state: "READY",
        results: [
          { url: image, filename: `${id}.image.fits` },
          { url: weight, filename: `${id}.weights.fits` },
        ],
      },
    ]);
  }

  fails(id: string, summary: string): void {
    this.scripts.set(id, [{ state: "ERROR", results: [], errorSummary: summary }]);
  }
}

/**
 * Records the command it was given. When `writeOutputs` is set it writes the
 * image and weight named in the parset, the way a successful linmos run would.
 * An aborted signal fails the run the way `spawn` does.
 */
export class FakeExecutor implements ProcessExecutor {
  calls: { command: string; args: string[]; options: ExecOptions }[] = [];

  constructor(
    private result: ExecResult = { exitCode: 0, logTail: "" },
    private writeOutputs = true,
  ) {}

  async run(command: string, args: string[], options: ExecOptions): Promise<ExecResult> {
    this.calls.push({ command, args, options });
    if (options.signal?.aborted) {
      throw new MosaicToolFailed(null, "The operation was aborted");
    }
    await fs.promises.writeFile(options.logPath, this.result.logTail, "utf8");

    if (this.writeOutputs) {
      const parset = await fs.promises.readFile(args[args.length - 1], "utf8");
      for (const key of ["outname", "outweight"]) {
        const match = parset.match(new RegExp(`^linmos\\.${key} = (.+)$`, "m"));
        if (match) await fs.promises.writeFile(`${match[1]}.fits`, "SIMPLE  = T");
      }
    }
    return this.result;
  }
}
