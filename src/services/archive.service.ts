import axios, { type AxiosInstance } from "axios";
import type { Readable } from "stream";
import type {
  ArtifactSource,
  ArtifactStream,
  ObservationArchive,
  StagingArchive,
} from "../models/archive.model";
import type { Candidate, ObscoreRow } from "../models/candidate.model";
import type { CutoutRequest } from "../models/region.model";
import type { ArtifactRef, JobStatus } from "../models/staging.model";
import { ArchiveQueryError, ConfigError, StagingError } from "../utils/errors";
import { describeHttpError } from "../utils/http";
import logger from "../utils/logger";
import { parseUwsJob, parseVotable, type VotableRow } from "../utils/votable";

export const DEFAULT_QUERY_TEMPLATE =
  "SELECT * FROM ivoa.obscore WHERE (obs_collection LIKE '%$OBS_COLLECTION%' AND " +
  "quality_level != 'REJECTED' AND " +
  "(filename LIKE '%contsub%' OR filename LIKE '%weight%') AND " +
  "(dataproduct_subtype = 'spectral.restored.3d' OR dataproduct_subtype = 'spectral.weight.3d'))";

const CUTOUT_SERVICE = "cutout_service";

export interface CasdaArchiveOptions {
  tapUrl: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  queryTemplate?: string;
}

function optionalNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export function toObscoreRow(row: VotableRow): ObscoreRow | null {
  const sRa = optionalNumber(row.s_ra);
  const sDec = optionalNumber(row.s_dec);
  if (!row.obs_id || !row.filename || !row.access_url) return null;
  if (sRa === undefined || sDec === undefined) return null;

  return {
    obs_id: row.obs_id,
    obs_collection: row.obs_collection ?? "",
    filename: row.filename,
    dataproduct_subtype: row.dataproduct_subtype ?? "",
    access_url: row.access_url,
    s_ra: sRa,
    s_dec: sDec,
    em_min: optionalNumber(row.em_min),
    em_max: optionalNumber(row.em_max),
  };
}

export function buildQuery(template: string, collection: string): string {
  return template.split("$OBS_COLLECTION").join(collection.replace(/'/g, "''"));
}

function basename(url: string): string {
  const path = url.split(/[?#]/)[0];
  const segments = path.split("/").filter(Boolean);
  return decodeURIComponent(segments[segments.length - 1] ?? "");
}

/** Maps UWS phases onto the staging states. */
export function phaseToState(phase: string): JobStatus["state"] | null {
  switch (phase) {
    case "PENDING":
    case "QUEUED":
      return "SUBMITTED";
    case "EXECUTING":
    case "HELD":
    case "SUSPENDED":
      return "EXECUTING";
    case "COMPLETED":
      return "READY";
    case "ERROR":
    case "ABORTED":
    case "ARCHIVED":
      return "ERROR";
    default:
      return null;
  }
}

/**
 * Client for the CASDA TAP query service and its SODA asynchronous cutout
 * service (UWS jobs).
 */
export class CasdaArchiveService
  implements ObservationArchive, StagingArchive, ArtifactSource
{
  private http: AxiosInstance;
  private tapUrl: string;
  private queryTemplate: string;
  private auth?: { username: string; password: string };

  constructor(options: CasdaArchiveOptions, http?: AxiosInstance) {
    this.tapUrl = options.tapUrl.replace(/\/$/, "");
    this.queryTemplate = options.queryTemplate || DEFAULT_QUERY_TEMPLATE;
    if (options.username && options.password) {
      this.auth = { username: options.username, password: options.password };
    }
    this.http = http ?? axios.create({ timeout: options.timeoutMs });
  }

  private credentials(): { username: string; password: string } {
    if (!this.auth) {
      throw new ConfigError(
        "CASDA_USERNAME and CASDA_PASSWORD are required to stage cutouts",
      );
    }
    return this.auth;
  }

  async queryObservations(
    collection: string,
    signal?: AbortSignal,
  ): Promise<ObscoreRow[]> {
    const query = buildQuery(this.queryTemplate, collection);
    logger.info(`Submitting query: ${query}`);

    try {
      const response = await this.http.post<string>(
        `${this.tapUrl}/sync`,
        new URLSearchParams({
          REQUEST: "doQuery",
          LANG: "ADQL",
          FORMAT: "votable",
          QUERY: query,
        }),
        { responseType: "text", signal },
      );

      const rows = parseVotable(response.data)
        .filter((resource) => resource.type !== "meta")
        .flatMap((resource) => resource.rows);
      const parsed = rows
        .map(toObscoreRow)
        .filter((row): row is ObscoreRow => row !== null);

      if (parsed.length < rows.length) {
        logger.warn(
          `Ignored ${rows.length - parsed.length} query rows without id, position or access URL`,
        );
      }
      logger.info(`Query returned ${parsed.length} products`);
      return parsed;
    } catch (error) {
      logger.error("Error querying archive:", error);
      throw new ArchiveQueryError(
        `Observation query failed: ${describeHttpError(error)}`,
      );
    }
  }

  /** Resolves a product's datalink document to the cutout service and its ID token. */
  private async resolveCutoutAccess(
    accessUrl: string,
    signal?: AbortSignal,
  ): Promise<{ serviceUrl: string; token: string }> {
    const response = await this.http.get<string>(accessUrl, {
      auth: this.credentials(),
      responseType: "text",
      signal,
    });
    const resources = parseVotable(response.data);

    const row = resources
      .filter((r) => r.type === "results")
      .flatMap((r) => r.rows)
      .find((r) => r.service_def === CUTOUT_SERVICE);
    const token = row?.authenticated_id_token;

    const service = resources.find(
      (r) => r.type === "meta" && r.id === CUTOUT_SERVICE,
    );
    const serviceUrl = service?.params.accessURL;

    if (!token || !serviceUrl) {
      throw new StagingError(
        `Datalink for ${accessUrl} does not offer ${CUTOUT_SERVICE}`,
      );
    }
    return { serviceUrl, token };
  }

  async submitCutout(
    candidate: Candidate,
    request: CutoutRequest,
    signal?: AbortSignal,
  ): Promise<string> {
    const auth = this.credentials();
    const access = await Promise.all([
      this.resolveCutoutAccess(candidate.image.accessUrl, signal),
      this.resolveCutoutAccess(candidate.weight.accessUrl, signal),
    ]);
    const serviceUrl = access[0].serviceUrl;

    const ids = new URLSearchParams();
    for (const { token } of access) ids.append("ID", token);

    const created = await this.http.post(serviceUrl, ids, {
      auth,
      signal,
      maxRedirects: 0,
      validateStatus: (status) => status === 303 || (status >= 200 && status < 300),
    });
    const location = created.headers["location"];
    if (typeof location !== "string" || !location) {
      throw new StagingError(
        `Cutout service did not return a job location for ${candidate.observationId}`,
      );
    }
    const jobUrl = new URL(location, serviceUrl).toString().replace(/\/$/, "");

    const { region, band } = request;
    const radiusDeg = region.radiusArcmin / 60;
    await this.http.post(
      `${jobUrl}/parameters`,
      new URLSearchParams({
        POS: `CIRCLE ${region.ra} ${region.dec} ${radiusDeg}`,
        BAND: `${band.minWavelengthM} ${band.maxWavelengthM}`,
      }),
      { auth, signal },
    );
    await this.http.post(
      `${jobUrl}/phase`,
      new URLSearchParams({ PHASE: "RUN" }),
      { auth, signal },
    );

    logger.info(`Cutout job started for ${candidate.observationId}`, {
      jobUrl,
    });
    return jobUrl;
  }

  async getJobStatus(jobUrl: string, signal?: AbortSignal): Promise<JobStatus> {
    const response = await this.http.get<string>(jobUrl, {
      auth: this.credentials(),
      responseType: "text",
      signal,
    });
    const job = parseUwsJob(response.data);

    const state = phaseToState(job.phase);
    if (!state) {
      return {
        state: "ERROR",
        results: [],
        errorSummary: `Unexpected job phase "${job.phase}"`,
      };
    }

    const sidecars = new Map<string, string>();
    const files: ArtifactRef[] = [];
    for (const result of job.results) {
      const filename = basename(result.href);
      if (filename.endsWith(".checksum")) {
        sidecars.set(filename.slice(0, -".checksum".length), result.href);
        continue;
      }
      files.push({ url: result.href, filename, expectedSize: result.size });
    }

    return {
      state,
      results: files.map((file) => ({
        ...file,
        checksumUrl: sidecars.get(file.filename),
      })),
      errorSummary: job.errorSummary,
    };
  }

  async abortJob(jobUrl: string): Promise<void> {
    await this.http.post(
      `${jobUrl}/phase`,
      new URLSearchParams({ PHASE: "ABORT" }),
      { auth: this.credentials() },
    );
  }

  async openArtifact(url: string, signal?: AbortSignal): Promise<ArtifactStream> {
    const response = await this.http.get<Readable>(url, {
      auth: this.credentials(),
      responseType: "stream",
      // transfers of large cubes outlive the request timeout
      timeout: 0,
      signal,
    });
    const length = Number(response.headers["content-length"]);
    return {
      stream: response.data,
      contentLength: Number.isFinite(length) && length >= 0 ? length : undefined,
    };
  }

  async fetchText(url: string, signal?: AbortSignal): Promise<string> {
    const response = await this.http.get<string>(url, {
      auth: this.credentials(),
      responseType: "text",
      signal,
    });
    return response.data;
  }
}
