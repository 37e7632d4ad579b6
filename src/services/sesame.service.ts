import axios, { type AxiosInstance } from "axios";
import type { NameResolver } from "../models/archive.model";
import type { SkyPosition } from "../models/region.model";
import { NameResolutionError } from "../utils/errors";
import { describeHttpError } from "../utils/http";
import logger from "../utils/logger";

const J2000_LINE = /^%J\s+([+-]?\d+(?:\.\d+)?)\s+([+-]?\d+(?:\.\d+)?)/m;

/** Reads the J2000 position (`%J ra dec`) from a Sesame plain-text reply. */
export function parseSesameResponse(body: string): SkyPosition | null {
  const match = body.match(J2000_LINE);
  if (!match) return null;

  const ra = Number(match[1]);
  const dec = Number(match[2]);
  if (!Number.isFinite(ra) || !Number.isFinite(dec)) return null;
  if (dec < -90 || dec > 90 || ra < 0 || ra >= 360) return null;
  return { ra, dec };
}

/** Resolves source names through the CDS Sesame service (Simbad, NED, VizieR). */
export class SesameNameResolver implements NameResolver {
  private http: AxiosInstance;
  private baseUrl: string;

  constructor(baseUrl: string, timeoutMs: number, http?: AxiosInstance) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.http = http ?? axios.create({ timeout: timeoutMs });
  }

  async resolve(name: string): Promise<SkyPosition> {
    const url = `${this.baseUrl}/-oI/A?${encodeURIComponent(name.trim())}`;

    let body: string;
    try {
      const response = await this.http.get<string>(url, { responseType: "text" });
      body = response.data;
    } catch (error) {
      throw new NameResolutionError(
        `Could not resolve "${name}": ${describeHttpError(error)}`,
      );
    }

    const position = parseSesameResponse(body);
    if (!position) {
      throw new NameResolutionError(`Unknown source name "${name}"`);
    }

    logger.info(`Resolved ${name}`, position);
    return position;
  }
}
