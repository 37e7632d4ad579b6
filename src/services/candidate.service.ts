import type { ObservationArchive } from "../models/archive.model";
import {
  IMAGE_SUBTYPE,
  WEIGHT_SUBTYPE,
  type ArchiveProduct,
  type Candidate,
  type CandidateSelection,
  type ObscoreRow,
} from "../models/candidate.model";
import type { CutoutRequest, SkyPosition } from "../models/region.model";
import { NoCandidatesFound } from "../utils/errors";
import logger from "../utils/logger";

/** Half-diagonal of a 6x6 deg survey tile. */
export const DEFAULT_FOOTPRINT_SEPARATION_DEG = Math.sqrt(3 ** 2 + 3 ** 2);

const MILKY_WAY_MARKER = "MilkyWay";

const DEG = Math.PI / 180;

export function angularSeparationDeg(a: SkyPosition, b: SkyPosition): number {
  const dRa = (b.ra - a.ra) * DEG;
  const dDec = (b.dec - a.dec) * DEG;
  const h =
    Math.sin(dDec / 2) ** 2 +
    Math.cos(a.dec * DEG) * Math.cos(b.dec * DEG) * Math.sin(dRa / 2) ** 2;
  return (2 * Math.asin(Math.min(1, Math.sqrt(h)))) / DEG;
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function toProduct(row: ObscoreRow): ArchiveProduct {
  return {
    filename: row.filename,
    accessUrl: row.access_url,
    subtype: row.dataproduct_subtype,
  };
}

function firstOfSubtype(rows: ObscoreRow[], subtype: string): ObscoreRow | undefined {
  return rows
    .filter((row) => row.dataproduct_subtype === subtype)
    .sort((a, b) => compareIds(a.filename, b.filename))[0];
}

function matchesAllowList(observationId: string, allowList: readonly string[]): boolean {
  return allowList.some((id) => observationId.includes(id));
}

/**
 * Turns raw ObsCore rows into an ordered, duplicate-free list of
 * observations that each carry one image cube and one weight cube.
 */
export function selectCandidates(
  rows: readonly ObscoreRow[],
  request: CutoutRequest,
  separationDeg = DEFAULT_FOOTPRINT_SEPARATION_DEG,
): CandidateSelection {
  const warnings: string[] = [];
  const collection = request.collection.toLowerCase();
  const maxSeparation = separationDeg + request.region.radiusArcmin / 60;
  const { minWavelengthM, maxWavelengthM } = request.band;

  const matching = rows.filter((row) => {
    if (!row.obs_collection.toLowerCase().includes(collection)) return false;
    if (row.filename.includes(MILKY_WAY_MARKER) !== request.milkyWay) return false;
    const separation = angularSeparationDeg(request.region, {
      ra: row.s_ra,
      dec: row.s_dec,
    });
    if (separation >= maxSeparation) return false;
    if (row.em_min !== undefined && row.em_max !== undefined) {
      if (row.em_min > maxWavelengthM || row.em_max < minWavelengthM) return false;
    }
    return true;
  });

  const allowList = request.observationIds;
  const groups = new Map<string, ObscoreRow[]>();
  for (const row of matching) {
    if (allowList && !matchesAllowList(row.obs_id, allowList)) {
      logger.debug(`Filtering out ${row.obs_id} observations`);
      continue;
    }
    const group = groups.get(row.obs_id) ?? [];
    group.push(row);
    groups.set(row.obs_id, group);
  }

  const candidates: Candidate[] = [];
  for (const observationId of [...groups.keys()].sort(compareIds)) {
    const group = groups.get(observationId) ?? [];
    const image = firstOfSubtype(group, IMAGE_SUBTYPE);
    const weight = firstOfSubtype(group, WEIGHT_SUBTYPE);
    if (!image || !weight) {
      warnings.push(
        `Observation ${observationId} has no ${image ? "weight" : "image"} cube in the query results; skipped`,
      );
      continue;
    }
    candidates.push({
      observationId,
      collection: image.obs_collection,
      footprint: { ra: image.s_ra, dec: image.s_dec },
      image: toProduct(image),
      weight: toProduct(weight),
    });
  }

  for (const id of allowList ?? []) {
    if (!candidates.some((c) => c.observationId.includes(id))) {
      warnings.push(`Requested observation ${id} was not found in the query results`);
    }
  }

  return { candidates, warnings };
}

export class CandidateSelector {
  constructor(
    private archive: ObservationArchive,
    private separationDeg = DEFAULT_FOOTPRINT_SEPARATION_DEG,
  ) {}

  async select(request: CutoutRequest, signal?: AbortSignal): Promise<CandidateSelection> {
    const rows = await this.archive.queryObservations(request.collection, signal);
    const selection = selectCandidates(rows, request, this.separationDeg);

    for (const warning of selection.warnings) {
      logger.warn(warning);
    }

    if (selection.candidates.length === 0) {
      logger.info("No subset found based on search parameters.");
      throw new NoCandidatesFound();
    }

    logger.info(`Selected ${selection.candidates.length} observations`, {
      observations: selection.candidates.map((c) => c.observationId),
    });
    return selection;
  }
}
