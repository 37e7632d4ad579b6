import type { SkyPosition } from "./region.model";

export const IMAGE_SUBTYPE = "spectral.restored.3d";
export const WEIGHT_SUBTYPE = "spectral.weight.3d";

/** One row of the archive's ObsCore table, reduced to the columns used here. */
export interface ObscoreRow {
  obs_id: string;
  obs_collection: string;
  filename: string;
  dataproduct_subtype: string;
  access_url: string;
  s_ra: number;
  s_dec: number;
  em_min?: number;
  em_max?: number;
}

export interface ArchiveProduct {
  filename: string;
  accessUrl: string;
  subtype: string;
}

export interface Candidate {
  observationId: string;
  collection: string;
  footprint: SkyPosition;
  image: ArchiveProduct;
  weight: ArchiveProduct;
}

export interface CandidateSelection {
  candidates: Candidate[];
  warnings: string[];
}
