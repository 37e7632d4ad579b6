export interface SkyPosition {
  ra: number;
  dec: number;
}

export interface Region extends SkyPosition {
  radiusArcmin: number;
}

export type SpectralUnit = "frequency" | "velocity";

export interface SpectralInterval {
  lower: number;
  upper: number;
  unit: SpectralUnit;
}

export interface SpectralConversion {
  convention: "radio";
  restFrequencyMHz: number;
  direction: "none" | "velocity->frequency";
}

export interface Band {
  minHz: number;
  maxHz: number;
  minWavelengthM: number;
  maxWavelengthM: number;
}

export interface RegionInput {
  name?: string;
  ra?: number;
  dec?: number;
  radiusArcmin: number;
  freqMHz?: number[];
  velocityKms?: number[];
}

export interface ResolvedRegion {
  region: Region;
  spectral: SpectralInterval;
  band: Band;
  conversion: SpectralConversion;
  sourceName?: string;
}

export interface CutoutRequest extends ResolvedRegion {
  collection: string;
  observationIds?: readonly string[];
  milkyWay: boolean;
}
