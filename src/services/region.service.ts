import type { NameResolver } from "../models/archive.model";
import type {
  Band,
  Region,
  RegionInput,
  ResolvedRegion,
  SpectralConversion,
  SpectralInterval,
} from "../models/region.model";
import { AmbiguousSpectralRange, InvalidRegion } from "../utils/errors";
import logger from "../utils/logger";
import {
  bandFromFrequencies,
  HI_REST_FREQUENCY_MHZ,
  velocityToFrequencyMHz,
} from "../utils/spectral";

function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

export function validateRegion(region: Region): Region {
  const { ra, dec, radiusArcmin } = region;
  if (!isFiniteNumber(radiusArcmin) || radiusArcmin <= 0) {
    throw new InvalidRegion(`Radius must be positive, got ${radiusArcmin}`);
  }
  if (!isFiniteNumber(ra) || ra < 0 || ra >= 360) {
    throw new InvalidRegion(`RA must be within [0, 360) deg, got ${ra}`);
  }
  if (!isFiniteNumber(dec) || dec < -90 || dec > 90) {
    throw new InvalidRegion(`Dec must be within [-90, 90] deg, got ${dec}`);
  }
  return { ra, dec, radiusArcmin };
}

function toRange(values: number[], label: string): [number, number] {
  if (values.length !== 2 || !values.every(isFiniteNumber)) {
    throw new AmbiguousSpectralRange(
      `${label} range needs exactly two numbers, got [${values.join(", ")}]`,
    );
  }
  const lower = Math.min(values[0], values[1]);
  const upper = Math.max(values[0], values[1]);
  if (lower === upper) {
    throw new AmbiguousSpectralRange(`${label} range is empty: ${lower}`);
  }
  return [lower, upper];
}

/**
 * Builds the spectral interval and the band the archive is queried with.
 * Frequency is authoritative when given in MHz; a velocity range (km/s) is
 * converted with the radio convention against the HI rest frequency.
 */
export function resolveSpectral(input: Pick<RegionInput, "freqMHz" | "velocityKms">): {
  spectral: SpectralInterval;
  band: Band;
  conversion: SpectralConversion;
} {
  const freq = input.freqMHz ?? [];
  const vel = input.velocityKms ?? [];
  const hasFreq = freq.length > 0;
  const hasVel = vel.length > 0;

  if (hasFreq === hasVel) {
    throw new AmbiguousSpectralRange(
      hasFreq
        ? "Give either a frequency or a velocity range, not both"
        : "Either a frequency [MHz] or a velocity [km/s] range is required",
    );
  }

  if (hasFreq) {
    const [lower, upper] = toRange(freq, "Frequency");
    if (lower <= 0) {
      throw new AmbiguousSpectralRange(`Frequencies must be positive, got ${lower}`);
    }
    return {
      spectral: { lower, upper, unit: "frequency" },
      band: bandFromFrequencies(lower, upper),
      conversion: {
        convention: "radio",
        restFrequencyMHz: HI_REST_FREQUENCY_MHZ,
        direction: "none",
      },
    };
  }

  const [lower, upper] = toRange(vel, "Velocity");
  const fA = velocityToFrequencyMHz(lower);
  const fB = velocityToFrequencyMHz(upper);
  if (fA <= 0 || fB <= 0) {
    throw new AmbiguousSpectralRange(
      `Velocity range [${lower}, ${upper}] km/s has no physical frequency`,
    );
  }

  return {
    spectral: { lower, upper, unit: "velocity" },
    band: bandFromFrequencies(fA, fB),
    conversion: {
      convention: "radio",
      restFrequencyMHz: HI_REST_FREQUENCY_MHZ,
      direction: "velocity->frequency",
    },
  };
}

export class RegionResolver {
  constructor(private names: NameResolver) {}

  async resolve(input: RegionInput): Promise<ResolvedRegion> {
    const name = input.name?.trim() || undefined;

    // local checks run before any name lookup
    const spectral = resolveSpectral(input);
    if (!isFiniteNumber(input.radiusArcmin) || input.radiusArcmin <= 0) {
      throw new InvalidRegion(`Radius must be positive, got ${input.radiusArcmin}`);
    }

    let ra: number;
    let dec: number;
    if (input.ra !== undefined && input.dec !== undefined) {
      ra = input.ra;
      dec = input.dec;
    } else if (name) {
      ({ ra, dec } = await this.names.resolve(name));
    } else {
      throw new InvalidRegion("Either a source name or both RA and Dec are required");
    }

    const region = validateRegion({ ra, dec, radiusArcmin: input.radiusArcmin });
    logger.info(`Centre coordinates: (${region.ra}, ${region.dec})`, {
      radiusArcmin: region.radiusArcmin,
      sourceName: name,
    });
    logger.info(
      `Frequency range: ${spectral.band.minHz} - ${spectral.band.maxHz} Hz`,
      { conversion: spectral.conversion.direction },
    );

    return { region, ...spectral, sourceName: name };
  }
}
