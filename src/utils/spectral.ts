import type { Band } from "../models/region.model";

/** Speed of light in km/s. */
export const SPEED_OF_LIGHT_KMS = 299_792.458;

/** Rest frequency of the neutral hydrogen 21 cm line, in MHz. */
export const HI_REST_FREQUENCY_MHZ = 1_420.405751786;

/**
 * Radio convention: f = f0 (1 - v / c).
 */
export function velocityToFrequencyMHz(
  velocityKms: number,
  restFrequencyMHz = HI_REST_FREQUENCY_MHZ,
): number {
  return restFrequencyMHz * (1 - velocityKms / SPEED_OF_LIGHT_KMS);
}

/**
 * Radio convention: v = c (1 - f / f0).
 */
export function frequencyToVelocityKms(
  frequencyMHz: number,
  restFrequencyMHz = HI_REST_FREQUENCY_MHZ,
): number {
  return SPEED_OF_LIGHT_KMS * (1 - frequencyMHz / restFrequencyMHz);
}

export function frequencyMHzToWavelengthM(frequencyMHz: number): number {
  return (SPEED_OF_LIGHT_KMS * 1_000) / (frequencyMHz * 1e6);
}

export function bandFromFrequencies(a: number, b: number): Band {
  const minMHz = Math.min(a, b);
  const maxMHz = Math.max(a, b);
  return {
    minHz: minMHz * 1e6,
    maxHz: maxMHz * 1e6,
    // wavelength runs the other way
    minWavelengthM: frequencyMHzToWavelengthM(maxMHz),
    maxWavelengthM: frequencyMHzToWavelengthM(minMHz),
  };
}
