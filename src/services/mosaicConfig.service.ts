import fs from "fs";
import path from "path";
import type {
  LocalArtifact,
  ManifestEntry,
  MosaicManifest,
  WeightingMode,
} from "../models/mosaic.model";
import type { Region } from "../models/region.model";
import { EmptyMosaic } from "../utils/errors";
import logger from "../utils/logger";
import { sanitizePathSegment, stripFitsSuffix } from "../utils/sanitizer";

export const DEFAULT_WEIGHTING: WeightingMode = "FromWeightImages";
export const CONFIG_FILENAME = "linmos.conf";
export const MANIFEST_FILENAME = "manifest.json";

export interface ManifestOptions {
  outputDir: string;
  region: Region;
  filename?: string;
  weighting?: WeightingMode;
}

export function deriveBaseName(region: Region, filename?: string): string {
  if (filename && filename.trim()) {
    const base = stripFitsSuffix(sanitizePathSegment(filename, ""));
    if (base) return base;
  }
  const ra = region.ra.toFixed(4);
  const dec = region.dec.toFixed(4);
  const radius = region.radiusArcmin.toFixed(2);
  return `mosaic_${ra}_${dec}_${radius}arcmin`;
}

/**
 * Groups artifacts by candidate id. A candidate is only kept when it has
 * exactly one image and one weight; position in the input never matters.
 */
export function pairArtifacts(artifacts: readonly LocalArtifact[]): ManifestEntry[] {
  const byCandidate = new Map<string, { image: LocalArtifact[]; weight: LocalArtifact[] }>();
  for (const artifact of artifacts) {
    const slot = byCandidate.get(artifact.candidateId) ?? { image: [], weight: [] };
    slot[artifact.kind].push(artifact);
    byCandidate.set(artifact.candidateId, slot);
  }

  const entries: ManifestEntry[] = [];
  for (const [candidateId, slot] of byCandidate) {
    if (slot.image.length !== 1 || slot.weight.length !== 1) {
      logger.warn(
        `Leaving ${candidateId} out of the mosaic: ${slot.image.length} image(s), ${slot.weight.length} weight(s)`,
      );
      continue;
    }
    const [image] = slot.image;
    const [weight] = slot.weight;
    entries.push({
      candidateId,
      image: image.path,
      weight: weight.path,
      sourceImage: image.sourceFilename,
      sourceWeight: weight.sourceFilename,
    });
  }

  return entries.sort((a, b) =>
    a.candidateId === b.candidateId ? 0 : a.candidateId < b.candidateId ? -1 : 1,
  );
}

function list(values: string[]): string {
  return `[${values.join(", ")}]`;
}

export class MosaicConfigBuilder {
  build(artifacts: readonly LocalArtifact[], options: ManifestOptions): MosaicManifest {
    const entries = pairArtifacts(artifacts);
    if (entries.length === 0) {
      throw new EmptyMosaic();
    }

    const base = deriveBaseName(options.region, options.filename);
    return {
      entries,
      outputBaseName: base,
      outputImage: path.join(options.outputDir, `${base}.fits`),
      outputWeight: path.join(options.outputDir, `weights.${base}.fits`),
      weighting: options.weighting ?? DEFAULT_WEIGHTING,
    };
  }

  /** Renders the manifest as a linmos parset. Paths go in without `.fits`. */
  render(manifest: MosaicManifest): string {
    const { entries } = manifest;
    const lines = [
      `linmos.names = ${list(entries.map((e) => stripFitsSuffix(e.image)))}`,
      `linmos.weights = ${list(entries.map((e) => stripFitsSuffix(e.weight)))}`,
      "linmos.imagetype = fits",
      `linmos.outname = ${stripFitsSuffix(manifest.outputImage)}`,
      `linmos.outweight = ${stripFitsSuffix(manifest.outputWeight)}`,
      `linmos.weighttype = ${manifest.weighting}`,
      "linmos.weightstate = Inherent",
      `linmos.imageHistory = ${list([
        ...entries.map((e) => e.sourceImage),
        ...entries.map((e) => e.sourceWeight),
      ])}`,
    ];
    return `${lines.join("\n")}\n`;
  }

  /** Writes the parset and a JSON copy of the manifest next to the outputs. */
  async write(
    manifest: MosaicManifest,
    outputDir: string,
  ): Promise<{ configPath: string; manifestPath: string }> {
    await fs.promises.mkdir(outputDir, { recursive: true });
    const configPath = path.join(outputDir, CONFIG_FILENAME);
    const manifestPath = path.join(outputDir, MANIFEST_FILENAME);

    await fs.promises.writeFile(configPath, this.render(manifest), "utf8");
    await fs.promises.writeFile(
      manifestPath,
      `${JSON.stringify(manifest, null, 2)}\n`,
      "utf8",
    );

    logger.info(`Generated linmos config at ${configPath}`, {
      inputs: manifest.entries.length,
      weighting: manifest.weighting,
    });
    return { configPath, manifestPath };
  }
}
