export type ArtifactKind = "image" | "weight";

export interface LocalArtifact {
  candidateId: string;
  kind: ArtifactKind;
  path: string;
  size: number;
  sha256: string;
  sourceFilename: string;
}

export interface DownloadedPair {
  candidateId: string;
  image: LocalArtifact;
  weight: LocalArtifact;
}

export type WeightingMode = "FromWeightImages" | "FromPrimaryBeamModel";

export interface ManifestEntry {
  candidateId: string;
  image: string;
  weight: string;
  sourceImage: string;
  sourceWeight: string;
}

export interface MosaicManifest {
  entries: ManifestEntry[];
  outputBaseName: string;
  outputImage: string;
  outputWeight: string;
  weighting: WeightingMode;
}

export interface MosaicResult {
  image: string;
  weight: string;
  exitCode: number;
  logPath: string;
}

export type ExecutionEnvironment = "local" | "singularity";
