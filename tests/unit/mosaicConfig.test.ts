import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ArtifactKind, LocalArtifact } from "../../src/models/mosaic.model";
import {
  deriveBaseName,
  MosaicConfigBuilder,
  pairArtifacts,
} from "../../src/services/mosaicConfig.service";
import { EmptyMosaic } from "../../src/utils/errors";
import { makeTempDir } from "../helpers/fakes";

const REGION = { ra: 197.24113, dec: -15.51682, radiusArcmin: 85.9434683 };

function artifact(id: string, kind: ArtifactKind): LocalArtifact {
  return {
    candidateId: id,
    kind,
    path: `/scratch/${id}/${id}.${kind}.fits`,
    size: 1,
    sha256: "0",
    sourceFilename: kind === "image" ? `image.${id}.fits` : `weights.${id}.fits`,
  };
}

describe("deriveBaseName", () => {
  it("names the mosaic after the region by default", () => {
    expect(deriveBaseName(REGION)).toBe("mosaic_197.2411_-15.5168_85.94arcmin");
  });

  it("uses a sanitised file name without its extension", () => {
    expect(deriveBaseName(REGION, "../My Mosaic.FITS")).toBe("My_Mosaic");
  });

  it("falls back to the region when the file name has nothing usable", () => {
    expect(deriveBaseName(REGION, "???")).toBe("mosaic_197.2411_-15.5168_85.94arcmin");
  });
});

describe("pairArtifacts", () => {
  it("pairs by candidate id regardless of input order", () => {
    const entries = pairArtifacts([
      artifact("B", "weight"),
      artifact("A", "image"),
      artifact("B", "image"),
      artifact("A", "weight"),
    ]);

    expect(entries).toEqual([
      {
        candidateId: "A",
        image: "/scratch/A/A.image.fits",
        weight: "/scratch/A/A.weight.fits",
        sourceImage: "image.A.fits",
        sourceWeight: "weights.A.fits",
      },
      {
        candidateId: "B",
        image: "/scratch/B/B.image.fits",
        weight: "/scratch/B/B.weight.fits",
        sourceImage: "image.B.fits",
        sourceWeight: "weights.B.fits",
      },
    ]);
  });

  it("leaves out candidates without exactly one image and one weight", () => {
    const entries = pairArtifacts([
      artifact("A", "image"),
      artifact("B", "image"),
      artifact("B", "weight"),
      artifact("C", "image"),
      artifact("C", "image"),
      artifact("C", "weight"),
    ]);

    expect(entries.map((e) => e.candidateId)).toEqual(["B"]);
  });
});

describe("MosaicConfigBuilder", () => {
  const builder = new MosaicConfigBuilder();

  it("raises EmptyMosaic when nothing pairs up", () => {
    expect(() =>
      builder.build([artifact("A", "image")], { outputDir: "/out", region: REGION }),
    ).toThrow(EmptyMosaic);
  });

  it("places the outputs in the output directory", () => {
    const manifest = builder.build([artifact("A", "image"), artifact("A", "weight")], {
      outputDir: "/out",
      region: REGION,
      filename: "mosaic.fits",
    });

    expect(manifest.outputBaseName).toBe("mosaic");
    expect(manifest.outputImage).toBe("/out/mosaic.fits");
    expect(manifest.outputWeight).toBe("/out/weights.mosaic.fits");
    expect(manifest.weighting).toBe("FromWeightImages");
  });

  it("renders a linmos parset", () => {
    const manifest = builder.build(
      [artifact("A", "image"), artifact("A", "weight"), artifact("B", "image"), artifact("B", "weight")],
      { outputDir: "/out", region: REGION, filename: "mosaic", weighting: "FromPrimaryBeamModel" },
    );

    expect(builder.render(manifest)).toBe(
      [
        "linmos.names = [/scratch/A/A.image, /scratch/B/B.image]",
        "linmos.weights = [/scratch/A/A.weight, /scratch/B/B.weight]",
        "linmos.imagetype = fits",
        "linmos.outname = /out/mosaic",
        "linmos.outweight = /out/weights.mosaic",
        "linmos.weighttype = FromPrimaryBeamModel",
        "linmos.weightstate = Inherent",
        "linmos.imageHistory = [image.A.fits, image.B.fits, weights.A.fits, weights.B.fits]",
        "",
      ].join("\n"),
    );
  });

  describe("write", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it("writes the parset and a JSON copy of the manifest", async () => {
      const outputDir = path.join(dir, "out");
      const manifest = builder.build([artifact("A", "image"), artifact("A", "weight")], {
        outputDir,
        region: REGION,
      });

      const { configPath, manifestPath } = await builder.write(manifest, outputDir);

      expect(configPath).toBe(path.join(outputDir, "linmos.conf"));
      expect(fs.readFileSync(configPath, "utf8")).toBe(builder.render(manifest));
      expect(JSON.parse(fs.readFileSync(manifestPath, "utf8"))).toEqual(manifest);
    });
  });
});
