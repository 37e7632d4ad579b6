import { describe, expect, it } from "vitest";
import type { ObscoreRow } from "../../src/models/candidate.model";
import {
  angularSeparationDeg,
  CandidateSelector,
  selectCandidates,
} from "../../src/services/candidate.service";
import { NoCandidatesFound } from "../../src/utils/errors";
import { cutoutRequest, FakeArchive, obscoreRows } from "../helpers/fakes";

function wallabyRows(): ObscoreRow[] {
  const [duplicateImage] = obscoreRows("ASKAP-10609", 196.0, -14.5);
  return [
    ...obscoreRows("ASKAP-10626", 199.0, -17.0),
    ...obscoreRows("ASKAP-10609", 196.0, -14.5),
    { ...duplicateImage, filename: "image.restored.ASKAP-10609.contsub.v2.fits" },
    ...obscoreRows("ASKAP-10612", 197.5, -15.5),
    ...obscoreRows("ASKAP-20000", 100.0, 10.0),
    ...obscoreRows("ASKAP-10612", 197.5, -15.5).map((row) => ({
      ...row,
      obs_id: "ASKAP-10612-MW",
      filename: row.filename.replace("contsub", "MilkyWay"),
    })),
  ];
}

describe("angularSeparationDeg", () => {
  it("is zero for the same position and symmetric", () => {
    const a = { ra: 197.24113, dec: -15.51682 };
    const b = { ra: 199.0, dec: -17.0 };

    expect(angularSeparationDeg(a, a)).toBe(0);
    expect(angularSeparationDeg(a, b)).toBeCloseTo(angularSeparationDeg(b, a), 12);
  });

  it("measures along a meridian in degrees", () => {
    expect(angularSeparationDeg({ ra: 10, dec: 0 }, { ra: 10, dec: 5 })).toBeCloseTo(5, 10);
  });
});

describe("selectCandidates", () => {
  it("selects nearby WALLABY observations in a fixed order", () => {
    const { candidates, warnings } = selectCandidates(wallabyRows(), cutoutRequest());

    expect(candidates.map((c) => c.observationId)).toEqual([
      "ASKAP-10609",
      "ASKAP-10612",
      "ASKAP-10626",
    ]);
    expect(warnings).toEqual([]);
  });

  it("gives the same answer whatever order the archive returns rows in", () => {
    const request = cutoutRequest();
    const forward = selectCandidates(wallabyRows(), request);
    const reversed = selectCandidates([...wallabyRows()].reverse(), request);

    expect(reversed).toEqual(forward);
  });

  it("keeps one image and one weight per observation", () => {
    const { candidates } = selectCandidates(wallabyRows(), cutoutRequest());
    const first = candidates[0];

    expect(first.image.filename).toBe("image.restored.ASKAP-10609.contsub.fits");
    expect(first.weight.filename).toBe("weights.ASKAP-10609.contsub.fits");
    expect(first.footprint).toEqual({ ra: 196.0, dec: -14.5 });
  });

  it("only uses Milky Way cubes when asked to", () => {
    const { candidates } = selectCandidates(wallabyRows(), cutoutRequest({ milkyWay: true }));

    expect(candidates.map((c) => c.observationId)).toEqual(["ASKAP-10612-MW"]);
  });

  it("skips observations missing a weight cube with a warning", () => {
    const [image] = obscoreRows("ASKAP-30000", 197.0, -15.0);
    const { candidates, warnings } = selectCandidates([image], cutoutRequest());

    expect(candidates).toEqual([]);
    expect(warnings).toEqual([
      "Observation ASKAP-30000 has no weight cube in the query results; skipped",
    ]);
  });

  it("filters by the requested observation ids and reports the missing ones", () => {
    const { candidates, warnings } = selectCandidates(
      wallabyRows(),
      cutoutRequest({ observationIds: ["10612", "99999"] }),
    );

    expect(candidates.map((c) => c.observationId)).toEqual(["ASKAP-10612"]);
    expect(warnings).toEqual(["Requested observation 99999 was not found in the query results"]);
  });

  it("drops cubes whose spectral coverage misses the band", () => {
    const rows = obscoreRows("ASKAP-40000", 197.0, -15.0).map((row) => ({
      ...row,
      em_min: 0.5,
      em_max: 0.6,
    }));
    const covering = obscoreRows("ASKAP-40001", 197.0, -15.0).map((row) => ({
      ...row,
      em_min: 0.2,
      em_max: 0.25,
    }));

    const { candidates } = selectCandidates([...rows, ...covering], cutoutRequest());

    expect(candidates.map((c) => c.observationId)).toEqual(["ASKAP-40001"]);
  });

  it("widens the search by the region radius", () => {
    const rows = obscoreRows("ASKAP-50000", 10, 5);
    const region = { ra: 10, dec: 0, radiusArcmin: 60 };

    expect(selectCandidates(rows, cutoutRequest({ region }), 4.5).candidates).toHaveLength(1);
    expect(selectCandidates(rows, cutoutRequest({ region }), 3.5).candidates).toHaveLength(0);
  });
});

describe("CandidateSelector", () => {
  it("raises NoCandidatesFound when nothing matches", async () => {
    const archive = new FakeArchive();
    archive.rows = obscoreRows("ASKAP-20000", 100.0, 10.0);

    await expect(new CandidateSelector(archive).select(cutoutRequest())).rejects.toBeInstanceOf(
      NoCandidatesFound,
    );
  });

  it("returns the selection with its warnings", async () => {
    const archive = new FakeArchive();
    archive.rows = wallabyRows();

    const selection = await new CandidateSelector(archive).select(
      cutoutRequest({ observationIds: ["10626", "10700"] }),
    );

    expect(selection.candidates.map((c) => c.observationId)).toEqual(["ASKAP-10626"]);
    expect(selection.warnings).toEqual([
      "Requested observation 10700 was not found in the query results",
    ]);
  });
});
