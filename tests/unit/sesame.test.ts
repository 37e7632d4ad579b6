import { describe, expect, it } from "vitest";
import { parseSesameResponse, SesameNameResolver } from "../../src/services/sesame.service";
import { NameResolutionError } from "../../src/utils/errors";
import { createFakeHttp, networkError } from "../helpers/http";

const FOUND = [
  "# Test Group 1\t#Q1234",
  "#=S=Simbad (via url):    1",
  "%@ 123",
  "%I.0 Test Group 1",
  "%C.0 GrG",
  "%J 197.24113 -15.51682 = 13:08:57.87 -15:31:00.5",
  "%J.E [86.40 86.40 0] A 2020yCat.1350....0G",
  "#B 12",
  "",
].join("\n");

describe("parseSesameResponse", () => {
  it("reads the J2000 position", () => {
    expect(parseSesameResponse(FOUND)).toEqual({ ra: 197.24113, dec: -15.51682 });
  });

  it("returns null when no service knows the name", () => {
    expect(parseSesameResponse("# Nowhere\n#! *** Nothing found *** \n")).toBeNull();
  });

  it("returns null for an impossible declination", () => {
    expect(parseSesameResponse("%J 10.0 -95.0\n")).toBeNull();
  });
});

describe("SesameNameResolver", () => {
  it("queries the service with the encoded name", async () => {
    const { http, requests } = createFakeHttp(() => ({ data: FOUND }));
    const resolver = new SesameNameResolver("https://sesame.test/nph-sesame/", 1000, http);

    await expect(resolver.resolve(" Test Group 1 ")).resolves.toEqual({
      ra: 197.24113,
      dec: -15.51682,
    });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("https://sesame.test/nph-sesame/-oI/A?Test%20Group%201");
  });

  it("reports unknown names without retrying", async () => {
    const { http, requests } = createFakeHttp(() => ({ data: "#! *** Nothing found ***\n" }));
    const resolver = new SesameNameResolver("https://sesame.test/nph-sesame", 1000, http);

    await expect(resolver.resolve("Nowhere")).rejects.toThrow(
      new NameResolutionError('Unknown source name "Nowhere"'),
    );
    expect(requests).toHaveLength(1);
  });

  it("wraps transport failures", async () => {
    const { http } = createFakeHttp(() => {
      throw networkError("ECONNREFUSED");
    });
    const resolver = new SesameNameResolver("https://sesame.test/nph-sesame", 1000, http);

    await expect(resolver.resolve("Test Group 1")).rejects.toBeInstanceOf(NameResolutionError);
  });
});
