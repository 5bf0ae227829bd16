import { describe, expect, it } from "vitest";

import { FakeBuildIndexSource, manifestFor } from "../__tests__/fakes.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { permanentFailure, success, transientFailure } from "../core/retry.js";

import { enumerateBuilds, type EnumerateOptions } from "./enumerator.js";

function options(source: FakeBuildIndexSource, overrides: Partial<EnumerateOptions> = {}): EnumerateOptions {
  return {
    release: "4.14",
    architecture: "x86_64",
    source,
    retry: { maxAttempts: 3, baseDelayMs: 0 },
    concurrency: 3,
    sleep: async () => undefined,
    ...overrides,
  };
}

describe("enumerateBuilds", () => {
  it("produces one record per build in index order", async () => {
    const source = FakeBuildIndexSource.forBuilds({
      "414.92.3": { "us-west-1": "m-3" },
      "414.92.2": null,
      "414.92.1": { "us-west-1": "m-1", "eu-central-1": "m-1eu" },
    });

    const { records, stopped } = await enumerateBuilds(options(source));

    expect(stopped).toBe(false);
    expect(records).toEqual([
      { buildId: "414.92.3", inventory: "verified", images: [{ region: "us-west-1", imageId: "m-3" }] },
      { buildId: "414.92.2", inventory: "verified", images: [] },
      {
        buildId: "414.92.1",
        inventory: "verified",
        images: [
          { region: "us-west-1", imageId: "m-1" },
          { region: "eu-central-1", imageId: "m-1eu" },
        ],
      },
    ]);
  });

  it("drops builds whose arches exclude the target architecture", async () => {
    const source = new FakeBuildIndexSource({
      builds: [
        { id: "414.92.1", arches: ["aarch64"] },
        { id: "414.92.2", arches: ["x86_64", "aarch64"] },
        "414.92.0",
      ],
    })
      .setManifest("414.92.2", manifestFor("414.92.2", null))
      .setManifest("414.92.0", manifestFor("414.92.0", null));

    const { records } = await enumerateBuilds(options(source));

    expect(records.map((record) => record.buildId)).toEqual(["414.92.2", "414.92.0"]);
    expect(source.manifestCalls).not.toContain("414.92.1");
  });

  it("marks a build unknown after its manifest keeps failing", async () => {
    const outage = transientFailure("GET meta.json returned HTTP 503");
    const source = FakeBuildIndexSource.forBuilds({ "414.92.1": null, "414.92.2": null }).setManifest(
      "414.92.2",
      outage,
      outage,
      outage,
    );

    const { records } = await enumerateBuilds(options(source));

    expect(records[0]?.inventory).toBe("verified");
    expect(records[1]).toEqual({
      buildId: "414.92.2",
      inventory: "unknown",
      images: [],
      reason: "GET meta.json returned HTTP 503 (gave up after 3 attempts)",
    });
  });

  it("recovers from a transient manifest failure", async () => {
    const source = new FakeBuildIndexSource({ builds: ["414.92.1"] }).setManifest(
      "414.92.1",
      transientFailure("timeout"),
      success(manifestFor("414.92.1", { "us-west-1": "m-1" })),
    );

    const { records } = await enumerateBuilds(options(source));

    expect(records[0]?.inventory).toBe("verified");
    expect(source.manifestCalls).toEqual(["414.92.1", "414.92.1"]);
  });

  it("marks a malformed manifest unknown", async () => {
    const source = new FakeBuildIndexSource({ builds: ["414.92.1"] }).setManifest(
      "414.92.1",
      permanentFailure("GET meta.json returned malformed JSON"),
    );

    const { records } = await enumerateBuilds(options(source));

    expect(records).toEqual([
      {
        buildId: "414.92.1",
        inventory: "unknown",
        images: [],
        reason: "GET meta.json returned malformed JSON",
      },
    ]);
  });

  it("marks a manifest with an unexpected shape unknown", async () => {
    const source = new FakeBuildIndexSource({ builds: ["414.92.1"] }).setManifest("414.92.1", {
      aliyun: "us-west-1",
    });

    const { records } = await enumerateBuilds(options(source));

    expect(records[0]).toMatchObject({ inventory: "unknown", reason: "manifest has an unexpected shape" });
  });

  it("aborts when the index stays unreachable", async () => {
    const outage = transientFailure("GET builds.json returned HTTP 502");
    const source = FakeBuildIndexSource.forBuilds({ "414.92.1": null }).failIndex(outage, outage, outage);

    const error = await enumerateBuilds(options(source)).catch((err) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).code).toBe(USER_FACING_ERROR_CODES.inventory);
    expect((error as UserFacingError).message).toBe(
      "Build index for release 4.14 could not be fetched: GET builds.json returned HTTP 502 (gave up after 3 attempts)",
    );
    expect(source.indexCalls).toHaveLength(3);
    expect(source.manifestCalls).toEqual([]);
  });

  it("aborts on an index document of unknown shape", async () => {
    const source = new FakeBuildIndexSource({ releases: [] });

    await expect(enumerateBuilds(options(source))).rejects.toMatchObject({
      code: USER_FACING_ERROR_CODES.inventory,
      message: "Build index for release 4.14 has an unexpected shape.",
    });
  });
});
