import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { CheckpointStore } from "./checkpoint-store.js";
import { summarizeCheckpoint } from "./summary.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const NOW = "2024-02-01T12:00:00.000Z";
const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeCheckpointPath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "checkpoint-store-"));
  tempDirs.push(dir);
  return path.join(dir, "state", "checkpoint-4.14.json");
}

function readFile(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, "utf8"));
}

// =============================================================================
// TESTS
// =============================================================================

describe("CheckpointStore.load", () => {
  it("returns an empty map when the file is absent", async () => {
    const filePath = makeCheckpointPath();
    const store = new CheckpointStore(filePath, { release: "4.14" });

    const entries = await store.load();

    expect(entries.size).toBe(0);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("rejects a file that is not JSON", async () => {
    const filePath = makeCheckpointPath();
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "{ not json", "utf8");

    const error = await new CheckpointStore(filePath, { release: "4.14" }).load().catch((err) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).code).toBe(USER_FACING_ERROR_CODES.checkpoint);
    expect((error as UserFacingError).message).toContain("not valid JSON");
  });

  it("rejects a file with an unexpected shape", async () => {
    const filePath = makeCheckpointPath();
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      JSON.stringify({ schema_version: 1, builds: { "414.90.0": { disposition: "maybe" } } }),
      "utf8",
    );

    const error = await new CheckpointStore(filePath, { release: "4.14" }).load().catch((err) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).message).toMatch(
      new RegExp(`^Cannot use checkpoint ${escapeRegExp(filePath)}: unexpected format at builds\\.414\\.90\\.0\\.`),
    );
  });

  it("rejects a checkpoint written for another release", async () => {
    const filePath = makeCheckpointPath();
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      JSON.stringify({ schema_version: 1, release: "4.13", builds: {} }),
      "utf8",
    );

    const error = await new CheckpointStore(filePath, { release: "4.14" }).load().catch((err) => err);

    expect((error as UserFacingError).message).toBe(
      `Cannot use checkpoint ${filePath}: it belongs to release 4.13, not 4.14`,
    );
  });
});

describe("CheckpointStore.upsert", () => {
  it("writes the document durably before resolving", async () => {
    const filePath = makeCheckpointPath();
    const store = new CheckpointStore(filePath, { release: "4.14", now: () => NOW });

    await store.upsert("414.90.0", {
      disposition: "prune",
      images: [{ region: "us-west-1", image_id: "m-old", state: "tag-applied" }],
    });

    expect(readFile(filePath)).toEqual({
      schema_version: 1,
      release: "4.14",
      updated_at: NOW,
      builds: {
        "414.90.0": {
          disposition: "prune",
          images: [
            {
              region: "us-west-1",
              image_id: "m-old",
              state: "tag-applied",
              mode: "applied",
              updated_at: NOW,
            },
          ],
          updated_at: NOW,
        },
      },
    });
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["checkpoint-4.14.json"]);
  });

  it("merges image updates by region and image id", async () => {
    const filePath = makeCheckpointPath();
    const store = new CheckpointStore(filePath, { release: "4.14", now: () => NOW });

    await store.upsert("414.90.0", {
      disposition: "prune",
      images: [
        { region: "us-west-1", image_id: "m-old", state: "tag-applied" },
        { region: "eu-central-1", image_id: "m-eu", state: "unreconciled" },
      ],
    });
    const entry = await store.upsert("414.90.0", {
      images: [{ region: "us-west-1", image_id: "m-old", state: "done" }],
    });

    expect(entry.disposition).toBe("prune");
    expect(entry.images.map((image) => [image.image_id, image.state])).toEqual([
      ["m-old", "done"],
      ["m-eu", "unreconciled"],
    ]);
  });

  it("preserves unknown fields across a load/upsert cycle", async () => {
    const filePath = makeCheckpointPath();
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        schema_version: 1,
        release: "4.14",
        operator: "night-shift",
        builds: {
          "414.90.0": {
            disposition: "prune",
            ticket: "OPS-1",
            images: [
              {
                region: "us-west-1",
                image_id: "m-old",
                state: "tag-applied",
                mode: "applied",
                snapshot_id: "s-1",
                updated_at: "2024-01-01T00:00:00.000Z",
              },
            ],
            updated_at: "2024-01-01T00:00:00.000Z",
          },
        },
      }),
      "utf8",
    );

    const store = new CheckpointStore(filePath, { release: "4.14", now: () => NOW });
    await store.load();
    await store.upsert("414.90.0", {
      images: [{ region: "us-west-1", image_id: "m-old", state: "done" }],
    });

    const reloaded = await new CheckpointStore(filePath, { release: "4.14" }).load();
    const entry = reloaded.get("414.90.0");

    expect(readFile(filePath)).toMatchObject({ operator: "night-shift" });
    expect(entry).toMatchObject({ ticket: "OPS-1", disposition: "prune" });
    expect(entry?.images[0]).toMatchObject({ snapshot_id: "s-1", state: "done", updated_at: NOW });
  });

  it("clears a review flag when the update carries review undefined", async () => {
    const store = new CheckpointStore(makeCheckpointPath(), { release: "4.14", now: () => NOW });

    await store.upsert("414.91.0", { disposition: "unknown", review: "manifest missing" });
    const entry = await store.upsert("414.91.0", { disposition: "keep", review: undefined });

    expect(entry.review).toBeUndefined();
    expect(entry.disposition).toBe("keep");
  });

  it("keeps concurrent upserts of different builds", async () => {
    const filePath = makeCheckpointPath();
    const store = new CheckpointStore(filePath, { release: "4.14", now: () => NOW });

    await Promise.all(
      ["a", "b", "c", "d"].map((id) => store.upsert(`414.90.${id}`, { disposition: "prune" })),
    );
    await store.flush();

    const reloaded = await new CheckpointStore(filePath, { release: "4.14" }).load();
    expect([...reloaded.keys()].sort()).toEqual(["414.90.a", "414.90.b", "414.90.c", "414.90.d"]);
  });
});

describe("summarizeCheckpoint", () => {
  it("counts dispositions and states and lists review and failures", async () => {
    const store = new CheckpointStore(makeCheckpointPath(), { release: "4.14", now: () => NOW });
    await store.upsert("414.92.1", {
      disposition: "keep",
      images: [{ region: "us-west-1", image_id: "m-keep", state: "done" }],
    });
    await store.upsert("414.90.0", {
      disposition: "prune",
      images: [
        { region: "us-west-1", image_id: "m-old", state: "failed", failure: "failed:DeleteImage: Forbidden" },
        { region: "eu-central-1", image_id: "m-eu", state: "done", mode: "simulated" },
      ],
    });
    await store.upsert("414.91.0", { disposition: "unknown", review: "manifest missing" });

    const summary = summarizeCheckpoint(store.entries());

    expect(summary).toEqual({
      builds: 3,
      dispositions: { keep: 1, prune: 1, unknown: 1 },
      states: { failed: 1, done: 2 },
      simulated: 1,
      review: [{ buildId: "414.91.0", reason: "manifest missing" }],
      failures: [
        {
          buildId: "414.90.0",
          region: "us-west-1",
          imageId: "m-old",
          failure: "failed:DeleteImage: Forbidden",
        },
      ],
    });
  });
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
