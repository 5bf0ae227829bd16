/**
 * Checkpoint store.
 * Purpose: durable per-build record of dispositions and per-image reconciliation progress.
 * Assumptions: one process owns the file; fields written by newer versions are carried
 *   through untouched; every upsert is on disk (temp file + rename) before it resolves.
 * Usage: const store = new CheckpointStore(path, { release }); await store.load();
 *   await store.upsert(buildId, { disposition, images: [...] }).
 */

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { isoNow } from "../core/clock.js";
import { createCheckpointError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import type { Disposition } from "../core/types.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const CHECKPOINT_SCHEMA_VERSION = 1;

export const TripleStateSchema = z.enum([
  "unreconciled",
  "tag-applied",
  "visibility-checked",
  "made-private",
  "deleted",
  "done",
  "failed",
]);

export const MarkerModeSchema = z.enum(["applied", "simulated"]);

export const StepMarkerSchema = z
  .object({
    mode: MarkerModeSchema,
    at: z.string(),
  })
  .passthrough();

export const ImageCheckpointSchema = z
  .object({
    region: z.string().min(1),
    image_id: z.string().min(1),
    state: TripleStateSchema,
    mode: MarkerModeSchema,
    tag_applied: StepMarkerSchema.optional(),
    visibility_set: StepMarkerSchema.optional(),
    deleted: StepMarkerSchema.optional(),
    failure: z.string().optional(),
    updated_at: z.string(),
  })
  .passthrough();

export const CheckpointEntrySchema = z
  .object({
    disposition: z.enum(["keep", "prune", "unknown"]),
    images: z.array(ImageCheckpointSchema),
    review: z.string().optional(),
    updated_at: z.string(),
  })
  .passthrough();

export const CheckpointFileSchema = z
  .object({
    schema_version: z.literal(CHECKPOINT_SCHEMA_VERSION),
    release: z.string().optional(),
    updated_at: z.string().optional(),
    builds: z.record(CheckpointEntrySchema),
  })
  .passthrough();

export type TripleState = z.infer<typeof TripleStateSchema>;
export type MarkerMode = z.infer<typeof MarkerModeSchema>;
export type StepMarker = z.infer<typeof StepMarkerSchema>;
export type ImageCheckpoint = z.infer<typeof ImageCheckpointSchema>;
export type CheckpointEntry = z.infer<typeof CheckpointEntrySchema>;
export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

export type ImageCheckpointUpdate = {
  region: string;
  image_id: string;
  state?: TripleState;
  mode?: MarkerMode;
  tag_applied?: StepMarker;
  visibility_set?: StepMarker;
  deleted?: StepMarker;
  failure?: string;
};

export type CheckpointEntryUpdate = {
  disposition?: Disposition;
  review?: string;
  images?: ImageCheckpointUpdate[];
};

// =============================================================================
// STORE
// =============================================================================

export type CheckpointStoreOptions = {
  release: string;
  now?: () => string;
};

export class CheckpointStore {
  private readonly release: string;
  private readonly now: () => string;
  private document: CheckpointFile;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    options: CheckpointStoreOptions,
  ) {
    this.release = options.release;
    this.now = options.now ?? isoNow;
    this.document = { schema_version: CHECKPOINT_SCHEMA_VERSION, release: this.release, builds: {} };
  }

  async load(): Promise<Map<string, CheckpointEntry>> {
    const exists = await fse.pathExists(this.filePath);
    if (!exists) {
      return new Map();
    }

    let raw: unknown;
    try {
      raw = await fse.readJson(this.filePath);
    } catch (err) {
      throw createCheckpointError(this.filePath, `not valid JSON (${formatErrorMessage(err)})`, err);
    }

    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw createCheckpointError(
        this.filePath,
        `unexpected format${where}: ${issue?.message ?? "invalid"}`,
        parsed.error,
      );
    }

    if (parsed.data.release !== undefined && parsed.data.release !== this.release) {
      throw createCheckpointError(
        this.filePath,
        `it belongs to release ${parsed.data.release}, not ${this.release}`,
      );
    }

    this.document = parsed.data;
    return this.entries();
  }

  entries(): Map<string, CheckpointEntry> {
    return new Map(Object.entries(this.document.builds));
  }

  get(buildId: string): CheckpointEntry | undefined {
    return this.document.builds[buildId];
  }

  // Merges the update into the stored entry and resolves once the whole document is on disk.
  upsert(buildId: string, update: CheckpointEntryUpdate): Promise<CheckpointEntry> {
    const at = this.now();
    const existing = this.document.builds[buildId];
    const images = mergeImages(existing?.images ?? [], update.images ?? [], at);

    const next: CheckpointEntry = {
      ...existing,
      disposition: update.disposition ?? existing?.disposition ?? "unknown",
      images,
      updated_at: at,
    };
    if ("review" in update) {
      next.review = update.review;
    }

    this.document = {
      ...this.document,
      release: this.document.release ?? this.release,
      updated_at: at,
      builds: { ...this.document.builds, [buildId]: next },
    };

    const snapshot = this.document;
    const write = this.writeChain.then(() => this.writeDocument(snapshot));
    // Keep the chain alive after a failed write; the failure still reaches this caller.
    this.writeChain = write.catch(() => undefined);
    return write.then(() => next);
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }

  private async writeDocument(document: CheckpointFile): Promise<void> {
    const tmpPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.tmp`,
    );
    await fse.outputJson(tmpPath, document, { spaces: 2 });
    await fse.move(tmpPath, this.filePath, { overwrite: true });
  }
}

function mergeImages(
  existing: ImageCheckpoint[],
  updates: ImageCheckpointUpdate[],
  at: string,
): ImageCheckpoint[] {
  const merged = [...existing];

  for (const update of updates) {
    const index = merged.findIndex(
      (image) => image.region === update.region && image.image_id === update.image_id,
    );
    const current = index >= 0 ? merged[index] : undefined;
    const next: ImageCheckpoint = {
      ...current,
      ...update,
      state: update.state ?? current?.state ?? "unreconciled",
      mode: update.mode ?? current?.mode ?? "applied",
      updated_at: at,
    };

    if (index >= 0) {
      merged[index] = next;
    } else {
      merged.push(next);
    }
  }

  return merged;
}
