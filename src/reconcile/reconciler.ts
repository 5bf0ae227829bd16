/**
 * Reconciler.
 * Purpose: drive each (build, region, image) triple's tag, visibility and existence toward
 *   its disposition, recording every transition in the checkpoint store.
 * Assumptions: one build's triples run sequentially (single writer per checkpoint entry);
 *   unknown dispositions never touch the cloud; dry-run performs no mutating call.
 * Usage: const outcome = await new Reconciler({ api, store, retry, dryRun }).reconcileBuild(job).
 */

import type {
  CheckpointEntry,
  CheckpointStore,
  ImageCheckpoint,
  ImageCheckpointUpdate,
  StepMarker,
} from "../checkpoint/checkpoint-store.js";
import type { CloudImageApi } from "../cloud/image-api.js";
import { isoNow } from "../core/clock.js";
import type { JsonlLogger } from "../core/logger.js";
import { logPrunerEvent, type JsonObject } from "../core/logger.js";
import {
  success,
  withRetries,
  type RemoteFailure,
  type RemoteResult,
  type RetryOptions,
  type RetryPolicy,
} from "../core/retry.js";
import type { Disposition, ImageRef } from "../core/types.js";
import { BOOTIMAGE_TAG_KEY, bootimageTagValue } from "../core/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReconcileJob = {
  buildId: string;
  disposition: Disposition;
  images: readonly ImageRef[];
  reason?: string;
};

export type TripleOutcome =
  | { kind: "kept"; image: ImageRef }
  | { kind: "pruned"; image: ImageRef }
  | { kind: "resumed"; image: ImageRef }
  | { kind: "failed"; image: ImageRef; failure: string }
  | { kind: "stopped"; image: ImageRef };

export type BuildOutcome = {
  buildId: string;
  disposition: Disposition;
  triples: TripleOutcome[];
  review?: string;
};

export type MutationKind = "tag" | "make-private" | "delete";

export type SimulatedAction = {
  buildId: string;
  region: string;
  imageId: string;
  action: MutationKind;
  detail?: string;
};

export type ReconcilerOptions = {
  api: CloudImageApi;
  store: CheckpointStore;
  retry: RetryPolicy;
  dryRun: boolean;
  logger?: JsonlLogger;
  signal?: AbortSignal;
  sleep?: RetryOptions["sleep"];
  now?: () => string;
  onSimulated?: (action: SimulatedAction) => void;
};

type StepUpdate = Omit<ImageCheckpointUpdate, "region" | "image_id" | "mode">;

const DEFAULT_REVIEW_REASON = "inventory data incomplete";

// =============================================================================
// RECONCILER
// =============================================================================

export class Reconciler {
  private readonly now: () => string;

  constructor(private readonly opts: ReconcilerOptions) {
    this.now = opts.now ?? isoNow;
  }

  async reconcileBuild(job: ReconcileJob): Promise<BuildOutcome> {
    if (job.disposition === "unknown") {
      const review = job.reason ?? DEFAULT_REVIEW_REASON;
      await this.opts.store.upsert(job.buildId, { disposition: "unknown", review });
      this.log("reconcile.review", { buildId: job.buildId, reason: review });
      return { buildId: job.buildId, disposition: "unknown", triples: [], review };
    }

    const entry = this.opts.store.get(job.buildId);
    if (entry?.review !== undefined) {
      await this.opts.store.upsert(job.buildId, { disposition: job.disposition, review: undefined });
    }

    const triples: TripleOutcome[] = [];
    for (const image of job.images) {
      if (this.stopped()) {
        triples.push({ kind: "stopped", image });
        continue;
      }
      triples.push(await this.reconcileTriple(job.buildId, job.disposition, image));
    }

    return { buildId: job.buildId, disposition: job.disposition, triples };
  }

  // ===========================================================================
  // TRIPLE STATE MACHINE
  // ===========================================================================

  private async reconcileTriple(
    buildId: string,
    target: Exclude<Disposition, "unknown">,
    image: ImageRef,
  ): Promise<TripleOutcome> {
    const { api } = this.opts;
    const { imageId, region } = image;

    const entry = this.opts.store.get(buildId);
    if (isSettled(entry, findImage(entry, image), target)) {
      this.log("reconcile.resumed", { buildId, region, image_id: imageId });
      return { kind: "resumed", image };
    }

    const record = (update: StepUpdate): Promise<CheckpointEntry> =>
      this.opts.store.upsert(buildId, {
        disposition: target,
        images: [{ region, image_id: imageId, mode: this.mode(), ...update }],
      });

    const described = await this.call(buildId, image, () => api.describeImage(imageId, region));
    if (described.status !== "success") {
      return this.fail(buildId, target, image, described);
    }
    const remote = described.value;

    if (!remote.exists) {
      if (target === "keep") {
        return this.fail(buildId, target, image, {
          status: "permanent-failure",
          reason: "image-not-found",
          notFound: true,
        });
      }
      this.log("reconcile.absent", { buildId, region, image_id: imageId });
      await record({ state: "done", deleted: this.marker(), failure: undefined });
      return { kind: "pruned", image };
    }

    // Tag.
    const tagValue = bootimageTagValue(target);
    if (remote.tags[BOOTIMAGE_TAG_KEY] === tagValue) {
      this.log("reconcile.tag_skipped", { buildId, region, image_id: imageId, value: tagValue });
    } else {
      if (this.stopped()) return { kind: "stopped", image };
      const tagged = await this.mutate(buildId, image, "tag", `${BOOTIMAGE_TAG_KEY}=${tagValue}`, () =>
        api.tagImage(imageId, region, BOOTIMAGE_TAG_KEY, tagValue),
      );
      if (tagged.status !== "success") {
        return this.fail(buildId, target, image, tagged);
      }
    }
    await record({ state: "tag-applied", tag_applied: this.marker(), failure: undefined });

    if (target === "keep") {
      await record({ state: "done" });
      return { kind: "kept", image };
    }

    // Visibility. Shared images cannot be deleted, so they are made private first.
    await record({ state: "visibility-checked" });
    if (remote.isPublic) {
      if (this.stopped()) return { kind: "stopped", image };
      const hidden = await this.mutate(buildId, image, "make-private", undefined, () =>
        api.setImageVisibility(imageId, region, false),
      );
      if (hidden.status !== "success") {
        return this.fail(buildId, target, image, hidden);
      }
      await record({ state: "made-private", visibility_set: this.marker() });
    }

    // Delete.
    if (this.stopped()) return { kind: "stopped", image };
    const deleted = await this.mutate(buildId, image, "delete", undefined, async () => {
      const res = await api.deleteImage(imageId, region);
      return res.status === "permanent-failure" && res.notFound ? success(undefined) : res;
    });
    if (deleted.status !== "success") {
      return this.fail(buildId, target, image, deleted);
    }
    await record({ state: "deleted", deleted: this.marker() });
    await record({ state: "done" });

    return { kind: "pruned", image };
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async mutate(
    buildId: string,
    image: ImageRef,
    action: MutationKind,
    detail: string | undefined,
    operation: () => Promise<RemoteResult<void>>,
  ): Promise<RemoteResult<void>> {
    if (this.opts.dryRun) {
      const simulated: SimulatedAction = {
        buildId,
        region: image.region,
        imageId: image.imageId,
        action,
        ...(detail ? { detail } : {}),
      };
      this.log("reconcile.simulated", {
        buildId,
        region: image.region,
        image_id: image.imageId,
        action,
        ...(detail ? { detail } : {}),
      });
      this.opts.onSimulated?.(simulated);
      return success(undefined);
    }

    const result = await this.call(buildId, image, operation);
    if (result.status === "success") {
      this.log(`reconcile.${action.replace("-", "_")}`, {
        buildId,
        region: image.region,
        image_id: image.imageId,
        ...(detail ? { detail } : {}),
      });
    }
    return result;
  }

  private call<T>(
    buildId: string,
    image: ImageRef,
    operation: () => Promise<RemoteResult<T>>,
  ): Promise<RemoteResult<T>> {
    return withRetries(operation, this.opts.retry, {
      signal: this.opts.signal,
      sleep: this.opts.sleep,
      onRetry: (info) =>
        this.log("reconcile.retry", {
          buildId,
          region: image.region,
          image_id: image.imageId,
          attempt: info.attempt,
          delay_ms: info.delayMs,
          reason: info.reason,
        }),
    });
  }

  private async fail(
    buildId: string,
    target: Exclude<Disposition, "unknown">,
    image: ImageRef,
    result: RemoteFailure,
  ): Promise<TripleOutcome> {
    // Retries cut short by the stop signal leave the triple where it was for the next run.
    if (result.status === "transient-failure" && this.stopped()) {
      this.log("reconcile.interrupted", {
        buildId,
        region: image.region,
        image_id: image.imageId,
        reason: result.reason,
      });
      return { kind: "stopped", image };
    }

    const failure = `failed:${result.reason}`;
    await this.opts.store.upsert(buildId, {
      disposition: target,
      images: [
        { region: image.region, image_id: image.imageId, mode: this.mode(), state: "failed", failure },
      ],
    });
    this.log("reconcile.failed", {
      buildId,
      region: image.region,
      image_id: image.imageId,
      failure,
      transient: result.status === "transient-failure",
    });
    return { kind: "failed", image, failure };
  }

  private marker(): StepMarker {
    return { mode: this.mode(), at: this.now() };
  }

  private mode(): "applied" | "simulated" {
    return this.opts.dryRun ? "simulated" : "applied";
  }

  private stopped(): boolean {
    return this.opts.signal?.aborted ?? false;
  }

  private log(type: string, payload: JsonObject): void {
    if (this.opts.logger) {
      logPrunerEvent(this.opts.logger, type, payload);
    }
  }
}

// =============================================================================
// CHECKPOINT QUERIES
// =============================================================================

export function findImage(
  entry: CheckpointEntry | undefined,
  image: ImageRef,
): ImageCheckpoint | undefined {
  return entry?.images.find(
    (candidate) => candidate.region === image.region && candidate.image_id === image.imageId,
  );
}

// A triple is settled when a real (non-simulated) run finished it for the same disposition.
export function isSettled(
  entry: CheckpointEntry | undefined,
  image: ImageCheckpoint | undefined,
  target: Disposition,
): boolean {
  if (!entry || !image || entry.disposition !== target || image.mode !== "applied") {
    return false;
  }
  return image.state === "done" || (target === "prune" && image.state === "deleted");
}
