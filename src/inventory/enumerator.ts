/**
 * Build inventory enumerator.
 * Purpose: list every build of a release and whether it uploaded aliyun images.
 * Assumptions: the build index is required (fatal when unavailable); a single build's
 *   manifest failing only marks that build unknown.
 * Usage: const records = await enumerateBuilds({ release, architecture, source, ... }).
 */

import { createInventoryError } from "../core/errors.js";
import type { JsonlLogger } from "../core/logger.js";
import { logPrunerEvent } from "../core/logger.js";
import { mapWithConcurrency } from "../core/pool.js";
import { withRetries, type RetryOptions, type RetryPolicy } from "../core/retry.js";
import type { BuildRecord } from "../core/types.js";

import {
  BuildIndexSchema,
  BuildManifestSchema,
  normalizeBuildIndex,
  type BuildIndexSource,
} from "./build-index.js";

// =============================================================================
// TYPES
// =============================================================================

export type EnumerateOptions = {
  release: string;
  architecture: string;
  source: BuildIndexSource;
  retry: RetryPolicy;
  concurrency: number;
  logger?: JsonlLogger;
  signal?: AbortSignal;
  sleep?: RetryOptions["sleep"];
};

export type EnumerateResult = {
  records: BuildRecord[];
  stopped: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function enumerateBuilds(opts: EnumerateOptions): Promise<EnumerateResult> {
  const retryOptions: RetryOptions = {
    signal: opts.signal,
    sleep: opts.sleep,
    onRetry: (info) => {
      if (opts.logger) {
        logPrunerEvent(opts.logger, "inventory.retry", {
          attempt: info.attempt,
          delay_ms: info.delayMs,
          reason: info.reason,
        });
      }
    },
  };

  const indexResult = await withRetries(
    () => opts.source.fetchBuildIndex(opts.release),
    opts.retry,
    retryOptions,
  );
  if (indexResult.status !== "success") {
    throw createInventoryError(
      `Build index for release ${opts.release} could not be fetched: ${indexResult.reason}`,
    );
  }

  const parsedIndex = BuildIndexSchema.safeParse(indexResult.value);
  if (!parsedIndex.success) {
    throw createInventoryError(
      `Build index for release ${opts.release} has an unexpected shape.`,
      parsedIndex.error,
    );
  }

  const entries = normalizeBuildIndex(parsedIndex.data).filter(
    (entry) => !entry.arches || entry.arches.includes(opts.architecture),
  );

  if (opts.logger) {
    logPrunerEvent(opts.logger, "inventory.index", {
      release: opts.release,
      builds: entries.length,
    });
  }

  const pool = await mapWithConcurrency(
    entries,
    opts.concurrency,
    (entry) => fetchBuildRecord(entry.id, opts, retryOptions),
    { signal: opts.signal },
  );

  const records = pool.results.filter((record): record is BuildRecord => record !== undefined);
  return { records, stopped: pool.stopped };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function fetchBuildRecord(
  buildId: string,
  opts: EnumerateOptions,
  retryOptions: RetryOptions,
): Promise<BuildRecord> {
  const result = await withRetries(
    () => opts.source.fetchBuildManifest(opts.release, buildId, opts.architecture),
    opts.retry,
    retryOptions,
  );

  if (result.status !== "success") {
    return unknownRecord(buildId, result.reason, opts.logger);
  }

  const manifest = BuildManifestSchema.safeParse(result.value);
  if (!manifest.success) {
    return unknownRecord(buildId, "manifest has an unexpected shape", opts.logger);
  }

  const images = (manifest.data.aliyun ?? []).map((entry) => ({
    region: entry.name,
    imageId: entry.id,
  }));

  if (opts.logger) {
    logPrunerEvent(opts.logger, "inventory.build", { buildId, images: images.length });
  }

  return { buildId, inventory: "verified", images };
}

function unknownRecord(buildId: string, reason: string, logger?: JsonlLogger): BuildRecord {
  if (logger) {
    logPrunerEvent(logger, "inventory.build_unknown", { buildId, reason });
  }
  return { buildId, inventory: "unknown", images: [], reason };
}
