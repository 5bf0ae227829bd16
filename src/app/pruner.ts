/**
 * Pruning run driver.
 * Purpose: wire history, inventory, classification and reconciliation into one run.
 * Assumptions: shared-input failures (checkpoint, history, schema, index) throw
 *   UserFacingError before any cloud call; per-triple failures only reach the result.
 * Usage: const result = await runPrune(buildPrunerContext({ config, signal })).
 */

import { classifyDisposition, dispositionTargets } from "../classify/disposition.js";
import { releaseBranch } from "../core/config.js";
import { SchemaUnsupportedError, createSchemaUnsupportedError } from "../core/errors.js";
import { logPrunerEvent, type JsonlLogger } from "../core/logger.js";
import { mapWithConcurrency } from "../core/pool.js";
import type { RetryPolicy } from "../core/retry.js";
import type { Disposition, ImageRef, ProtectedSet } from "../core/types.js";
import { enumerateBuilds } from "../inventory/enumerator.js";
import { extractSnapshots } from "../metadata/extractor.js";
import { buildProtectedSet } from "../metadata/protected-set.js";
import {
  Reconciler,
  type BuildOutcome,
  type ReconcileJob,
  type SimulatedAction,
} from "../reconcile/reconciler.js";

import type { PrunerContext } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type PruneSummary = {
  builds: number;
  protectedBuilds: number;
  kept: number;
  pruned: number;
  unknown: number;
  failed: number;
  resumed: number;
  noImage: number;
  // Triples left mid-way and builds never started after a stop signal.
  interrupted: number;
  notStarted: number;
};

export type TripleFailure = ImageRef & { buildId: string; failure: string };

export type ReviewItem = { buildId: string; reason: string };

export type PruneRunResult = {
  runId: string;
  release: string;
  dryRun: boolean;
  stopped: boolean;
  checkpointPath: string;
  logPath: string;
  summary: PruneSummary;
  simulated: SimulatedAction[];
  failures: TripleFailure[];
  review: ReviewItem[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPrune(context: PrunerContext): Promise<PruneRunResult> {
  const { config, ports, signal, runId } = context;
  const now = (): string => ports.clock.isoNow();
  const logger = ports.logSink.createLogger(config.log_path, {
    runId,
    mirror: context.debugSink,
    now,
  });
  const retry: RetryPolicy = {
    maxAttempts: config.retry.max_attempts,
    baseDelayMs: config.retry.base_delay_ms,
  };

  logPrunerEvent(logger, "run.start", {
    release: config.release,
    dry_run: config.dry_run,
    checkpoint_path: config.checkpoint_path,
    concurrency: config.concurrency,
  });

  const result: PruneRunResult = {
    runId,
    release: config.release,
    dryRun: config.dry_run,
    stopped: false,
    checkpointPath: config.checkpoint_path,
    logPath: config.log_path,
    summary: {
      builds: 0,
      protectedBuilds: 0,
      kept: 0,
      pruned: 0,
      unknown: 0,
      failed: 0,
      resumed: 0,
      noImage: 0,
      interrupted: 0,
      notStarted: 0,
    },
    simulated: [],
    failures: [],
    review: [],
  };

  const store = ports.checkpointRepository.create(config.checkpoint_path, {
    release: config.release,
    now,
  });
  const checkpoint = await store.load();
  logPrunerEvent(logger, "checkpoint.loaded", { builds: checkpoint.size });

  // Protection comes first: nothing is enumerated or touched with a partial protected set.
  const protectedSet = await loadProtectedSet(context, logger);
  result.summary.protectedBuilds = protectedSet.ids.size;
  if (signal?.aborted) {
    return finishStopped(result, logger, "history");
  }

  const inventory = await enumerateBuilds({
    release: config.release,
    architecture: config.architecture,
    source: ports.inventory.create(config),
    retry,
    concurrency: config.concurrency,
    logger,
    signal,
    sleep: ports.sleep,
  });
  result.summary.builds = inventory.records.length;
  if (inventory.stopped) {
    return finishStopped(result, logger, "inventory");
  }

  // =============================================================================
  // CLASSIFY
  // =============================================================================

  const jobs: ReconcileJob[] = [];
  for (const record of inventory.records) {
    const disposition: Disposition = classifyDisposition(record, protectedSet);
    const images = dispositionTargets(record, disposition, protectedSet);
    logPrunerEvent(logger, "classify.build", {
      buildId: record.buildId,
      disposition,
      images: images.length,
    });

    if (disposition !== "unknown" && images.length === 0) {
      result.summary.noImage += 1;
      continue;
    }
    jobs.push({
      buildId: record.buildId,
      disposition,
      images,
      ...(record.reason ? { reason: record.reason } : {}),
    });
  }

  // =============================================================================
  // RECONCILE
  // =============================================================================

  const reconciler = new Reconciler({
    api: ports.cloud.create(config),
    store,
    retry,
    dryRun: config.dry_run,
    logger,
    signal,
    sleep: ports.sleep,
    now,
    onSimulated: (action) => result.simulated.push(action),
  });

  const pool = await mapWithConcurrency(
    jobs,
    config.concurrency,
    (job) => reconciler.reconcileBuild(job),
    { signal },
  );
  await store.flush();

  for (const outcome of pool.results) {
    if (outcome) tallyOutcome(result, outcome);
  }
  result.summary.notStarted = jobs.length - pool.started;
  result.stopped = pool.stopped || result.summary.interrupted > 0;

  logPrunerEvent(logger, result.stopped ? "run.stopped" : "run.complete", {
    ...result.summary,
    failures: result.failures.length,
  });
  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function loadProtectedSet(context: PrunerContext, logger: JsonlLogger): Promise<ProtectedSet> {
  const { config, ports, signal } = context;
  const branch = releaseBranch(config.release);
  const history = await ports.history.open({
    repoUrl: config.installer_repo,
    branch,
    metadataPaths: config.metadata_paths,
    logger,
  });

  try {
    const revisions = await history.listRevisions(branch);
    const protectedSet = await buildProtectedSet(
      extractSnapshots(revisions, (revision) => history.fetchMetadataAt(revision), {
        architecture: config.architecture,
        logger,
        signal,
      }),
    );
    logPrunerEvent(logger, "history.protected", {
      revisions: revisions.length,
      snapshots: protectedSet.revisionsSeen,
      builds: protectedSet.ids.size,
    });
    return protectedSet;
  } catch (err) {
    if (err instanceof SchemaUnsupportedError) {
      throw createSchemaUnsupportedError(err);
    }
    throw err;
  } finally {
    await history.close();
  }
}

function tallyOutcome(result: PruneRunResult, outcome: BuildOutcome): void {
  if (outcome.disposition === "unknown") {
    result.summary.unknown += 1;
    result.review.push({ buildId: outcome.buildId, reason: outcome.review ?? "" });
    return;
  }

  for (const triple of outcome.triples) {
    switch (triple.kind) {
      case "kept":
        result.summary.kept += 1;
        break;
      case "pruned":
        result.summary.pruned += 1;
        break;
      case "resumed":
        result.summary.resumed += 1;
        break;
      case "failed":
        result.summary.failed += 1;
        result.failures.push({ buildId: outcome.buildId, ...triple.image, failure: triple.failure });
        break;
      case "stopped":
        result.summary.interrupted += 1;
        break;
    }
  }
}

function finishStopped(result: PruneRunResult, logger: JsonlLogger, phase: string): PruneRunResult {
  logPrunerEvent(logger, "run.stopped", { phase });
  return { ...result, stopped: true };
}
