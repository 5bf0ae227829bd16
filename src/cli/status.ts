import path from "node:path";

import fse from "fs-extra";

import { CheckpointStore } from "../checkpoint/checkpoint-store.js";
import { summarizeCheckpoint, type CheckpointSummary } from "../checkpoint/summary.js";

import { defaultCheckpointPath } from "./config.js";

export async function statusCommand(
  release: string,
  opts: { checkpointPath?: string; cwd?: string },
): Promise<CheckpointSummary | null> {
  const cwd = opts.cwd ?? process.cwd();
  const checkpointPath = opts.checkpointPath
    ? path.resolve(cwd, opts.checkpointPath)
    : defaultCheckpointPath(release, cwd);

  if (!(await fse.pathExists(checkpointPath))) {
    printCheckpointNotFound(release, checkpointPath);
    return null;
  }

  const store = new CheckpointStore(checkpointPath, { release });
  const summary = summarizeCheckpoint(await store.load());

  printCheckpointSummary(release, checkpointPath, summary);
  return summary;
}

function printCheckpointNotFound(release: string, checkpointPath: string): void {
  console.log(`No checkpoint found for release ${release} at ${checkpointPath}.`);
  console.log(`Start a run with: bootimage-pruner prune ${release} --dry-run`);
  process.exitCode = 1;
}

function printCheckpointSummary(
  release: string,
  checkpointPath: string,
  summary: CheckpointSummary,
): void {
  console.log(`Release: ${release}`);
  console.log(`Checkpoint: ${checkpointPath}`);
  console.log("");
  console.log(formatDispositionCounts(summary));
  console.log(formatStateCounts(summary));
  if (summary.simulated > 0) {
    console.log(`Simulated (dry-run) images: ${summary.simulated}`);
  }
  console.log("");

  console.log("Review:");
  if (summary.review.length === 0) {
    console.log("  (none)");
  }
  for (const item of summary.review) {
    console.log(`  ${item.buildId}: ${item.reason}`);
  }

  console.log("Failed:");
  if (summary.failures.length === 0) {
    console.log("  (none)");
  }
  for (const failure of summary.failures) {
    console.log(`  ${failure.buildId} ${failure.region}/${failure.imageId}: ${failure.failure}`);
  }
}

function formatDispositionCounts(summary: CheckpointSummary): string {
  const counts = summary.dispositions;
  const parts = [
    `total=${summary.builds}`,
    `keep=${counts.keep}`,
    `prune=${counts.prune}`,
    `unknown=${counts.unknown}`,
  ];
  return `Builds: ${parts.join("  ")}`;
}

function formatStateCounts(summary: CheckpointSummary): string {
  const parts = Object.entries(summary.states).map(([state, count]) => `${state}=${count}`);
  return `Images: ${parts.length > 0 ? parts.join("  ") : "(none)"}`;
}
