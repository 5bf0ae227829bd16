import type { CheckpointEntry, TripleState } from "./checkpoint-store.js";

export type CheckpointSummary = {
  builds: number;
  dispositions: Record<CheckpointEntry["disposition"], number>;
  states: Partial<Record<TripleState, number>>;
  simulated: number;
  review: Array<{ buildId: string; reason: string }>;
  failures: Array<{ buildId: string; region: string; imageId: string; failure: string }>;
};

export function summarizeCheckpoint(entries: ReadonlyMap<string, CheckpointEntry>): CheckpointSummary {
  const summary: CheckpointSummary = {
    builds: entries.size,
    dispositions: { keep: 0, prune: 0, unknown: 0 },
    states: {},
    simulated: 0,
    review: [],
    failures: [],
  };

  const buildIds = [...entries.keys()].sort();
  for (const buildId of buildIds) {
    const entry = entries.get(buildId);
    if (!entry) continue;

    summary.dispositions[entry.disposition] += 1;
    if (entry.review !== undefined) {
      summary.review.push({ buildId, reason: entry.review });
    }

    for (const image of entry.images) {
      summary.states[image.state] = (summary.states[image.state] ?? 0) + 1;
      if (image.mode === "simulated") summary.simulated += 1;
      if (image.state === "failed") {
        summary.failures.push({
          buildId,
          region: image.region,
          imageId: image.image_id,
          failure: image.failure ?? "failed",
        });
      }
    }
  }

  return summary;
}
