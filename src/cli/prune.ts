import { buildPrunerContext, type PrunerPorts } from "../app/context.js";
import { runPrune, type PruneRunResult } from "../app/pruner.js";
import { defaultRunId } from "../core/clock.js";
import type { SimulatedAction } from "../reconcile/reconciler.js";

import { loadConfigForCli, type PruneCliOptions } from "./config.js";
import { createPruneStopSignalHandler } from "./signal-handlers.js";

export async function pruneCommand(
  release: string,
  opts: PruneCliOptions,
  deps: { ports?: Partial<PrunerPorts>; env?: NodeJS.ProcessEnv; runId?: string } = {},
): Promise<PruneRunResult> {
  const runId = deps.runId ?? defaultRunId();
  const config = loadConfigForCli({ release, runId, options: opts, env: deps.env });

  const stopHandler = createPruneStopSignalHandler({
    onSignal: (signal) => {
      console.log(
        `Received ${signal}. Finishing in-flight calls for run ${runId}; no new images will be touched.`,
      );
    },
  });

  let res: PruneRunResult;
  try {
    res = await runPrune(
      buildPrunerContext({
        config,
        runId,
        signal: stopHandler.signal,
        debugSink: config.debug ? (line) => process.stderr.write(`${line}\n`) : undefined,
        ports: deps.ports,
      }),
    );
  } finally {
    stopHandler.cleanup();
  }

  if (res.dryRun) {
    printDryRunPlan(res.runId, res.simulated);
  }
  printSummary(res);

  if (res.stopped) {
    console.log(`Run ${res.runId} stopped before finishing.`);
    console.log(resumeHint(res));
  } else if (res.summary.failed > 0) {
    console.log(resumeHint(res));
  }

  return res;
}

function printDryRunPlan(runId: string, actions: SimulatedAction[]): void {
  if (actions.length === 0) {
    console.log(`Dry run ${runId}: no changes needed.`);
    return;
  }

  console.log(`Dry run ${runId}: ${actions.length} change(s) would be made.`);
  for (const action of actions) {
    const detail = action.detail ? ` ${action.detail}` : "";
    console.log(`- ${action.action}${detail} ${action.region}/${action.imageId} (build ${action.buildId})`);
  }
}

function printSummary(res: PruneRunResult): void {
  const counts = res.summary;
  console.log(`Release ${res.release}: ${counts.builds} build(s), ${counts.protectedBuilds} protected.`);
  const parts = [
    `kept=${counts.kept}`,
    `pruned=${counts.pruned}`,
    `unknown=${counts.unknown}`,
    `failed=${counts.failed}`,
    `resumed=${counts.resumed}`,
    `no-image=${counts.noImage}`,
  ];
  console.log(`Summary: ${parts.join("  ")}`);

  for (const item of res.review) {
    console.log(`  review ${item.buildId}: ${item.reason}`);
  }
  for (const failure of res.failures) {
    console.log(`  failed ${failure.buildId} ${failure.region}/${failure.imageId}: ${failure.failure}`);
  }

  console.log(`Checkpoint: ${res.checkpointPath}`);
  console.log(`Log: ${res.logPath}`);
}

function resumeHint(res: PruneRunResult): string {
  const dryRun = res.dryRun ? " --dry-run" : "";
  return `Resume with: bootimage-pruner prune ${res.release}${dryRun} --checkpoint-path ${res.checkpointPath}`;
}
