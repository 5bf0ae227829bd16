import { Command, InvalidArgumentError } from "commander";

import { formatErrorLines } from "./core/error-format.js";
import { pruneCommand } from "./cli/prune.js";
import { statusCommand } from "./cli/status.js";

type PruneCommandOpts = {
  dryRun?: boolean;
  debug?: boolean;
  checkpointPath?: string;
  concurrency?: number;
  installerRepo?: string;
  buildsUrl?: string;
  logPath?: string;
};

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("bootimage-pruner")
    .description("Tag, unshare and delete stale Aliyun bootimages for one release")
    .showHelpAfterError();

  program
    .command("prune", { isDefault: true })
    .description("Reconcile every build of a release against the installer metadata history")
    .argument("<release>", "Release to prune, e.g. 4.14")
    .option("--dry-run", "Describe images and report changes without making them", false)
    .option("-d, --debug", "Mirror the JSONL event log to stderr", false)
    .option("--checkpoint-path <path>", "Checkpoint file (default: .bootimage-pruner/checkpoint-<release>.json)")
    .option("--concurrency <n>", "Builds reconciled in parallel", parsePositiveInt)
    .option("--installer-repo <url>", "Installer git repository to read metadata history from")
    .option("--builds-url <url>", "Base URL of the build artifact redirector")
    .option("--log-path <path>", "JSONL event log (default: <checkpoint dir>/logs/<run-id>.jsonl)")
    .action(async (release: string, opts: PruneCommandOpts) => {
      await withErrorOutput(opts.debug ?? false, async () => {
        await pruneCommand(release, opts);
      });
    });

  program
    .command("status")
    .description("Summarize the checkpoint of a release")
    .argument("<release>", "Release, e.g. 4.14")
    .option("--checkpoint-path <path>", "Checkpoint file to read")
    .action(async (release: string, opts: { checkpointPath?: string }) => {
      await withErrorOutput(false, async () => {
        await statusCommand(release, opts);
      });
    });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

async function withErrorOutput(debug: boolean, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    for (const line of formatErrorLines(err, { mode: debug ? "debug" : "short" })) {
      console.error(line.text);
    }
    process.exitCode = 1;
  }
}
