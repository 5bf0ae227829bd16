import path from "node:path";

import {
  CREDENTIAL_ENV_VARS,
  DEFAULT_BUILDS_BASE_URL,
  DEFAULT_CLOUD_TIMEOUT_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_INSTALLER_REPO,
  DEFAULT_METADATA_PATHS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_STATE_DIR,
  PrunerConfigSchema,
  formatConfigIssues,
  type PrunerConfig,
} from "../core/config.js";
import { createConfigError } from "../core/errors.js";

export type PruneCliOptions = {
  dryRun?: boolean;
  debug?: boolean;
  checkpointPath?: string;
  concurrency?: number;
  installerRepo?: string;
  buildsUrl?: string;
  logPath?: string;
};

export function defaultCheckpointPath(release: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, DEFAULT_STATE_DIR, `checkpoint-${release}.json`);
}

export function defaultLogPath(checkpointPath: string, runId: string): string {
  return path.join(path.dirname(checkpointPath), "logs", `${runId}.jsonl`);
}

export function readCredentials(env: NodeJS.ProcessEnv): {
  access_key_id: string;
  access_key_secret: string;
} {
  const accessKeyId = env[CREDENTIAL_ENV_VARS.accessKeyId]?.trim() ?? "";
  const accessKeySecret = env[CREDENTIAL_ENV_VARS.accessKeySecret]?.trim() ?? "";

  const missing = [
    accessKeyId ? null : CREDENTIAL_ENV_VARS.accessKeyId,
    accessKeySecret ? null : CREDENTIAL_ENV_VARS.accessKeySecret,
  ].filter((name): name is NonNullable<typeof name> => name !== null);
  if (missing.length > 0) {
    throw createConfigError(
      `Missing cloud credentials: ${missing.join(", ")} not set.`,
      "Export the access key pair for the image account before running.",
    );
  }

  return { access_key_id: accessKeyId, access_key_secret: accessKeySecret };
}

export function loadConfigForCli(args: {
  release: string;
  runId: string;
  options: PruneCliOptions;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): PrunerConfig {
  const cwd = args.cwd ?? process.cwd();
  const { options } = args;
  const checkpointPath = options.checkpointPath
    ? path.resolve(cwd, options.checkpointPath)
    : defaultCheckpointPath(args.release, cwd);

  const raw = {
    release: args.release,
    dry_run: options.dryRun ?? false,
    debug: options.debug ?? false,
    provider: "aliyun",
    architecture: "x86_64",
    installer_repo: options.installerRepo ?? DEFAULT_INSTALLER_REPO,
    metadata_paths: DEFAULT_METADATA_PATHS,
    builds_base_url: options.buildsUrl ?? DEFAULT_BUILDS_BASE_URL,
    checkpoint_path: checkpointPath,
    log_path: options.logPath
      ? path.resolve(cwd, options.logPath)
      : defaultLogPath(checkpointPath, args.runId),
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    retry: {
      max_attempts: DEFAULT_RETRY_ATTEMPTS,
      base_delay_ms: DEFAULT_RETRY_BASE_DELAY_MS,
    },
    http_timeout_ms: DEFAULT_HTTP_TIMEOUT_MS,
    cloud_timeout_ms: DEFAULT_CLOUD_TIMEOUT_MS,
    credentials: readCredentials(args.env ?? process.env),
  };

  const parsed = PrunerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw createConfigError(
      `Invalid options:\n${issues.map((line) => `  - ${line}`).join("\n")}`,
      "Run with --help to see the accepted options.",
      parsed.error,
    );
  }

  return parsed.data;
}
