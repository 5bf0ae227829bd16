/**
 * PrunerContext + composition root for pruning runs.
 * Purpose: centralize run-scoped config and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over core modules and are overrideable for tests.
 * Usage: buildPrunerContext({ config, signal }) and pass it to runPrune.
 */

import { CheckpointStore } from "../checkpoint/checkpoint-store.js";
import { AliyunCliImageApi } from "../cloud/aliyun-cli.js";
import type { CloudImageApi } from "../cloud/image-api.js";
import { defaultRunId, systemClock, type Clock } from "../core/clock.js";
import type { PrunerConfig } from "../core/config.js";
import { JsonlLogger } from "../core/logger.js";
import { openGitHistory, type GitHistoryOptions } from "../history/git-history.js";
import type { HistorySource } from "../history/history-source.js";
import { HttpBuildIndexSource, type BuildIndexSource } from "../inventory/build-index.js";

// =============================================================================
// TYPES
// =============================================================================

export type PrunerPorts = {
  history: {
    open: (opts: GitHistoryOptions) => Promise<HistorySource>;
  };
  inventory: {
    create: (config: PrunerConfig) => BuildIndexSource;
  };
  cloud: {
    create: (config: PrunerConfig) => CloudImageApi;
  };
  checkpointRepository: {
    create: (filePath: string, opts: { release: string; now: () => string }) => CheckpointStore;
  };
  logSink: {
    createLogger: (
      filePath: string,
      opts: { runId: string; mirror?: (line: string) => void; now: () => string },
    ) => JsonlLogger;
  };
  clock: Clock;
  sleep: (ms: number) => Promise<void>;
};

export type PrunerContext = {
  config: PrunerConfig;
  runId: string;
  ports: PrunerPorts;
  signal?: AbortSignal;
  // Receives every log line when --debug is set.
  debugSink?: (line: string) => void;
};

export type BuildPrunerContextInput = {
  config: PrunerConfig;
  runId?: string;
  signal?: AbortSignal;
  debugSink?: (line: string) => void;
  ports?: Partial<PrunerPorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(): PrunerPorts {
  return {
    history: {
      open: openGitHistory,
    },
    inventory: {
      create: (config) =>
        new HttpBuildIndexSource({
          baseUrl: config.builds_base_url,
          timeoutMs: config.http_timeout_ms,
        }),
    },
    cloud: {
      create: (config) =>
        new AliyunCliImageApi({
          credentials: config.credentials,
          timeoutMs: config.cloud_timeout_ms,
        }),
    },
    checkpointRepository: {
      create: (filePath, opts) => new CheckpointStore(filePath, opts),
    },
    logSink: {
      createLogger: (filePath, opts) => new JsonlLogger(filePath, opts),
    },
    clock: systemClock,
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildPrunerContext(input: BuildPrunerContextInput): PrunerContext {
  const ports: PrunerPorts = {
    ...createDefaultPorts(),
    ...input.ports,
  };

  return {
    config: input.config,
    runId: input.runId ?? defaultRunId(ports.clock.now()),
    ports,
    signal: input.signal,
    debugSink: input.debugSink,
  };
}
