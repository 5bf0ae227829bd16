/**
 * Git-backed history source.
 * Purpose: clone the installer repo's release branch and read the metadata documents per commit.
 * Assumptions: git is on PATH; the clone is bare and blob-less, so blobs are fetched on demand.
 * Usage: const history = await openGitHistory({ repoUrl, branch, metadataPaths }).
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { createHistoryError } from "../core/errors.js";
import type { JsonlLogger } from "../core/logger.js";
import { logPrunerEvent } from "../core/logger.js";
import type { RawMetadata, Revision } from "../core/types.js";

import type { HistorySource } from "./history-source.js";

// =============================================================================
// GIT HELPERS
// =============================================================================

export type GitResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export async function git(cwd: string, args: string[]): Promise<GitResult> {
  const res = await execa("git", args, { cwd, reject: false, stdio: "pipe" });
  return {
    exitCode: res.exitCode ?? -1,
    stdout: `${res.stdout}`,
    stderr: `${res.stderr}`,
  };
}

const MISSING_PATH_PATTERN = /does not exist in|exists on disk, but not in/;

export function isMissingPathError(stderr: string): boolean {
  return MISSING_PATH_PATTERN.test(stderr);
}

// =============================================================================
// SOURCE
// =============================================================================

export type GitHistoryOptions = {
  repoUrl: string;
  branch: string;
  metadataPaths: string[];
  logger?: JsonlLogger;
  tmpRoot?: string;
};

export async function openGitHistory(opts: GitHistoryOptions): Promise<GitHistorySource> {
  const workDir = await fs.mkdtemp(path.join(opts.tmpRoot ?? os.tmpdir(), "bootimage-history-"));
  const cloneDir = path.join(workDir, "installer.git");

  if (opts.logger) {
    logPrunerEvent(opts.logger, "history.clone.start", { repo: opts.repoUrl, branch: opts.branch });
  }

  const clone = await git(workDir, [
    "clone",
    "--bare",
    "--filter=blob:none",
    "--single-branch",
    "--branch",
    opts.branch,
    opts.repoUrl,
    cloneDir,
  ]);
  if (clone.exitCode !== 0) {
    await fse.remove(workDir);
    throw createHistoryError(
      `git clone of ${opts.repoUrl} (branch ${opts.branch}) failed: ${clone.stderr.trim()}`,
    );
  }

  if (opts.logger) {
    logPrunerEvent(opts.logger, "history.clone.complete", { path: cloneDir });
  }

  return new GitHistorySource(cloneDir, workDir, opts.metadataPaths);
}

export class GitHistorySource implements HistorySource {
  constructor(
    private readonly repoDir: string,
    private readonly workDir: string,
    private readonly metadataPaths: string[],
  ) {}

  async listRevisions(branch: string): Promise<Revision[]> {
    const res = await git(this.repoDir, [
      "log",
      "--format=%H",
      "--reverse",
      branch,
      "--",
      ...this.metadataPaths,
    ]);
    if (res.exitCode !== 0) {
      throw createHistoryError(`git log on ${branch} failed: ${res.stderr.trim()}`);
    }

    return res.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((sha, position) => ({ sha, position }));
  }

  // Release branches can carry several documents side by side; each one names builds.
  async fetchMetadataAt(revision: Revision): Promise<RawMetadata[]> {
    const documents: RawMetadata[] = [];

    for (const candidate of this.metadataPaths) {
      const res = await git(this.repoDir, ["show", `${revision.sha}:${candidate}`]);
      if (res.exitCode === 0) {
        documents.push({ path: candidate, content: res.stdout });
        continue;
      }
      if (!isMissingPathError(res.stderr)) {
        throw createHistoryError(
          `git show ${revision.sha}:${candidate} failed: ${res.stderr.trim()}`,
        );
      }
    }

    return documents;
  }

  async close(): Promise<void> {
    await fse.remove(this.workDir);
  }
}
