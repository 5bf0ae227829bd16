/**
 * Build index source.
 * Purpose: fetch a release's builds.json and per-build meta.json over HTTP.
 * Assumptions: documents are JSON; HTTP failures are classified, never thrown.
 * Usage: new HttpBuildIndexSource({ baseUrl, timeoutMs }).fetchBuildIndex("4.14").
 */

import { z } from "zod";

import { formatErrorMessage } from "../core/error-format.js";
import {
  permanentFailure,
  success,
  transientFailure,
  type RemoteResult,
} from "../core/retry.js";

// =============================================================================
// TYPES
// =============================================================================

export interface BuildIndexSource {
  fetchBuildIndex(release: string): Promise<RemoteResult<unknown>>;
  fetchBuildManifest(
    release: string,
    buildId: string,
    architecture: string,
  ): Promise<RemoteResult<unknown>>;
}

export type HttpBuildIndexSourceOptions = {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
};

// =============================================================================
// DOCUMENT SCHEMAS
// =============================================================================

const BuildEntrySchema = z
  .object({
    id: z.string().min(1),
    arches: z.array(z.string()).optional(),
  })
  .passthrough();

export const BuildIndexSchema = z
  .object({
    builds: z.array(z.union([z.string().min(1), BuildEntrySchema])),
  })
  .passthrough();

export const BuildManifestSchema = z
  .object({
    buildid: z.string().optional(),
    aliyun: z
      .array(
        z
          .object({
            name: z.string().min(1),
            id: z.string().min(1),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

export type BuildIndexEntry = { id: string; arches?: string[] };

export function normalizeBuildIndex(doc: z.infer<typeof BuildIndexSchema>): BuildIndexEntry[] {
  return doc.builds.map((entry) =>
    typeof entry === "string" ? { id: entry } : { id: entry.id, arches: entry.arches },
  );
}

// =============================================================================
// HTTP SOURCE
// =============================================================================

const RETRIABLE_STATUS_CODES = new Set([408, 425, 429, 500, 502, 503, 504]);

export class HttpBuildIndexSource implements BuildIndexSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpBuildIndexSourceOptions) {
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  buildIndexUrl(release: string): string {
    return new URL(`rhcos-${release}/builds.json`, this.baseUrl).toString();
  }

  buildManifestUrl(release: string, buildId: string, architecture: string): string {
    const segments = [buildId, architecture].map(encodeURIComponent).join("/");
    return new URL(`rhcos-${release}/${segments}/meta.json`, this.baseUrl).toString();
  }

  fetchBuildIndex(release: string): Promise<RemoteResult<unknown>> {
    return this.getJson(this.buildIndexUrl(release));
  }

  fetchBuildManifest(
    release: string,
    buildId: string,
    architecture: string,
  ): Promise<RemoteResult<unknown>> {
    return this.getJson(this.buildManifestUrl(release, buildId, architecture));
  }

  private async getJson(url: string): Promise<RemoteResult<unknown>> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      // fetch rejects only for network failures and timeouts.
      return transientFailure(`GET ${url} failed: ${formatErrorMessage(err)}`);
    }

    if (!response.ok) {
      const reason = `GET ${url} returned HTTP ${response.status}`;
      return RETRIABLE_STATUS_CODES.has(response.status)
        ? transientFailure(reason)
        : permanentFailure(reason, { notFound: response.status === 404 });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      return transientFailure(`GET ${url} body read failed: ${formatErrorMessage(err)}`);
    }

    try {
      return success<unknown>(JSON.parse(text));
    } catch {
      return permanentFailure(`GET ${url} returned malformed JSON`);
    }
  }
}
