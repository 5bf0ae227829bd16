/**
 * Revision metadata extractor.
 * Purpose: turn the metadata documents' revision history into a lazy snapshot sequence.
 * Assumptions: revisions arrive oldest first; each document present at a revision yields one
 *   snapshot; a revision without any is skipped, while an unrecognized document aborts the pass.
 * Usage: for await (const snapshot of extractSnapshots(revisions, source.fetchMetadataAt)) { ... }
 */

import type { JsonlLogger } from "../core/logger.js";
import { logPrunerEvent } from "../core/logger.js";
import type { MetadataSnapshot, RawMetadata, Revision } from "../core/types.js";

import { parseMetadataDocument } from "./schema.js";

export type FetchMetadataAt = (revision: Revision) => Promise<RawMetadata[]>;

export type ExtractOptions = {
  architecture: string;
  logger?: JsonlLogger;
  signal?: AbortSignal;
};

export async function* extractSnapshots(
  revisions: Iterable<Revision> | AsyncIterable<Revision>,
  fetchMetadataAt: FetchMetadataAt,
  opts: ExtractOptions,
): AsyncGenerator<MetadataSnapshot, void, undefined> {
  const seen = new Set<string>();

  for await (const revision of revisions) {
    if (seen.has(revision.sha)) continue;
    seen.add(revision.sha);

    if (opts.signal?.aborted) return;

    const documents = await fetchMetadataAt(revision);
    if (documents.length === 0) {
      if (opts.logger) {
        logPrunerEvent(opts.logger, "metadata.absent", { revision: revision.sha });
      }
      continue;
    }

    for (const raw of documents) {
      const parsed = parseMetadataDocument({
        content: raw.content,
        path: raw.path,
        revision,
        architecture: opts.architecture,
      });

      if (opts.logger) {
        logPrunerEvent(opts.logger, "metadata.snapshot", {
          revision: revision.sha,
          path: raw.path,
          schema: parsed.schema,
          builds: [...parsed.builds.keys()],
        });
      }

      yield { revision, path: raw.path, schema: parsed.schema, builds: parsed.builds };
    }
  }
}
