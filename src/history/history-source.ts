/**
 * History source interface.
 * Purpose: the minimal surface the extractor needs from version control.
 * Assumptions: revisions are returned oldest first; implementations may hold a local clone
 *   that close() releases.
 * Usage: inject into PrunerPorts and call from the pipeline.
 */

import type { RawMetadata, Revision } from "../core/types.js";

export interface HistorySource {
  listRevisions(branch: string): Promise<Revision[]>;
  // Every metadata document present at the revision; empty when none is.
  fetchMetadataAt(revision: Revision): Promise<RawMetadata[]>;
  close(): Promise<void>;
}
