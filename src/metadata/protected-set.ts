import type { ImageRef, MetadataSnapshot, ProtectedSet } from "../core/types.js";
import { imageKey } from "../core/types.js";

// Folds every snapshot into one protected set. A build id stays protected once seen,
// whatever later revisions say.
export async function buildProtectedSet(
  snapshots: Iterable<MetadataSnapshot> | AsyncIterable<MetadataSnapshot>,
): Promise<ProtectedSet> {
  const ids = new Set<string>();
  const images = new Map<string, Map<string, ImageRef>>();
  const revisions = new Set<string>();

  for await (const snapshot of snapshots) {
    revisions.add(snapshot.revision.sha);

    for (const [buildId, refs] of snapshot.builds) {
      ids.add(buildId);

      const known = images.get(buildId) ?? new Map<string, ImageRef>();
      for (const ref of refs) {
        known.set(imageKey(ref), { region: ref.region, imageId: ref.imageId });
      }
      images.set(buildId, known);
    }
  }

  const frozenImages = new Map<string, readonly ImageRef[]>();
  for (const [buildId, refs] of images) {
    frozenImages.set(buildId, Object.freeze([...refs.values()]));
  }

  return Object.freeze({ ids, images: frozenImages, revisionsSeen: revisions.size });
}

export function isProtected(set: ProtectedSet, buildId: string): boolean {
  return set.ids.has(buildId);
}
