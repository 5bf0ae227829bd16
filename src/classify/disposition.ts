import type { BuildRecord, Disposition, ImageRef, ProtectedSet } from "../core/types.js";
import { imageKey } from "../core/types.js";
import { isProtected } from "../metadata/protected-set.js";

// Gates destructive action, so it stays a pure function of its two inputs.
export function classifyDisposition(record: BuildRecord, protectedSet: ProtectedSet): Disposition {
  if (isProtected(protectedSet, record.buildId)) return "keep";
  if (record.inventory !== "verified") return "unknown";
  return "prune";
}

/**
 * Images a disposition applies to.
 *
 * Kept builds also cover the images the metadata history declared for them, so a protected
 * build is tagged even when its manifest could not be read. Unknown builds have none.
 */
export function dispositionTargets(
  record: BuildRecord,
  disposition: Disposition,
  protectedSet: ProtectedSet,
): ImageRef[] {
  if (disposition === "unknown") return [];

  const targets = new Map<string, ImageRef>();
  for (const image of record.images) {
    targets.set(imageKey(image), image);
  }

  if (disposition === "keep") {
    for (const image of protectedSet.images.get(record.buildId) ?? []) {
      if (!targets.has(imageKey(image))) targets.set(imageKey(image), image);
    }
  }

  return [...targets.values()];
}
