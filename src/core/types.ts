// Domain types shared by the extractor, inventory, classifier and reconciler.

// =============================================================================
// HISTORY
// =============================================================================

export type Revision = {
  sha: string;
  // 0 for the oldest revision that touched the metadata document.
  position: number;
};

export type RawMetadata = {
  path: string;
  content: string;
};

export type ImageRef = {
  region: string;
  imageId: string;
};

export type MetadataSchema = "stream" | "legacy";

export type MetadataSnapshot = {
  revision: Revision;
  path: string;
  schema: MetadataSchema;
  builds: ReadonlyMap<string, readonly ImageRef[]>;
};

export type ProtectedSet = {
  readonly ids: ReadonlySet<string>;
  readonly images: ReadonlyMap<string, readonly ImageRef[]>;
  readonly revisionsSeen: number;
};

// =============================================================================
// INVENTORY
// =============================================================================

export type BuildRecord = {
  buildId: string;
  inventory: "verified" | "unknown";
  images: readonly ImageRef[];
  reason?: string;
};

export type Disposition = "keep" | "prune" | "unknown";

// =============================================================================
// CLOUD
// =============================================================================

export type RemoteImageState = {
  exists: boolean;
  isPublic: boolean;
  tags: Readonly<Record<string, string>>;
};

export const BOOTIMAGE_TAG_KEY = "bootimage";

export function bootimageTagValue(disposition: Exclude<Disposition, "unknown">): "true" | "false" {
  return disposition === "keep" ? "true" : "false";
}

export function imageKey(image: ImageRef): string {
  return `${image.region}/${image.imageId}`;
}
