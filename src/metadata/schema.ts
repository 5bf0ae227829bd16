// Installer RHCOS metadata document shapes.
// Purpose: map either known shape to the builds (and aliyun images) it declares.
// Assumes one architecture and the aliyun provider key; other platforms only contribute build ids.

import { z } from "zod";

import { SchemaUnsupportedError } from "../core/errors.js";
import type { ImageRef, MetadataSchema, Revision } from "../core/types.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const AliyunRegionSchema = z
  .object({
    release: z.string().min(1),
    image: z.string().min(1),
  })
  .passthrough();

const ArchitectureSchema = z
  .object({
    artifacts: z
      .record(z.object({ release: z.string().min(1) }).passthrough())
      .default({}),
    images: z
      .object({
        aliyun: z
          .object({ regions: z.record(AliyunRegionSchema).default({}) })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

// Stream metadata, as carried by data/data/coreos/rhcos.json.
export const StreamMetadataSchema = z
  .object({
    stream: z.string().optional(),
    architectures: z.record(ArchitectureSchema),
  })
  .passthrough();

const LegacyAliyunImageSchema = z
  .object({
    name: z.string().min(1),
    id: z.string().min(1),
  })
  .passthrough();

// Pre-stream single-build document, as carried by data/data/rhcos.json.
export const LegacyMetadataSchema = z
  .object({
    buildid: z.string().min(1),
    aliyun: z.array(LegacyAliyunImageSchema).optional(),
  })
  .passthrough();

// =============================================================================
// PARSING
// =============================================================================

export type ParsedMetadata = {
  schema: MetadataSchema;
  builds: Map<string, ImageRef[]>;
};

export function parseMetadataDocument(input: {
  content: string;
  path: string;
  revision: Revision;
  architecture: string;
}): ParsedMetadata {
  const location = { revision: input.revision.sha, path: input.path };

  let json: unknown;
  try {
    json = JSON.parse(input.content);
  } catch (err) {
    throw new SchemaUnsupportedError(
      `Metadata ${input.path} at ${input.revision.sha} is not valid JSON.`,
      location,
      err,
    );
  }

  const stream = StreamMetadataSchema.safeParse(json);
  if (stream.success) {
    const arch = stream.data.architectures[input.architecture];
    if (!arch) {
      throw new SchemaUnsupportedError(
        `Metadata ${input.path} at ${input.revision.sha} has no ${input.architecture} architecture.`,
        location,
      );
    }
    return { schema: "stream", builds: collectStreamBuilds(arch) };
  }

  const legacy = LegacyMetadataSchema.safeParse(json);
  if (legacy.success) {
    const images = (legacy.data.aliyun ?? []).map((entry) => ({
      region: entry.name,
      imageId: entry.id,
    }));
    return { schema: "legacy", builds: new Map([[legacy.data.buildid, images]]) };
  }

  throw new SchemaUnsupportedError(
    `Metadata ${input.path} at ${input.revision.sha} matches no known schema.`,
    location,
    stream.error,
  );
}

function collectStreamBuilds(arch: z.infer<typeof ArchitectureSchema>): Map<string, ImageRef[]> {
  const builds = new Map<string, ImageRef[]>();

  for (const artifact of Object.values(arch.artifacts)) {
    if (!builds.has(artifact.release)) {
      builds.set(artifact.release, []);
    }
  }

  const regions = arch.images.aliyun?.regions ?? {};
  for (const [region, entry] of Object.entries(regions)) {
    const images = builds.get(entry.release) ?? [];
    images.push({ region, imageId: entry.image });
    builds.set(entry.release, images);
  }

  return builds;
}
