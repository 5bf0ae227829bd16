/**
 * Cloud image API interface.
 * Purpose: the four image operations the reconciler drives.
 * Assumptions: every call returns a RemoteResult instead of throwing; "not found" is a
 *   permanent failure flagged with notFound so callers can treat it per operation.
 * Usage: inject into PrunerPorts; tests use FakeCloudImageApi.
 */

import type { RemoteResult } from "../core/retry.js";
import type { RemoteImageState } from "../core/types.js";

export interface CloudImageApi {
  describeImage(imageId: string, region: string): Promise<RemoteResult<RemoteImageState>>;
  tagImage(
    imageId: string,
    region: string,
    key: string,
    value: string,
  ): Promise<RemoteResult<void>>;
  setImageVisibility(
    imageId: string,
    region: string,
    isPublic: boolean,
  ): Promise<RemoteResult<void>>;
  deleteImage(imageId: string, region: string): Promise<RemoteResult<void>>;
}
