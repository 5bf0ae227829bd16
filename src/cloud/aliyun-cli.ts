/**
 * Aliyun ECS adapter over the `aliyun` CLI.
 * Purpose: map CloudImageApi calls onto ECS RPC actions and classify their failures.
 * Assumptions: the CLI is on PATH; credentials travel in the child environment only.
 * Usage: new AliyunCliImageApi({ credentials, timeoutMs }).describeImage("m-123", "us-west-1").
 */

import { execa } from "execa";
import { z } from "zod";

import type { Credentials } from "../core/config.js";
import { CREDENTIAL_ENV_VARS } from "../core/config.js";
import {
  permanentFailure,
  success,
  transientFailure,
  type RemoteFailure,
  type RemoteResult,
} from "../core/retry.js";
import type { RemoteImageState } from "../core/types.js";

import type { CloudImageApi } from "./image-api.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type CliRunner = (
  args: string[],
  opts: { env: Record<string, string>; timeoutMs: number },
) => Promise<CliResult>;

export type AliyunCliImageApiOptions = {
  credentials: Credentials;
  timeoutMs: number;
  runner?: CliRunner;
  binary?: string;
};

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const DescribeImagesResponseSchema = z
  .object({
    Images: z
      .object({
        Image: z
          .array(
            z
              .object({
                ImageId: z.string(),
                IsPublic: z.boolean().optional(),
                Tags: z
                  .object({
                    Tag: z
                      .array(z.object({ TagKey: z.string(), TagValue: z.string() }).passthrough())
                      .default([]),
                  })
                  .passthrough()
                  .optional(),
              })
              .passthrough(),
          )
          .default([]),
      })
      .passthrough(),
  })
  .passthrough();

// =============================================================================
// ERROR CLASSIFICATION
// =============================================================================

const TRANSIENT_CODE_PREFIXES = [
  "Throttling",
  "ServiceUnavailable",
  "InternalError",
  "UnknownError",
  "OperationConflict",
];

export function parseErrorCode(output: string): string | null {
  const match = /ErrorCode:\s*([\w.]+)/.exec(output);
  return match ? match[1] : null;
}

export function classifyCliFailure(action: string, result: CliResult): RemoteFailure {
  if (result.timedOut) {
    return transientFailure(`${action} timed out`);
  }

  const output = `${result.stderr}\n${result.stdout}`;
  const code = parseErrorCode(output);
  if (!code) {
    const detail = output.trim().split("\n")[0] ?? "";
    return permanentFailure(`${action} exited with ${result.exitCode}${detail ? `: ${detail}` : ""}`);
  }

  if (TRANSIENT_CODE_PREFIXES.some((prefix) => code.startsWith(prefix))) {
    return transientFailure(`${action}: ${code}`);
  }

  return permanentFailure(`${action}: ${code}`, { notFound: code.endsWith(".NotFound") });
}

// =============================================================================
// ADAPTER
// =============================================================================

export class AliyunCliImageApi implements CloudImageApi {
  private readonly env: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly runner: CliRunner;

  constructor(options: AliyunCliImageApiOptions) {
    this.env = {
      [CREDENTIAL_ENV_VARS.accessKeyId]: options.credentials.access_key_id,
      [CREDENTIAL_ENV_VARS.accessKeySecret]: options.credentials.access_key_secret,
    };
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? createExecaRunner(options.binary ?? "aliyun");
  }

  async describeImage(imageId: string, region: string): Promise<RemoteResult<RemoteImageState>> {
    const res = await this.ecs("DescribeImages", region, {
      ImageId: imageId,
      ImageOwnerAlias: "self",
      ShowExpired: "true",
    });
    if (res.exitCode !== 0) {
      const failure = classifyCliFailure("DescribeImages", res);
      // A removed image id is reported as "not found" by some regions instead of an empty list.
      if (failure.status === "permanent-failure" && failure.notFound) {
        return success({ exists: false, isPublic: false, tags: {} });
      }
      return failure;
    }

    let json: unknown;
    try {
      json = JSON.parse(res.stdout);
    } catch {
      return permanentFailure("DescribeImages returned malformed JSON");
    }

    const parsed = DescribeImagesResponseSchema.safeParse(json);
    if (!parsed.success) {
      return permanentFailure("DescribeImages returned an unexpected response shape");
    }

    const image = parsed.data.Images.Image.find((entry) => entry.ImageId === imageId);
    if (!image) {
      return success({ exists: false, isPublic: false, tags: {} });
    }

    const tags: Record<string, string> = {};
    for (const tag of image.Tags?.Tag ?? []) {
      tags[tag.TagKey] = tag.TagValue;
    }

    return success({ exists: true, isPublic: image.IsPublic === true, tags });
  }

  async tagImage(
    imageId: string,
    region: string,
    key: string,
    value: string,
  ): Promise<RemoteResult<void>> {
    return this.mutate("TagResources", region, {
      ResourceType: "image",
      "ResourceId.1": imageId,
      "Tag.1.Key": key,
      "Tag.1.Value": value,
    });
  }

  async setImageVisibility(
    imageId: string,
    region: string,
    isPublic: boolean,
  ): Promise<RemoteResult<void>> {
    return this.mutate("ModifyImageSharePermission", region, {
      ImageId: imageId,
      IsPublic: String(isPublic),
    });
  }

  async deleteImage(imageId: string, region: string): Promise<RemoteResult<void>> {
    return this.mutate("DeleteImage", region, { ImageId: imageId });
  }

  private async mutate(
    action: string,
    region: string,
    params: Record<string, string>,
  ): Promise<RemoteResult<void>> {
    const res = await this.ecs(action, region, params);
    if (res.exitCode !== 0) {
      return classifyCliFailure(action, res);
    }
    return success(undefined);
  }

  private ecs(action: string, region: string, params: Record<string, string>): Promise<CliResult> {
    // --region selects the CLI's endpoint; --RegionId is the API parameter.
    const args = ["ecs", action, "--region", region, "--RegionId", region];
    for (const [key, value] of Object.entries(params)) {
      args.push(`--${key}`, value);
    }
    return this.runner(args, { env: this.env, timeoutMs: this.timeoutMs });
  }
}

function createExecaRunner(binary: string): CliRunner {
  return async (args, opts) => {
    const res = await execa(binary, args, {
      env: opts.env,
      timeout: opts.timeoutMs,
      reject: false,
      stdio: "pipe",
    });
    return {
      exitCode: res.exitCode ?? -1,
      stdout: `${res.stdout}`,
      stderr: `${res.stderr}`,
      timedOut: res.timedOut,
    };
  };
}
