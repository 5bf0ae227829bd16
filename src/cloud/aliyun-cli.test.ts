import { describe, expect, it, vi, type Mock } from "vitest";

import {
  AliyunCliImageApi,
  classifyCliFailure,
  parseErrorCode,
  type CliResult,
  type CliRunner,
} from "./aliyun-cli.js";

// =============================================================================
// HELPERS
// =============================================================================

const CREDENTIALS = { access_key_id: "test-key-id", access_key_secret: "test-secret" };

function ok(stdout: string): CliResult {
  return { exitCode: 0, stdout, stderr: "", timedOut: false };
}

function cliError(code: string): CliResult {
  return {
    exitCode: 1,
    stdout: "",
    stderr: `ERROR: SDK.ServerError\nErrorCode: ${code}\nRecommend: https://api.example.test\nRequestId: 1-2-3\nMessage: failed`,
    timedOut: false,
  };
}

function makeApi(...results: CliResult[]): { api: AliyunCliImageApi; runner: Mock<CliRunner> } {
  const runner = vi.fn<CliRunner>();
  for (const result of results) {
    runner.mockResolvedValueOnce(result);
  }
  return { api: new AliyunCliImageApi({ credentials: CREDENTIALS, timeoutMs: 5000, runner }), runner };
}

function describeResponse(images: unknown[]): string {
  return JSON.stringify({ RequestId: "r-1", TotalCount: images.length, Images: { Image: images } });
}

// =============================================================================
// TESTS
// =============================================================================

describe("classifyCliFailure", () => {
  it("parses the error code from CLI output", () => {
    expect(parseErrorCode(cliError("Throttling.User").stderr)).toBe("Throttling.User");
    expect(parseErrorCode("plain failure")).toBeNull();
  });

  it("treats throttling and timeouts as transient", () => {
    expect(classifyCliFailure("TagResources", cliError("Throttling.User"))).toEqual({
      status: "transient-failure",
      reason: "TagResources: Throttling.User",
    });
    expect(
      classifyCliFailure("DeleteImage", { exitCode: -1, stdout: "", stderr: "", timedOut: true }),
    ).toEqual({ status: "transient-failure", reason: "DeleteImage timed out" });
  });

  it("flags NotFound codes as permanent not-found", () => {
    expect(classifyCliFailure("DeleteImage", cliError("InvalidImageId.NotFound"))).toEqual({
      status: "permanent-failure",
      reason: "DeleteImage: InvalidImageId.NotFound",
      notFound: true,
    });
  });

  it("treats authorization errors as permanent", () => {
    expect(classifyCliFailure("TagResources", cliError("Forbidden.RAM"))).toEqual({
      status: "permanent-failure",
      reason: "TagResources: Forbidden.RAM",
    });
  });

  it("keeps the first output line when no code is present", () => {
    expect(
      classifyCliFailure("DescribeImages", {
        exitCode: 127,
        stdout: "",
        stderr: "aliyun: command not found\n",
        timedOut: false,
      }),
    ).toEqual({
      status: "permanent-failure",
      reason: "DescribeImages exited with 127: aliyun: command not found",
    });
  });
});

describe("AliyunCliImageApi", () => {
  it("describes an image's visibility and tags", async () => {
    const { api, runner } = makeApi(
      ok(
        describeResponse([
          {
            ImageId: "m-old",
            IsPublic: true,
            Tags: { Tag: [{ TagKey: "bootimage", TagValue: "true" }] },
          },
        ]),
      ),
    );

    const result = await api.describeImage("m-old", "us-west-1");

    expect(result).toEqual({
      status: "success",
      value: { exists: true, isPublic: true, tags: { bootimage: "true" } },
    });
    expect(runner).toHaveBeenCalledWith(
      [
        "ecs",
        "DescribeImages",
        "--region",
        "us-west-1",
        "--RegionId",
        "us-west-1",
        "--ImageId",
        "m-old",
        "--ImageOwnerAlias",
        "self",
        "--ShowExpired",
        "true",
      ],
      {
        env: {
          ALIBABA_CLOUD_ACCESS_KEY_ID: "test-key-id",
          ALIBABA_CLOUD_ACCESS_KEY_SECRET: "test-secret",
        },
        timeoutMs: 5000,
      },
    );
  });

  it("reports a missing image as not existing", async () => {
    const { api } = makeApi(ok(describeResponse([])), cliError("InvalidImageId.NotFound"));

    expect(await api.describeImage("m-gone", "us-west-1")).toEqual({
      status: "success",
      value: { exists: false, isPublic: false, tags: {} },
    });
    expect(await api.describeImage("m-gone", "us-west-1")).toEqual({
      status: "success",
      value: { exists: false, isPublic: false, tags: {} },
    });
  });

  it("rejects malformed describe output as permanent", async () => {
    const { api } = makeApi(ok("not json"));

    expect(await api.describeImage("m-old", "us-west-1")).toEqual({
      status: "permanent-failure",
      reason: "DescribeImages returned malformed JSON",
    });
  });

  it("maps mutations onto ECS actions", async () => {
    const { api, runner } = makeApi(ok("{}"), ok("{}"), ok("{}"));

    await api.tagImage("m-old", "us-west-1", "bootimage", "false");
    await api.setImageVisibility("m-old", "us-west-1", false);
    await api.deleteImage("m-old", "us-west-1");

    expect(runner.mock.calls.map(([args]) => args)).toEqual([
      [
        "ecs",
        "TagResources",
        "--region",
        "us-west-1",
        "--RegionId",
        "us-west-1",
        "--ResourceType",
        "image",
        "--ResourceId.1",
        "m-old",
        "--Tag.1.Key",
        "bootimage",
        "--Tag.1.Value",
        "false",
      ],
      [
        "ecs",
        "ModifyImageSharePermission",
        "--region",
        "us-west-1",
        "--RegionId",
        "us-west-1",
        "--ImageId",
        "m-old",
        "--IsPublic",
        "false",
      ],
      ["ecs", "DeleteImage", "--region", "us-west-1", "--RegionId", "us-west-1", "--ImageId", "m-old"],
    ]);
  });

  it("does not force-delete an image that instances still use", async () => {
    const { api, runner } = makeApi(cliError("IncorrectImageStatus"));

    expect(await api.deleteImage("m-old", "us-west-1")).toEqual({
      status: "permanent-failure",
      reason: "DeleteImage: IncorrectImageStatus",
    });
    expect(runner.mock.calls[0]?.[0]).not.toContain("--Force");
  });

  it("returns classified failures from mutations", async () => {
    const { api } = makeApi(cliError("ServiceUnavailable"));

    expect(await api.deleteImage("m-old", "us-west-1")).toEqual({
      status: "transient-failure",
      reason: "DeleteImage: ServiceUnavailable",
    });
  });
});
