import { z, type ZodIssue } from "zod";

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_INSTALLER_REPO = "https://github.com/openshift/installer";
export const DEFAULT_BUILDS_BASE_URL =
  "https://rhcos-redirector.apps.art.xq1c.p1.openshiftapps.com/art/storage/releases/";

// Newest location first; older release branches carried the document elsewhere.
export const DEFAULT_METADATA_PATHS = [
  "data/data/coreos/rhcos.json",
  "data/data/rhcos-stream.json",
  "data/data/rhcos.json",
];

export const DEFAULT_STATE_DIR = ".bootimage-pruner";
export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;
export const DEFAULT_CLOUD_TIMEOUT_MS = 120_000;

export const CREDENTIAL_ENV_VARS = {
  accessKeyId: "ALIBABA_CLOUD_ACCESS_KEY_ID",
  accessKeySecret: "ALIBABA_CLOUD_ACCESS_KEY_SECRET",
} as const;

// =============================================================================
// SCHEMA
// =============================================================================

export const RetryConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10),
    base_delay_ms: z.number().int().min(0),
  })
  .strict();

export const CredentialsSchema = z
  .object({
    access_key_id: z.string().trim().min(1),
    access_key_secret: z.string().trim().min(1),
  })
  .strict();

export const PrunerConfigSchema = z
  .object({
    release: z
      .string()
      .trim()
      .regex(/^\d+\.\d+$/, "Expected a release like 4.14"),
    dry_run: z.boolean(),
    debug: z.boolean(),
    provider: z.literal("aliyun"),
    architecture: z.literal("x86_64"),
    installer_repo: z.string().min(1),
    metadata_paths: z.array(z.string().min(1)).min(1),
    builds_base_url: z.string().url(),
    checkpoint_path: z.string().min(1),
    log_path: z.string().min(1),
    concurrency: z.number().int().min(1).max(64),
    retry: RetryConfigSchema,
    http_timeout_ms: z.number().int().positive(),
    cloud_timeout_ms: z.number().int().positive(),
    credentials: CredentialsSchema,
  })
  .strict();

export type PrunerConfig = z.infer<typeof PrunerConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type Credentials = z.infer<typeof CredentialsSchema>;

// =============================================================================
// HELPERS
// =============================================================================

export function releaseBranch(release: string): string {
  return `release-${release}`;
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
