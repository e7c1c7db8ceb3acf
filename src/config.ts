import { z } from "zod";
import { env, type EnvSource } from "./env.js";
import { ConfigError } from "./errors.js";

export const BRANCH = "main";
export const FALLBACK_BANNER =
  "https://images.unsplash.com/photo-1504052434569-70ad5836ab65";

export type UploadFailurePolicy = "fallback" | "propagate";

export interface AppConfig {
  readonly githubToken: string;
  /** `owner/repo` */
  readonly repoName: string;
  readonly apiUrl: string;
  /** Always ends with `/`. */
  readonly websiteUrl: string;
  readonly jsonPath: string;
  /** Always ends with `/`. */
  readonly uploadFolder: string;
  readonly onUploadFailure: UploadFailurePolicy;
  readonly branch: string;
  readonly port: number;
  readonly host: string;
}

const REQUIRED = ["GITHUB_TOKEN", "GITHUB_REPO_NAME", "WEBSITE_URL"] as const;

const schema = z.object({
  githubToken: z.string().min(1),
  repoName: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "GITHUB_REPO_NAME must look like owner/repo"),
  apiUrl: z.string().url(),
  websiteUrl: z.string().min(1),
  jsonPath: z.string().min(1),
  uploadFolder: z.string().min(1),
  onUploadFailure: z.enum(["fallback", "propagate"]),
  port: z.coerce.number().int().min(0).max(65535),
  host: z.string().min(1)
});

const withSlash = (value: string) =>
  value.endsWith("/") ? value : `${value}/`;

export function loadConfig(source: EnvSource = process.env): AppConfig {
  const missing = REQUIRED.filter((key) => !env(key, "", source));
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing critical environment variables: ${missing.join(", ")}`
    );
  }

  // blank optional values fall back to their defaults
  const read = (key: string, defaultValue = "") =>
    env(key, "", source) || defaultValue;

  const parsed = schema.safeParse({
    githubToken: read("GITHUB_TOKEN"),
    repoName: read("GITHUB_REPO_NAME"),
    apiUrl: read("GITHUB_API_URL", "https://api.github.com").replace(
      /\/+$/,
      ""
    ),
    websiteUrl: read("WEBSITE_URL"),
    jsonPath: read("JSON_PATH", "gospel.json"),
    uploadFolder: read("UPLOAD_FOLDER", "gospel-uploads/"),
    onUploadFailure: read("UPLOAD_FAILURE_POLICY", "fallback"),
    port: read("PORT", "5000"),
    host: read("HOST", "0.0.0.0")
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }

  const { data } = parsed;
  return Object.freeze({
    ...data,
    websiteUrl: withSlash(data.websiteUrl),
    uploadFolder: withSlash(data.uploadFolder),
    branch: BRANCH
  });
}
