// Configuration: CLI flags, environment variables and the optional project
// file doctree-sync.config.json, merged in that order of precedence and
// validated with zod.

import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "../domain/errors.ts";
import type { IFileSystem } from "../ports/ports.ts";
import { asPath } from "./types.ts";

export const PROJECT_CONFIG_FILENAME = "doctree-sync.config.json";
export const DEFAULT_DOCS_DIR = "docs";
export const DEFAULT_CATEGORY_ID = 41;
export const DEFAULT_BRANCH_NAME = "doctree-sync/migrate";

const ProjectConfigSchema = z
  .object({
    name: z.string().min(1),
    indexUrl: z.string().min(1),
    docsDir: z.string().min(1),
    categoryId: z.number().int().positive(),
  })
  .partial()
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export const SyncConfigSchema = z.object({
  basePath: z.string().min(1),
  docsDir: z.string().min(1).default(DEFAULT_DOCS_DIR),
  dryRun: z.boolean().default(false),
  /** false turns on delete suppression. */
  deleteTopics: z.boolean().default(true),
  categoryId: z.number().int().positive().default(DEFAULT_CATEGORY_ID),
  indexUrl: z.string().min(1).optional(),
  rootTitle: z.string().min(1).optional(),
  branchName: z.string().min(1).default(DEFAULT_BRANCH_NAME),
  discourse: z.object({
    baseUrl: z.string().url(),
    apiUsername: z.string().min(1),
    apiKey: z.string().min(1),
  }),
  github: z
    .object({
      token: z.string().min(1),
      repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/, "expected owner/name"),
    })
    .optional(),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

/** Flags as commander hands them over. */
export interface CliFlags {
  basePath?: string;
  docsDir?: string;
  indexUrl?: string;
  categoryId?: string;
  dryRun?: boolean;
  deleteTopics?: boolean;
  discourseHost?: string;
  discourseApiUsername?: string;
  discourseApiKey?: string;
  githubToken?: string;
  repository?: string;
  branch?: string;
  title?: string;
}

export type EnvLookup = (key: string) => string | undefined;

export async function readProjectConfig(fs: IFileSystem, basePath: string): Promise<ProjectConfig> {
  const configPath = asPath(path.join(basePath, PROJECT_CONFIG_FILENAME));
  if (!(await fs.exists(configPath))) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readText(configPath));
  } catch (err) {
    throw new ConfigError(`${PROJECT_CONFIG_FILENAME} is not valid JSON`, { cause: err });
  }
  const parsed = ProjectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${PROJECT_CONFIG_FILENAME}: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** "discourse.example.test" -> "https://discourse.example.test" */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function parseBoolean(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (/^(true|1|yes)$/i.test(value)) return true;
  if (/^(false|0|no)$/i.test(value)) return false;
  throw new ConfigError(`Expected a boolean, got ${JSON.stringify(value)}`, { field: name });
}

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`Expected a positive integer, got ${JSON.stringify(value)}`, { field: name });
  }
  return Number(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

export function resolveConfig(
  flags: CliFlags,
  env: EnvLookup,
  project: ProjectConfig = {},
  cwd: string = process.cwd(),
): SyncConfig {
  const host = flags.discourseHost ?? env("DISCOURSE_HOST");
  const githubToken = flags.githubToken ?? env("GITHUB_TOKEN");
  const repository = flags.repository ?? env("GITHUB_REPOSITORY");

  const candidate = {
    basePath: path.resolve(cwd, flags.basePath ?? "."),
    docsDir: flags.docsDir ?? project.docsDir,
    dryRun: flags.dryRun ?? parseBoolean(env("DRY_RUN"), "DRY_RUN"),
    deleteTopics: flags.deleteTopics ?? parseBoolean(env("DELETE_TOPICS"), "DELETE_TOPICS"),
    categoryId: parseInteger(flags.categoryId, "categoryId") ??
      parseInteger(env("DISCOURSE_CATEGORY_ID"), "DISCOURSE_CATEGORY_ID") ??
      project.categoryId,
    indexUrl: flags.indexUrl ?? project.indexUrl,
    rootTitle: flags.title ?? project.name,
    branchName: flags.branch,
    discourse: {
      baseUrl: host ? normalizeHost(host) : "",
      apiUsername: flags.discourseApiUsername ?? env("DISCOURSE_API_USERNAME") ?? "",
      apiKey: flags.discourseApiKey ?? env("DISCOURSE_API_KEY") ?? "",
    },
    github: githubToken && repository ? { token: githubToken, repository } : undefined,
  };

  const parsed = SyncConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}
