// CLI subcommands: sync, reconcile, migrate
// Binds env/flags, wires adapters, and invokes the use cases.
// No business logic here beyond option normalization and dependency wiring.

import * as path from "node:path";
import { Command } from "commander";
import type { Outcome } from "./domain/entities.ts";
import { errorMessage } from "./domain/errors.ts";
import { DiscourseDocumentServer } from "./adapters/discourse-server.ts";
import { GitCliRepository } from "./adapters/git-repository.ts";
import { GitHubPullRequests } from "./adapters/github-pull-requests.ts";
import { TempDirWorkspaceIsolator } from "./adapters/isolated-workspace.ts";
import { NodeFileSystem } from "./adapters/node-file-system.ts";
import { ConsoleNotifier } from "./notifier/ConsoleNotifier.ts";
import type { Notifier } from "./notifier/Notifier.ts";
import type { IFileSystem } from "./ports/ports.ts";
import { run, runMigrate, runReconcile, type SyncDeps } from "./sync.ts";
import { getEnv } from "./utils/env.ts";
import {
  readProjectConfig,
  resolveConfig,
  type CliFlags,
  type EnvLookup,
  type SyncConfig,
} from "./utils/readConfig.ts";
import { asPath } from "./utils/types.ts";

export type CommandName = "sync" | "reconcile" | "migrate";

const DESCRIPTIONS: Record<CommandName, string> = {
  sync: "Reconcile when the docs directory exists, otherwise migrate the server docs into the repository",
  reconcile: "Publish the local docs directory to the documentation server",
  migrate: "Open a pull request that brings the server docs into the repository",
};

export interface CommandEnv {
  fs?: IFileSystem;
  notifier?: Notifier;
  env?: EnvLookup;
  cwd?: string;
  /** Replaces adapter construction; tests pass in-memory fakes here. */
  makeDeps?: (config: SyncConfig, base: { fs: IFileSystem; notifier: Notifier }) => SyncDeps;
  /** Receives the printed address map. */
  print?: (line: string) => void;
}

/** Build concrete adapters from the resolved configuration. */
export function buildDefaultDeps(config: SyncConfig, base: { fs: IFileSystem; notifier: Notifier }): SyncDeps {
  const deps: SyncDeps = { ...base, server: new DiscourseDocumentServer(config.discourse) };
  if (config.github) {
    deps.git = new GitCliRepository(asPath(config.basePath));
    deps.pullRequests = new GitHubPullRequests(config.github);
    deps.workspaces = new TempDirWorkspaceIsolator();
  }
  return deps;
}

async function dispatch(
  name: CommandName,
  config: SyncConfig,
  deps: SyncDeps,
  signal: AbortSignal,
): Promise<{ urls: Record<string, Outcome>; failed: boolean }> {
  switch (name) {
    case "reconcile":
      return await runReconcile(config, deps, signal);
    case "migrate":
      return { urls: await runMigrate(config, deps), failed: false };
    case "sync":
      return await run(config, deps, signal);
  }
}

/** Public helper so tests can run a command without a process around it. */
export async function runCommand(name: CommandName, flags: CliFlags, ctx: CommandEnv = {}): Promise<boolean> {
  const fs = ctx.fs ?? new NodeFileSystem();
  const notifier = ctx.notifier ?? new ConsoleNotifier();
  const print = ctx.print ?? ((line: string) => console.log(line));
  const cwd = ctx.cwd ?? process.cwd();

  const controller = new AbortController();
  const onInterrupt = () => {
    notifier.warn("Interrupted; remaining actions will be skipped");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const project = await readProjectConfig(fs, path.resolve(cwd, flags.basePath ?? "."));
    const config = resolveConfig(flags, ctx.env ?? getEnv, project, cwd);
    const deps = (ctx.makeDeps ?? buildDefaultDeps)(config, { fs, notifier });
    const { urls, failed } = await dispatch(name, config, deps, controller.signal);
    print(JSON.stringify(urls, null, 2));
    return !failed;
  } catch (err) {
    notifier.error(errorMessage(err));
    return false;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

/** Construct the commander Command for one subcommand. */
export function makeSyncCommand(name: CommandName, ctx: CommandEnv = {}): Command {
  return new Command(name)
    .description(DESCRIPTIONS[name])
    .option("--base-path <dir>", "Repository root (default: current directory)")
    .option("--docs-dir <dir>", "Documentation directory, relative to the repository root (default: docs)")
    .option("--index-url <url>", "Address of the index document on the server")
    .option("--category-id <id>", "Category new documents are created in (default: 41)")
    .option("--title <title>", "Title of the documentation root")
    .option("--dry-run", "Report what would change without changing anything")
    .option("--no-delete-topics", "Keep remote documents that no longer exist locally")
    .option("--discourse-host <host>", "Documentation server host (or set DISCOURSE_HOST)")
    .option("--discourse-api-username <name>", "API user (or set DISCOURSE_API_USERNAME)")
    .option("--discourse-api-key <key>", "API key (or set DISCOURSE_API_KEY)")
    .option("--github-token <token>", "Token for opening pull requests (or set GITHUB_TOKEN)")
    .option("--repository <owner/name>", "Repository pull requests go to (or set GITHUB_REPOSITORY)")
    .option("--branch <name>", "Branch migrations are pushed to (default: doctree-sync/migrate)")
    .addHelpText(
      "after",
      `
Env variables:
  DISCOURSE_HOST           Server host (used if --discourse-host not provided)
  DISCOURSE_API_USERNAME   API user
  DISCOURSE_API_KEY        API key
  DISCOURSE_CATEGORY_ID    Category for new documents
  DELETE_TOPICS            "false" keeps remote documents that were removed locally
  DRY_RUN                  "true" for a dry run
  GITHUB_TOKEN             Token used to open pull requests
  GITHUB_REPOSITORY        owner/name of the repository
  DOCTREE_SYNC_DEBUG       Any value turns on debug logging

Project settings (indexUrl, docsDir, categoryId, name) may also live in
doctree-sync.config.json at the repository root.
`,
    )
    .action(async (options: CliFlags, cmd: Command) => {
      // An untouched --no-delete-topics defaults to true; leave room for DELETE_TOPICS.
      const flags: CliFlags = cmd.getOptionValueSource("deleteTopics") === "default"
        ? { ...options, deleteTopics: undefined }
        : options;
      if (!(await runCommand(name, flags, ctx))) process.exitCode = 1;
    });
}
