// Use cases behind the CLI.
// - runReconcile: build both trees, plan, execute, write the table back
// - runMigrate: materialize the remote tree on a branch and open a PR
// - run: pick one of the above from what exists locally and remotely
//
// Side-effects happen only through injected ports.

import * as path from "node:path";
import { INDEX_PATH, type Action, type DocumentTree, type Outcome } from "./domain/entities.ts";
import { ConfigError } from "./domain/errors.ts";
import { migrate } from "./migrate/migrate.ts";
import type { Notifier } from "./notifier/Notifier.ts";
import type {
  IDocumentServer,
  IFileSystem,
  IGitRepository,
  IPullRequestHost,
  IWorkspaceIsolator,
} from "./ports/ports.ts";
import { runAll, type ExecutionResult } from "./reconcile/action-executor.ts";
import { hasChanges, reconcile } from "./reconcile/reconciler.ts";
import { buildLocalTree } from "./tree/local-tree.ts";
import { buildRemoteTree } from "./tree/remote-tree.ts";
import { countNodes } from "./tree/tree-utils.ts";
import type { SyncConfig } from "./utils/readConfig.ts";
import { asPath, asRemoteUrl } from "./utils/types.ts";

export interface SyncDeps {
  fs: IFileSystem;
  server: IDocumentServer;
  notifier: Notifier;
  /** Only needed for migration. */
  git?: IGitRepository;
  pullRequests?: IPullRequestHost;
  workspaces?: IWorkspaceIsolator;
}

export interface ReconcileResult extends ExecutionResult {
  plan: Action[];
}

export type SyncMode = "reconcile" | "migrate" | "none";

export interface RunResult {
  mode: SyncMode;
  urls: Record<string, Outcome>;
  failed: boolean;
}

function docsPathOf(config: SyncConfig) {
  return asPath(path.resolve(config.basePath, config.docsDir));
}

function describe(label: string, tree: DocumentTree): string {
  const { groups, pages } = countNodes(tree);
  return `${label}: ${groups} group(s), ${pages} page(s)`;
}

export async function runReconcile(
  config: SyncConfig,
  deps: SyncDeps,
  signal?: AbortSignal,
): Promise<ReconcileResult> {
  const { fs, server, notifier } = deps;
  const indexUrl = config.indexUrl ? asRemoteUrl(config.indexUrl) : undefined;

  const local = await buildLocalTree(fs, docsPathOf(config), { rootTitle: config.rootTitle, notifier });
  const remote = await buildRemoteTree(server, indexUrl, { rootTitle: config.rootTitle, notifier });
  notifier.info(describe("Local", local));
  notifier.info(describe("Remote", remote));

  const plan = reconcile(local, remote, { deleteSuppressed: !config.deleteTopics });
  for (const action of plan) notifier.debug(`Planned ${action.kind} ${action.path || "/"}`);
  if (!hasChanges(plan)) notifier.info("Local and remote documentation are in sync");

  const result = await runAll(plan, { local, remote }, { server, notifier }, {
    dryRun: config.dryRun,
    categoryId: config.categoryId,
    signal,
  });

  const createdIndex = result.reports.find(
    (r) => r.kind === "create" && r.path === INDEX_PATH && r.outcome === "success" && r.location,
  );
  if (createdIndex?.location && !config.dryRun) {
    notifier.info(`Index document created at ${createdIndex.location}; set it as indexUrl for later runs`);
  }

  return { plan, ...result };
}

export async function runMigrate(config: SyncConfig, deps: SyncDeps): Promise<Record<string, Outcome>> {
  const { git, pullRequests, workspaces, notifier } = deps;
  if (!config.indexUrl) {
    throw new ConfigError("Migration needs the address of the index document", { field: "indexUrl" });
  }
  if (!git || !pullRequests || !workspaces) {
    throw new ConfigError("Migration needs repository access (GitHub token and repository)", {
      field: "github",
    });
  }

  const remote = await buildRemoteTree(deps.server, asRemoteUrl(config.indexUrl), {
    rootTitle: config.rootTitle,
    notifier,
  });
  notifier.info(describe("Remote", remote));

  return await migrate(
    remote,
    { basePath: asPath(config.basePath), docsDir: config.docsDir, branchName: config.branchName },
    { fs: deps.fs, git, pullRequests, workspaces, notifier },
  );
}

/**
 * Reconcile when the documentation directory exists, migrate when it does
 * not and an index document is configured, otherwise do nothing.
 */
export async function run(config: SyncConfig, deps: SyncDeps, signal?: AbortSignal): Promise<RunResult> {
  if (await deps.fs.isDirectory(docsPathOf(config))) {
    const { urls, failed } = await runReconcile(config, deps, signal);
    return { mode: "reconcile", urls, failed };
  }
  if (config.indexUrl) {
    return { mode: "migrate", urls: await runMigrate(config, deps), failed: false };
  }
  deps.notifier.warn(
    `Neither ${config.docsDir} nor an index document address is available; nothing to do`,
  );
  return { mode: "none", urls: {}, failed: false };
}
