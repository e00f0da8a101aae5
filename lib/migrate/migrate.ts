// Migration use case: materialize the remote tree as local files on a new
// branch cut from the default branch and propose it as a pull request.

import * as path from "node:path";
import type { DocumentTree, Outcome } from "../domain/entities.ts";
import type { Notifier } from "../notifier/Notifier.ts";
import type {
  IFileSystem,
  IGitRepository,
  IPullRequestHost,
  IsolatedWorkspace,
  IWorkspaceIsolator,
} from "../ports/ports.ts";
import { asPath, type Path } from "../utils/types.ts";
import { planMigration, type MigrationPlan } from "./migration-planner.ts";

export const COMMIT_MESSAGE = "Migrate documentation from the documentation server";
export const PULL_REQUEST_TITLE = "Migrate documentation to the repository";
export const PULL_REQUEST_BODY = [
  "This pull request was generated from the documentation currently published on the server.",
  "",
  "Once merged, the files under the documentation directory become the source of truth and",
  "later runs publish local changes back to the server.",
].join("\n");

export interface MigrateDeps {
  fs: IFileSystem;
  git: IGitRepository;
  pullRequests: IPullRequestHost;
  workspaces: IWorkspaceIsolator;
  notifier: Notifier;
}

export interface MigrateOptions {
  /** Repository root. */
  basePath: Path;
  /** Documentation directory relative to the repository root. */
  docsDir: string;
  branchName: string;
}

/** First segment of the branch name; a root entry with that name clashes with branch refs. */
export function branchRootName(branch: string): string {
  return branch.split("/")[0];
}

export async function writeMigrationPlan(fs: IFileSystem, docsPath: string, plan: MigrationPlan): Promise<void> {
  await fs.mkdirp(asPath(docsPath));
  for (const dir of plan.directories) {
    await fs.mkdirp(asPath(path.join(docsPath, dir)));
  }
  for (const file of plan.files) {
    const target = path.join(docsPath, file.path);
    await fs.mkdirp(asPath(path.dirname(target)));
    await fs.writeText(asPath(target), file.content);
  }
}

export async function migrate(
  remote: DocumentTree,
  options: MigrateOptions,
  deps: MigrateDeps,
): Promise<Record<string, Outcome>> {
  const { notifier } = deps;
  const plan = planMigration(remote);
  notifier.info(
    `Migrating ${plan.files.length} file(s) and ${plan.directories.length} director${plan.directories.length === 1 ? "y" : "ies"}`,
  );

  const clashPath = asPath(path.join(options.basePath, branchRootName(options.branchName)));
  let workspace: IsolatedWorkspace | null = null;
  if (await deps.fs.exists(clashPath)) {
    workspace = await deps.workspaces.isolate(options.basePath);
    notifier.info(`${clashPath} clashes with branch ${options.branchName}; working in ${workspace.dir}`);
  }

  try {
    const cwd = workspace?.dir ?? options.basePath;
    const git = deps.git.at(cwd);
    const base = await deps.pullRequests.defaultBranch();

    await git.switchToNewBranch(options.branchName, base);
    await writeMigrationPlan(deps.fs, path.join(cwd, options.docsDir), plan);

    const changed = await git.commit(COMMIT_MESSAGE, [options.docsDir]);
    const existing = await deps.pullRequests.findOpen(options.branchName);
    if (!changed) {
      notifier.info(`${base} already matches the server; nothing to propose`);
      if (!existing) return {};
      await deps.pullRequests.close(existing);
      notifier.info(`Closed pull request ${existing.url}, which no longer carries changes`);
      return { [existing.url]: "success" };
    }
    await git.push(options.branchName);

    if (existing) {
      notifier.info(`Pull request already open at ${existing.url}; branch updated`);
      return { [existing.url]: "success" };
    }
    const pr = await deps.pullRequests.open({
      head: options.branchName,
      base,
      title: PULL_REQUEST_TITLE,
      body: PULL_REQUEST_BODY,
    });
    notifier.info(`Opened pull request ${pr.url}`);
    return { [pr.url]: "success" };
  } finally {
    await workspace?.dispose();
  }
}
