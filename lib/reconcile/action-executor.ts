// Applies an action plan against the documentation server, or simulates it
// in dry-run mode, then writes the regenerated navigation table back into
// the index document.
//
// One failed action never aborts the plan: every action gets its own
// outcome and the caller sees all of them.

import {
  INDEX_PATH,
  normalizeContent,
  type Action,
  type ActionReport,
  type DocumentNode,
  type DocumentTree,
  type GroupNode,
  type Outcome,
} from "../domain/entities.ts";
import { DocumentNotFoundError, errorMessage } from "../domain/errors.ts";
import { composeIndexDocument } from "../navigation/navigation-table.ts";
import type { Notifier } from "../notifier/Notifier.ts";
import type { IDocumentServer } from "../ports/ports.ts";
import { graft, indexByPath, parentDocPath, pathKey, preorder, withRemoteIds } from "../tree/tree-utils.ts";
import type { RemoteUrl } from "../utils/types.ts";
import { retainedRemoteIds } from "./reconciler.ts";

export interface ExecutorDeps {
  server: IDocumentServer;
  notifier: Notifier;
}

export interface ExecutorOptions {
  dryRun: boolean;
  categoryId: number;
  /** Once aborted, remaining actions are reported as skipped. */
  signal?: AbortSignal;
}

export interface ExecutionResult {
  reports: ActionReport[];
  /** Remote address -> outcome for every address acted upon. */
  urls: Record<string, Outcome>;
  /** True when any action failed, including creates that never got an address. */
  failed: boolean;
}

function locationOf(action: Action): RemoteUrl | undefined {
  return action.kind === "create" ? undefined : action.remoteId;
}

export class ActionExecutor {
  private readonly deps: ExecutorDeps;
  private readonly local: DocumentTree;
  private readonly remote: DocumentTree;
  private readonly plan: readonly Action[];
  private readonly options: ExecutorOptions;
  /** Path key -> remote id, for pages the regenerated table can link to. */
  private readonly ids: Map<string, RemoteUrl>;
  /** Path keys whose remote deletion went through. */
  private readonly removed = new Set<string>();
  private indexUrl: RemoteUrl | undefined;
  /** Index document as last seen or written. */
  private published: string | null;

  constructor(
    deps: ExecutorDeps,
    trees: { local: DocumentTree; remote: DocumentTree },
    plan: readonly Action[],
    options: ExecutorOptions,
  ) {
    this.deps = deps;
    this.local = trees.local;
    this.remote = trees.remote;
    this.plan = plan;
    this.options = options;
    this.ids = retainedRemoteIds(plan);
    this.indexUrl = trees.remote.index.remoteId;
    this.published = trees.remote.source ?? null;
  }

  async execute(action: Action): Promise<ActionReport> {
    try {
      return await this.apply(action);
    } catch (err) {
      const reason = errorMessage(err);
      this.deps.notifier.error(`${action.kind} ${action.path || "/"} failed: ${reason}`);
      return { ...action, outcome: "fail", location: locationOf(action), reason };
    }
  }

  private async apply(action: Action): Promise<ActionReport> {
    const { server } = this.deps;
    const { dryRun, categoryId } = this.options;

    switch (action.kind) {
      case "no-op":
        return { ...action, outcome: "success", location: action.remoteId };

      case "create": {
        if (action.path === INDEX_PATH) return await this.writeIndex(action);
        const node = action.node;
        if (node.kind === "group" || dryRun) return { ...action, outcome: "success" };
        const url = await server.create({ categoryId, title: node.title, content: node.content ?? "" });
        this.ids.set(pathKey(node.path), url);
        return { ...action, outcome: "success", location: url };
      }

      case "update": {
        if (action.path === INDEX_PATH) return await this.writeIndex(action);
        if (dryRun) return await this.preflight(action, action.remoteId);
        await server.update(action.remoteId, action.node.content ?? "");
        return { ...action, outcome: "success", location: action.remoteId };
      }

      case "delete": {
        if (action.suppressed) {
          return { ...action, outcome: "skip", location: action.remoteId, reason: "deletion disabled" };
        }
        if (!action.remoteId) {
          this.removed.add(pathKey(action.path));
          return { ...action, outcome: "success" };
        }
        if (dryRun) {
          const report = await this.preflight(action, action.remoteId);
          if (report.outcome === "success") this.removed.add(pathKey(action.path));
          return report;
        }
        try {
          await server.delete(action.remoteId);
        } catch (err) {
          if (!(err instanceof DocumentNotFoundError)) throw err;
          this.deps.notifier.debug(`${action.remoteId} was already deleted`);
        }
        this.removed.add(pathKey(action.path));
        return { ...action, outcome: "success", location: action.remoteId };
      }
    }
  }

  /**
   * Dry run: a write would succeed if the document is there and writable.
   * Deleting a document that is already gone succeeds, as it does for real.
   */
  private async preflight(action: Action, url: RemoteUrl): Promise<ActionReport> {
    let writable: boolean;
    try {
      writable = await this.deps.server.canWrite(url);
    } catch (err) {
      if (!(err instanceof DocumentNotFoundError)) throw err;
      return action.kind === "delete"
        ? { ...action, outcome: "success", location: url }
        : { ...action, outcome: "fail", location: url, reason: "document not found" };
    }
    return writable
      ? { ...action, outcome: "success", location: url }
      : { ...action, outcome: "fail", location: url, reason: "missing write permission" };
  }

  private async writeIndex(action: Extract<Action, { kind: "create" | "update" }>): Promise<ActionReport> {
    const content = this.indexDocument();
    if (action.kind === "update") {
      if (this.options.dryRun) return await this.preflight(action, action.remoteId);
      await this.deps.server.update(action.remoteId, content);
      this.published = content;
      return { ...action, outcome: "success", location: action.remoteId };
    }
    if (this.options.dryRun) return { ...action, outcome: "success" };
    const url = await this.deps.server.create({
      categoryId: this.options.categoryId,
      title: this.local.index.title,
      content,
    });
    this.indexUrl = url;
    this.published = content;
    return { ...action, outcome: "success", location: url };
  }

  /**
   * Remote entries whose deletion did not (yet) happen stay in the table so
   * a later run can still find and delete them.
   */
  private retainedGrafts(): Map<string, DocumentNode[]> {
    const localByPath = indexByPath(this.local.root);
    const remoteByPath = indexByPath(this.remote.root);
    const retained = new Set<string>();
    for (const a of this.plan) {
      if (a.kind !== "delete" || this.removed.has(pathKey(a.path))) continue;
      retained.add(pathKey(a.path));
    }
    // Keep the ancestors of retained entries that are not in the local tree.
    for (const key of [...retained]) {
      let parent = remoteByPath.get(key);
      while (parent && parent.path) {
        const parentKey = pathKey(parentDocPath(parent.path));
        if (!parentKey || localByPath.get(parentKey)?.kind === "group") break;
        retained.add(parentKey);
        parent = remoteByPath.get(parentKey);
      }
    }

    const prune = (n: DocumentNode): DocumentNode =>
      n.kind === "group"
        ? { ...n, children: n.children.filter((c) => retained.has(pathKey(c.path))).map(prune) }
        : n;

    const grafts = new Map<string, DocumentNode[]>();
    for (const n of preorder(this.remote.root)) {
      const key = pathKey(n.path);
      const parentKey = pathKey(parentDocPath(n.path));
      if (!retained.has(key) || retained.has(parentKey) || localByPath.has(key)) continue;
      if (parentKey && localByPath.get(parentKey)?.kind !== "group") continue;
      grafts.set(parentKey, [...(grafts.get(parentKey) ?? []), prune(n)]);
    }
    return grafts;
  }

  /** Local tree, plus retained remote entries, linked to every known remote id. */
  tableRoot(): GroupNode {
    return withRemoteIds(graft(this.local.root, this.retainedGrafts()), this.ids);
  }

  indexDocument(): string {
    return composeIndexDocument(this.local.index.content ?? "", this.tableRoot());
  }

  /** Write the regenerated table back when it differs from what is published. */
  async syncNavigationTable(): Promise<ActionReport | null> {
    const indexUrl = this.indexUrl;
    if (!indexUrl) return null;

    const content = this.indexDocument();
    if (this.published !== null && normalizeContent(this.published) === normalizeContent(content)) {
      return null;
    }

    const action: Action = { kind: "update", path: INDEX_PATH, remoteId: indexUrl, node: this.local.index };
    if (this.options.dryRun) return await this.execute(action);
    try {
      await this.deps.server.update(indexUrl, content);
      this.published = content;
      this.deps.notifier.info(`Navigation table written to ${indexUrl}`);
      return { ...action, outcome: "success", location: indexUrl };
    } catch (err) {
      const reason = errorMessage(err);
      this.deps.notifier.error(`Writing the navigation table to ${indexUrl} failed: ${reason}`);
      return { ...action, outcome: "fail", location: indexUrl, reason };
    }
  }
}

export function toUrlMap(reports: readonly ActionReport[]): Record<string, Outcome> {
  const urls: Record<string, Outcome> = {};
  for (const r of reports) {
    if (r.location && r.kind !== "no-op") urls[r.location] = r.outcome;
  }
  return urls;
}

export async function runAll(
  plan: readonly Action[],
  trees: { local: DocumentTree; remote: DocumentTree },
  deps: ExecutorDeps,
  options: ExecutorOptions,
): Promise<ExecutionResult> {
  const { notifier } = deps;
  const executor = new ActionExecutor(deps, trees, plan, options);
  const reports: ActionReport[] = [];

  if (options.dryRun) notifier.info("Dry run: no changes will be made on the server");

  for (const action of plan) {
    if (options.signal?.aborted) {
      reports.push({ ...action, outcome: "skip", location: locationOf(action), reason: "cancelled" });
      continue;
    }
    const report = await executor.execute(action);
    const line = `${report.kind} ${report.path || "/"}: ${report.outcome}${report.location ? ` (${report.location})` : ""}`;
    if (report.kind === "no-op") notifier.debug(line);
    else notifier.info(line);
    reports.push(report);
  }

  // After cancellation the table still records every action that went through.
  const applied = reports.some((r) => r.kind !== "no-op" && r.outcome === "success");
  if (!options.signal?.aborted || applied) {
    const tableReport = await executor.syncNavigationTable();
    if (tableReport) reports.push(tableReport);
  }

  return { reports, urls: toUrlMap(reports), failed: reports.some((r) => r.outcome === "fail") };
}
