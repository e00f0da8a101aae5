// Diffs the local tree against the remote tree into an ordered action plan.
//
// Identity is the case-normalized path; a rename is a delete plus a create.
// Creates, updates and no-ops follow the local tree in pre-order so groups
// come before their children; deletes follow the remote tree in post-order
// so children go before their groups.

import type { Action, DocumentNode, DocumentTree, PageNode } from "../domain/entities.ts";
import { indexByPath, pathKey, postorder, preorder } from "../tree/tree-utils.ts";
import type { RemoteUrl } from "../utils/types.ts";

export interface ReconcileOptions {
  /** Report remote-only paths as skipped deletes instead of deleting them. */
  deleteSuppressed: boolean;
}

function comparePage(local: PageNode, remote: PageNode): Action {
  if (!remote.remoteId) return { kind: "create", path: local.path, node: local };
  const unchanged = local.fingerprint !== null &&
    remote.fingerprint !== null &&
    local.fingerprint === remote.fingerprint;
  return unchanged
    ? { kind: "no-op", path: local.path, nodeKind: "page", remoteId: remote.remoteId }
    : { kind: "update", path: local.path, remoteId: remote.remoteId, node: local };
}

function compare(local: DocumentNode, remote: DocumentNode | undefined): Action {
  if (!remote || remote.kind !== local.kind) return { kind: "create", path: local.path, node: local };
  if (local.kind === "page" && remote.kind === "page") return comparePage(local, remote);
  return { kind: "no-op", path: local.path, nodeKind: local.kind };
}

export function reconcile(
  local: DocumentTree,
  remote: DocumentTree,
  options: ReconcileOptions,
): Action[] {
  const remoteByPath = indexByPath(remote.root);
  const localByPath = indexByPath(local.root);

  const plan: Action[] = [compare(local.index, remote.index)];

  for (const node of preorder(local.root)) {
    plan.push(compare(node, remoteByPath.get(pathKey(node.path))));
  }

  for (const node of postorder(remote.root)) {
    const counterpart = localByPath.get(pathKey(node.path));
    if (counterpart && counterpart.kind === node.kind) continue;
    plan.push({
      kind: "delete",
      path: node.path,
      nodeKind: node.kind,
      ...(node.kind === "page" && node.remoteId ? { remoteId: node.remoteId } : {}),
      suppressed: options.deleteSuppressed,
    });
  }

  return plan;
}

/** Remote ids the regenerated table can reuse: pages that stay pages keep theirs. */
export function retainedRemoteIds(plan: readonly Action[]): Map<string, RemoteUrl> {
  const ids = new Map<string, RemoteUrl>();
  for (const a of plan) {
    if ((a.kind === "update" || a.kind === "no-op") && a.remoteId) ids.set(pathKey(a.path), a.remoteId);
  }
  return ids;
}

export function hasChanges(plan: readonly Action[]): boolean {
  return plan.some((a) => a.kind !== "no-op");
}
