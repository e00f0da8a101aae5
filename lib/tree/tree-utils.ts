// Traversal and rebuild helpers over immutable DocumentTree snapshots.

import type { DocumentNode, DocumentTree, GroupNode } from "../domain/entities.ts";
import { asDocPath, type DocPath, type RemoteUrl } from "../utils/types.ts";

/** Case-normalized identity used for every path comparison. */
export function pathKey(path: DocPath | string): string {
  return path.toLowerCase();
}

export function joinDocPath(parent: DocPath, segment: string): DocPath {
  return asDocPath(parent ? `${parent}/${segment}` : segment);
}

export function parentDocPath(path: DocPath): DocPath {
  const idx = path.lastIndexOf("/");
  return asDocPath(idx < 0 ? "" : path.slice(0, idx));
}

/** Depth-first pre-order, root excluded. */
export function preorder(root: GroupNode): DocumentNode[] {
  const out: DocumentNode[] = [];
  function visit(n: DocumentNode) {
    out.push(n);
    if (n.kind === "group") n.children.forEach(visit);
  }
  root.children.forEach(visit);
  return out;
}

/** Depth-first post-order (children before parents), root excluded. */
export function postorder(root: GroupNode): DocumentNode[] {
  const out: DocumentNode[] = [];
  function visit(n: DocumentNode) {
    if (n.kind === "group") n.children.forEach(visit);
    out.push(n);
  }
  root.children.forEach(visit);
  return out;
}

export function indexByPath(root: GroupNode): Map<string, DocumentNode> {
  return new Map(preorder(root).map((n) => [pathKey(n.path), n]));
}

/** Rebuild a subtree bottom-up; `fn` sees the node with its children already mapped. */
export function mapTree(root: GroupNode, fn: (node: DocumentNode) => DocumentNode): GroupNode {
  function rec(n: DocumentNode): DocumentNode {
    if (n.kind === "group") return fn({ ...n, children: n.children.map(rec) });
    return fn(n);
  }
  return { ...root, children: root.children.map(rec) };
}

/** Assign remote ids by path key; nodes without an entry keep what they had. */
export function withRemoteIds(root: GroupNode, ids: ReadonlyMap<string, RemoteUrl>): GroupNode {
  return mapTree(root, (n) => {
    const id = n.kind === "page" ? ids.get(pathKey(n.path)) : undefined;
    return id ? { ...n, remoteId: id } : n;
  });
}

/** Append `grafts` (keyed by parent path key) to the matching groups, root included. */
export function graft(
  root: GroupNode,
  grafts: ReadonlyMap<string, readonly DocumentNode[]>,
): GroupNode {
  function rec(g: GroupNode): GroupNode {
    const extra = grafts.get(pathKey(g.path)) ?? [];
    const children = [...g.children, ...extra].map((c) => (c.kind === "group" ? rec(c) : c));
    return { ...g, children };
  }
  return rec(root);
}

export function countNodes(tree: DocumentTree): { groups: number; pages: number } {
  let groups = 0;
  let pages = 0;
  for (const n of preorder(tree.root)) {
    if (n.kind === "group") groups += 1;
    else pages += 1;
  }
  return { groups, pages };
}
