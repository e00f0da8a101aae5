// Tree node model shared by the local and remote hierarchies, plus the action
// vocabulary produced by reconciliation.

import { createHash } from "node:crypto";
import { asDocPath, type Brand, type DocPath, type RemoteUrl } from "../utils/types.ts";

export type Fingerprint = Brand<string, "Fingerprint">;

/** Logical path of the root group. */
export const ROOT_PATH: DocPath = asDocPath("");
/** Logical path of the index document paired with the root. */
export const INDEX_PATH: DocPath = asDocPath("index");

export type NodeKind = "group" | "page";

interface NodeBase {
  readonly path: DocPath;
  readonly title: string;
  /** Depth in the tree, root = 0. */
  readonly level: number;
  /** Set once the node is known to exist on the server. */
  readonly remoteId?: RemoteUrl;
}

export interface GroupNode extends NodeBase {
  readonly kind: "group";
  readonly children: readonly DocumentNode[];
}

export interface PageNode extends NodeBase {
  readonly kind: "page";
  /** null when the content could not be retrieved. */
  readonly content: string | null;
  readonly fingerprint: Fingerprint | null;
}

export type DocumentNode = GroupNode | PageNode;

/** Immutable snapshot of one side of a reconciliation run. */
export interface DocumentTree {
  readonly root: GroupNode;
  /** The index document; its content excludes the navigation table. */
  readonly index: PageNode;
  /** Raw index document as published (remote trees only). */
  readonly source?: string;
}

export type Outcome = "success" | "skip" | "fail";

export type Action =
  | { readonly kind: "create"; readonly path: DocPath; readonly node: DocumentNode }
  | {
    readonly kind: "update";
    readonly path: DocPath;
    readonly remoteId: RemoteUrl;
    readonly node: PageNode;
  }
  | {
    readonly kind: "delete";
    readonly path: DocPath;
    readonly nodeKind: NodeKind;
    /** Absent for groups and never-created pages: only the table row goes away. */
    readonly remoteId?: RemoteUrl;
    /** Delete suppression is on: report as skipped, leave the document alone. */
    readonly suppressed: boolean;
  }
  | {
    readonly kind: "no-op";
    readonly path: DocPath;
    readonly nodeKind: NodeKind;
    readonly remoteId?: RemoteUrl;
  };

export type ActionReport = Action & {
  readonly outcome: Outcome;
  /** The remote address acted upon, when one exists. */
  readonly location?: RemoteUrl;
  readonly reason?: string;
};

/** Line endings and trailing whitespace do not count as a content change. */
export function normalizeContent(content: string): string {
  return content.replace(/\r\n?/g, "\n").trimEnd();
}

export function makeFingerprint(content: string): Fingerprint {
  return createHash("sha256").update(normalizeContent(content), "utf8").digest("hex") as Fingerprint;
}
