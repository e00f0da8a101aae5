// Builds the remote DocumentTree: fetch the index document, decode its
// navigation table, then fetch every referenced page to fingerprint it.

import {
  INDEX_PATH,
  makeFingerprint,
  ROOT_PATH,
  type DocumentTree,
} from "../domain/entities.ts";
import { errorMessage, RemoteUnavailableError } from "../domain/errors.ts";
import { decodeTable, splitIndexDocument } from "../navigation/navigation-table.ts";
import type { Notifier } from "../notifier/Notifier.ts";
import type { IDocumentServer } from "../ports/ports.ts";
import type { RemoteUrl } from "../utils/types.ts";
import { DEFAULT_ROOT_TITLE } from "./local-tree.ts";
import { mapTree, preorder } from "./tree-utils.ts";

export interface RemoteTreeOptions {
  rootTitle?: string;
  notifier?: Notifier;
}

/** Tree for a project that has no remote documentation yet. */
export function emptyRemoteTree(rootTitle = DEFAULT_ROOT_TITLE): DocumentTree {
  return {
    root: { kind: "group", path: ROOT_PATH, title: rootTitle, level: 0, children: [] },
    index: { kind: "page", path: INDEX_PATH, title: rootTitle, level: 0, content: null, fingerprint: null },
  };
}

export async function buildRemoteTree(
  server: IDocumentServer,
  indexUrl: RemoteUrl | undefined,
  options: RemoteTreeOptions = {},
): Promise<DocumentTree> {
  const rootTitle = options.rootTitle ?? DEFAULT_ROOT_TITLE;
  if (!indexUrl) return emptyRemoteTree(rootTitle);

  let source: string;
  try {
    source = await server.get(indexUrl);
  } catch (err) {
    throw new RemoteUnavailableError(
      `Index document ${indexUrl} could not be retrieved: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  const { body, table } = splitIndexDocument(source);
  const skeleton = decodeTable(table ?? "", rootTitle);

  const contents = new Map<RemoteUrl, string | null>();
  for (const node of preorder(skeleton)) {
    if (node.kind !== "page" || !node.remoteId) continue;
    try {
      contents.set(node.remoteId, await server.get(node.remoteId));
    } catch (err) {
      options.notifier?.warn(
        `Content of ${node.remoteId} could not be retrieved, treating it as changed: ${errorMessage(err)}`,
      );
      contents.set(node.remoteId, null);
    }
  }

  const root = mapTree(skeleton, (n) => {
    if (n.kind !== "page" || !n.remoteId) return n;
    const content = contents.get(n.remoteId) ?? null;
    return { ...n, content, fingerprint: content === null ? null : makeFingerprint(content) };
  });

  options.notifier?.debug(`Remote tree: ${contents.size} page(s) referenced from ${indexUrl}`);
  return {
    root,
    index: {
      kind: "page",
      path: INDEX_PATH,
      title: rootTitle,
      level: 0,
      remoteId: indexUrl,
      content: body,
      fingerprint: makeFingerprint(body),
    },
    source,
  };
}
