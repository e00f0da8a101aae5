// Turns a remote tree into the local file layout that would produce it:
// groups become directories, pages become .md files, and index.md carries
// the index body followed by the regenerated navigation table.

import type { DocumentTree } from "../domain/entities.ts";
import { InvalidStructureError } from "../domain/errors.ts";
import { composeIndexDocument } from "../navigation/navigation-table.ts";
import { DOC_FILE_EXTENSION, DOCUMENTATION_INDEX_FILENAME } from "../tree/local-tree.ts";
import { preorder } from "../tree/tree-utils.ts";

export interface FileWrite {
  /** Relative to the documentation directory, "/"-separated. */
  readonly path: string;
  readonly content: string;
}

export interface MigrationPlan {
  /** Parents before children. */
  readonly directories: readonly string[];
  readonly files: readonly FileWrite[];
}

export function planMigration(remote: DocumentTree): MigrationPlan {
  const directories: string[] = [];
  const files: FileWrite[] = [
    {
      path: DOCUMENTATION_INDEX_FILENAME,
      content: composeIndexDocument(remote.index.content ?? "", remote.root),
    },
  ];

  for (const node of preorder(remote.root)) {
    if (node.kind === "group") {
      directories.push(node.path);
      continue;
    }
    // Rows that were never published have nothing to download.
    if (!node.remoteId) continue;
    if (node.content === null) {
      throw new InvalidStructureError(
        `Content of ${node.remoteId} could not be retrieved; refusing to migrate an incomplete tree`,
        { path: node.path },
      );
    }
    files.push({ path: `${node.path}${DOC_FILE_EXTENSION}`, content: node.content });
  }

  return { directories, files };
}
