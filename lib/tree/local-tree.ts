// Builds the local DocumentTree from the documentation directory.
// Directories become groups, .md files pages, index.md at the root is the
// index document. Sibling order comes from the index file's contents list,
// else from a navigation table kept in the index file, else alphabetical;
// unlisted entries always follow listed ones, alphabetically.

import * as path from "node:path";
import {
  INDEX_PATH,
  makeFingerprint,
  ROOT_PATH,
  type DocumentNode,
  type DocumentTree,
} from "../domain/entities.ts";
import { InvalidStructureError } from "../domain/errors.ts";
import { parseContentsList } from "../navigation/contents-list.ts";
import { decodeTable, splitIndexDocument } from "../navigation/navigation-table.ts";
import type { Notifier } from "../notifier/Notifier.ts";
import type { IFileSystem } from "../ports/ports.ts";
import { firstHeading, titleFromName } from "../utils/markdown.ts";
import { asPath, type DocPath, type Path } from "../utils/types.ts";
import { joinDocPath, pathKey, preorder } from "./tree-utils.ts";

export const DOCUMENTATION_INDEX_FILENAME = "index.md";
export const DOC_FILE_EXTENSION = ".md";
export const DEFAULT_ROOT_TITLE = "Documentation";

interface ListingEntry {
  readonly rank: number;
  readonly title: string;
}

type Listing = ReadonlyMap<string, ListingEntry>;

export interface LocalTreeOptions {
  /** Used when the index file has no first-level heading. */
  rootTitle?: string;
  notifier?: Notifier;
}

function listingFor(body: string, table: string | null): { listing: Listing; strict: boolean } {
  const items = parseContentsList(body);
  if (items.length > 0) {
    return {
      listing: new Map(items.map((i) => [pathKey(i.path), { rank: i.rank, title: i.title }])),
      strict: true,
    };
  }
  if (table !== null) {
    const nodes = preorder(decodeTable(table, ""));
    return {
      listing: new Map(nodes.map((n, rank) => [pathKey(n.path), { rank, title: n.title }])),
      strict: false,
    };
  }
  return { listing: new Map(), strict: false };
}

interface Entry {
  readonly name: string;
  readonly node: DocumentNode;
}

function sortEntries(entries: Entry[], listing: Listing): DocumentNode[] {
  const rankOf = (e: Entry) => listing.get(pathKey(e.node.path))?.rank;
  const listed = entries
    .filter((e) => rankOf(e) !== undefined)
    .sort((a, b) => (rankOf(a) ?? 0) - (rankOf(b) ?? 0));
  const unlisted = entries
    .filter((e) => rankOf(e) === undefined)
    .sort((a, b) => a.name.localeCompare(b.name));
  return [...listed, ...unlisted].map((e) => e.node);
}

export async function buildLocalTree(
  fs: IFileSystem,
  docsDir: Path,
  options: LocalTreeOptions = {},
): Promise<DocumentTree> {
  const indexFile = asPath(path.join(docsDir, DOCUMENTATION_INDEX_FILENAME));
  if (!(await fs.exists(indexFile))) {
    throw new InvalidStructureError(
      `Index file ${DOCUMENTATION_INDEX_FILENAME} is missing from ${docsDir}`,
    );
  }

  const raw = await fs.readText(indexFile);
  const { body, table } = splitIndexDocument(raw);
  const { listing, strict } = listingFor(body, table);
  // The index document owns its path; nothing else may take it.
  const sources = new Map<string, string>([[pathKey(INDEX_PATH), DOCUMENTATION_INDEX_FILENAME]]);

  function register(docPath: DocPath, source: string) {
    const key = pathKey(docPath);
    const previous = sources.get(key);
    if (previous !== undefined) {
      throw new InvalidStructureError(`${previous} and ${source} map to the same path`, {
        path: docPath,
      });
    }
    sources.set(key, source);
  }

  async function walk(dirPath: DocPath, dir: string, level: number): Promise<DocumentNode[]> {
    const entries: Entry[] = [];
    for (const e of await fs.list(asPath(dir))) {
      if (e.name.startsWith(".")) continue;
      // "|" and "\\" cannot be written into a navigation table row.
      if (/[|\\]/.test(e.name)) {
        throw new InvalidStructureError(`${JSON.stringify(e.name)} in ${dir} contains "|" or "\\"`);
      }
      const abs = path.join(dir, e.name);
      const rel = path.relative(docsDir, abs).split(path.sep).join("/");

      if (e.isDirectory) {
        const docPath = joinDocPath(dirPath, e.name);
        register(docPath, rel);
        const children = await walk(docPath, abs, level + 1);
        const title = listing.get(pathKey(docPath))?.title || titleFromName(e.name);
        entries.push({ name: e.name, node: { kind: "group", path: docPath, title, level, children } });
      } else if (e.isFile && path.extname(e.name) === DOC_FILE_EXTENSION) {
        if (level === 1 && e.name === DOCUMENTATION_INDEX_FILENAME) continue;
        const name = e.name.slice(0, -DOC_FILE_EXTENSION.length);
        const docPath = joinDocPath(dirPath, name);
        register(docPath, rel);
        const content = await fs.readText(asPath(abs));
        const title = listing.get(pathKey(docPath))?.title || firstHeading(content) || titleFromName(name);
        entries.push({
          name,
          node: {
            kind: "page",
            path: docPath,
            title,
            level,
            content,
            fingerprint: makeFingerprint(content),
          },
        });
      }
    }
    return sortEntries(entries, listing);
  }

  const children = await walk(ROOT_PATH, docsDir, 1);

  if (strict) {
    for (const [key] of listing) {
      if (!sources.has(key)) {
        throw new InvalidStructureError(
          `The contents of ${DOCUMENTATION_INDEX_FILENAME} refer to a missing file or directory`,
          { path: key },
        );
      }
    }
  }

  const rootTitle = firstHeading(body) ?? options.rootTitle ?? DEFAULT_ROOT_TITLE;
  const tree: DocumentTree = {
    root: { kind: "group", path: ROOT_PATH, title: rootTitle, level: 0, children },
    index: {
      kind: "page",
      path: INDEX_PATH,
      title: rootTitle,
      level: 0,
      content: body,
      fingerprint: makeFingerprint(body),
    },
  };
  options.notifier?.debug(`Local tree: ${sources.size - 1} entries under ${docsDir}`);
  return tree;
}
