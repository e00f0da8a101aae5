// Navigation table codec.
//
// The server has no hierarchy, so the tree is published as a flat markdown
// table at the end of the index document:
//
//   # Navigation
//
//   | Level | Path | Navlink |
//   | -- | -- | -- |
//   | 1 | how-to | [How-to guides]() |
//   | 2 | how-to-install | [Install](/t/install/42) |
//
// Rows are a pre-order walk of the tree (root excluded). Nesting is
// recovered from the level column with a stack of open ancestors.

import { ROOT_PATH, type DocumentNode, type GroupNode } from "../domain/entities.ts";
import { InvalidStructureError } from "../domain/errors.ts";
import { joinDocPath, pathKey } from "../tree/tree-utils.ts";
import { asRemoteUrl, type DocPath } from "../utils/types.ts";

export const NAVIGATION_HEADING = "# Navigation";
export const NAVIGATION_TABLE_HEADER = "| Level | Path | Navlink |";
export const NAVIGATION_TABLE_SEPARATOR = "| -- | -- | -- |";
/** Reference written for pages that have no remote document yet. */
export const PENDING_REFERENCE_PREFIX = "pending:";

export interface TableRow {
  readonly level: number;
  /** The node path with "/" replaced by "-". */
  readonly pathColumn: string;
  readonly title: string;
  /** Empty for groups. */
  readonly reference: string;
}

const HEADING_RE = /^#\s+navigation\s*$/i;
const HEADER_RE = /^\|\s*level\s*\|\s*path\s*\|\s*navlink\s*\|$/i;
const SEPARATOR_RE = /^\|\s*-+\s*\|\s*-+\s*\|\s*-+\s*\|$/;
const ROW_RE = /^\|\s*(\d+)\s*\|\s*([^|/]*?)\s*\|\s*\[([^\]]*)\]\s*\(\s*([^\s()\\]*)\s*\)\s*\|$/;

function escapeTitle(title: string): string {
  return title.replace(/&/g, "&amp;").replace(/\|/g, "&#124;").replace(/\]/g, "&#93;");
}

function unescapeTitle(title: string): string {
  return title.replace(/&#124;/g, "|").replace(/&#93;/g, "]").replace(/&amp;/g, "&");
}

/** Placeholder link of an unpublished page; percent-encoded so any file name fits in a link. */
export function pendingReference(path: string): string {
  const encoded = encodeURI(path).replace(/[()]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
  return `${PENDING_REFERENCE_PREFIX}${encoded}`;
}

/* ──────────────── Encode ──────────────── */

export function encodeRows(root: GroupNode): TableRow[] {
  const rows: TableRow[] = [];
  function visit(n: DocumentNode, level: number) {
    rows.push({
      level,
      pathColumn: n.path.replace(/\//g, "-"),
      title: n.title,
      reference: n.kind === "group" ? "" : (n.remoteId ?? pendingReference(n.path)),
    });
    if (n.kind === "group") n.children.forEach((c) => visit(c, level + 1));
  }
  root.children.forEach((c) => visit(c, 1));
  return rows;
}

export function renderRow(row: TableRow): string {
  return `| ${row.level} | ${row.pathColumn} | [${escapeTitle(row.title)}](${row.reference}) |`;
}

/** The navigation section (heading, header and rows) for a tree. */
export function renderTable(root: GroupNode): string {
  return [
    NAVIGATION_HEADING,
    "",
    NAVIGATION_TABLE_HEADER,
    NAVIGATION_TABLE_SEPARATOR,
    ...encodeRows(root).map(renderRow),
  ].join("\n");
}

/** Full index document: body followed by the navigation section. */
export function composeIndexDocument(body: string, root: GroupNode): string {
  const trimmed = body.trimEnd();
  return `${trimmed}${trimmed ? "\n\n" : ""}${renderTable(root)}\n`;
}

/* ──────────────── Decode ──────────────── */

/** Split an index document into its body and navigation section (null when absent). */
export function splitIndexDocument(content: string): { body: string; table: string | null } {
  const lines = content.split(/\r?\n/);
  let at = lines.findIndex((l) => HEADING_RE.test(l.trim()));
  if (at < 0) at = lines.findIndex((l) => HEADER_RE.test(l.trim()));
  if (at < 0) return { body: content, table: null };
  return { body: lines.slice(0, at).join("\n"), table: lines.slice(at).join("\n") };
}

/** True for lines that belong to the table layout but carry no row. */
export function isFillerLine(line: string): boolean {
  const t = line.trim();
  return !t || HEADING_RE.test(t) || HEADER_RE.test(t) || SEPARATOR_RE.test(t);
}

export function parseRow(line: string): TableRow {
  const m = ROW_RE.exec(line.trim());
  const title = m ? unescapeTitle(m[3]).trim() : "";
  if (!m || !m[2] || !title) {
    throw new InvalidStructureError(
      `Invalid navigation table row ${JSON.stringify(line)}; expected "| <level> | <path> | [<title>](<link>) |"`,
    );
  }
  return { level: Number(m[1]), pathColumn: m[2], title, reference: m[4] };
}

/**
 * Rows of a navigation section. Stops at the first non-table line after the
 * rows started; a line starting with "|" that is not a row is rejected.
 */
export function parseRows(table: string): TableRow[] {
  const rows: TableRow[] = [];
  for (const line of table.split(/\r?\n/)) {
    if (isFillerLine(line)) continue;
    if (!line.trim().startsWith("|")) {
      if (rows.length > 0) break;
      continue;
    }
    rows.push(parseRow(line));
  }
  return rows;
}

interface Frame {
  readonly path: DocPath;
  readonly pathColumn: string;
  /** null for pages, which cannot hold children. */
  readonly children: DocumentNode[] | null;
}

/**
 * Rebuild the hierarchy from rows. Content and fingerprints are left empty;
 * they live on the server, not in the table.
 */
export function decodeRows(rows: readonly TableRow[], rootTitle: string): GroupNode {
  const rootChildren: DocumentNode[] = [];
  const root: GroupNode = { kind: "group", path: ROOT_PATH, title: rootTitle, level: 0, children: rootChildren };
  const stack: Frame[] = [{ path: root.path, pathColumn: "", children: rootChildren }];
  const seenPaths = new Set<string>();
  const seenReferences = new Set<string>();

  rows.forEach((row, rank) => {
    const where = `navigation table row ${rank + 1}`;
    if (row.level < 1) {
      throw new InvalidStructureError(`Level must be at least 1 in ${where}, got ${row.level}`);
    }
    if (row.level > stack.length) {
      throw new InvalidStructureError(
        `Level jumps from ${stack.length - 1} to ${row.level} in ${where}`,
      );
    }
    stack.length = row.level;
    const parent = stack[row.level - 1];
    if (parent.children === null) {
      throw new InvalidStructureError(`Page ${parent.path} cannot contain entries (${where})`);
    }

    const prefix = parent.pathColumn ? `${parent.pathColumn}-` : "";
    const segment = prefix && row.pathColumn.startsWith(prefix) && row.pathColumn.length > prefix.length
      ? row.pathColumn.slice(prefix.length)
      : row.pathColumn;
    if (segment === "." || segment === ".." || segment.includes("\\")) {
      throw new InvalidStructureError(`Invalid path segment ${JSON.stringify(segment)} in ${where}`);
    }
    const path = joinDocPath(parent.path, segment);

    const key = pathKey(path);
    if (seenPaths.has(key)) throw new InvalidStructureError(`Duplicate path in ${where}`, { path });
    seenPaths.add(key);

    let node: DocumentNode;
    let children: DocumentNode[] | null = null;
    if (row.reference === "") {
      children = [];
      node = { kind: "group", path, title: row.title, level: row.level, children };
    } else {
      if (seenReferences.has(row.reference)) {
        throw new InvalidStructureError(`Duplicate reference ${row.reference} in ${where}`, { path });
      }
      seenReferences.add(row.reference);
      const pending = row.reference.startsWith(PENDING_REFERENCE_PREFIX);
      node = {
        kind: "page",
        path,
        title: row.title,
        level: row.level,
        content: null,
        fingerprint: null,
        ...(pending ? {} : { remoteId: asRemoteUrl(row.reference) }),
      };
    }
    parent.children.push(node);
    stack.push({ path, pathColumn: row.pathColumn, children });
  });

  return root;
}

export function decodeTable(table: string, rootTitle: string): GroupNode {
  return decodeRows(parseRows(table), rootTitle);
}
