// "# Contents" section of the local index file: a markdown list that fixes
// the order and listing titles of local entries.
//
//   # Contents
//   1. [Tutorials](tutorials)
//     1. [Getting started](tutorials/getting-started.md)
//   1. [Reference](reference.md)

import { InvalidStructureError } from "../domain/errors.ts";

export interface ContentsItem {
  /** Nesting level, top-level items are 1. */
  readonly level: number;
  readonly title: string;
  /** Reference normalized to a logical path: no leading "./", no trailing "/", no ".md". */
  readonly path: string;
  readonly rank: number;
}

const CONTENTS_HEADING_RE = /^#\s+contents\s*$/i;
const ITEM_RE = /^( *)(?:\d+\.|\*|-)\s*\[(.*)\]\((.*)\)\s*$/;

export function normalizeReference(reference: string): string {
  return reference
    .trim()
    .replace(/\\/g, "/")
    .replace(/^\.\//, "")
    .replace(/\/+$/, "")
    .replace(/\.md$/i, "");
}

function contentsLines(body: string): string[] {
  const lines = body.split(/\r?\n/);
  const start = lines.findIndex((l) => CONTENTS_HEADING_RE.test(l.trim()));
  if (start < 0) return [];
  const out: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (line.startsWith("#")) break;
    if (line.trim()) out.push(line);
  }
  return out;
}

export function parseContentsList(body: string): ContentsItem[] {
  const items: ContentsItem[] = [];
  const indents: number[] = [];

  contentsLines(body).forEach((line, rank) => {
    const m = ITEM_RE.exec(line);
    if (!m) {
      throw new InvalidStructureError(
        `An item in the contents of the index file is invalid: ${JSON.stringify(line)}`,
      );
    }
    const indent = m[1].length;
    if (rank === 0 && indent !== 0) {
      throw new InvalidStructureError(
        `The first item in the contents of the index file must not be indented: ${JSON.stringify(line)}`,
      );
    }

    if (indents.length === 0 || indent > indents[indents.length - 1]) {
      indents.push(indent);
    } else {
      while (indents.length > 0 && indents[indents.length - 1] > indent) indents.pop();
      if (indents[indents.length - 1] !== indent) {
        throw new InvalidStructureError(
          `Inconsistent indentation in the contents of the index file: ${JSON.stringify(line)}`,
        );
      }
    }

    const path = normalizeReference(m[3]);
    const depth = path.split("/").length;
    if (!path || depth !== indents.length) {
      throw new InvalidStructureError(
        `Contents item ${JSON.stringify(line)} is nested at level ${indents.length} but refers to a path at level ${path ? depth : 0}`,
      );
    }
    items.push({ level: indents.length, title: m[2].trim(), path, rank });
  });

  return items;
}
