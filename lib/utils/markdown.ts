// Markdown helpers: first-level heading extraction and filename titles.

import { unified } from "unified";
import remarkParse from "remark-parse";
import { visit } from "unist-util-visit";
import type { Heading, Root } from "mdast";

const parser = unified().use(remarkParse);

function headingText(heading: Heading): string {
  const parts: string[] = [];
  visit(heading, (node) => {
    if (node.type === "text" || node.type === "inlineCode") parts.push(node.value);
  });
  return parts.join("").replace(/\s+/g, " ").trim();
}

/** Text of the first `# heading` in the document, or null. */
export function firstHeading(markdown: string): string | null {
  const tree: Root = parser.parse(markdown);
  let found: string | null = null;
  visit(tree, "heading", (node) => {
    if (found !== null || node.depth !== 1) return;
    const text = headingText(node);
    if (text) found = text;
  });
  return found;
}

/** "getting-started_guide" -> "Getting Started Guide" */
export function titleFromName(name: string): string {
  return name
    .replace(/\.md$/i, "")
    .replace(/[-_]+/g, " ")
    .split(" ")
    .filter(Boolean)
    .map((w) => w[0].toUpperCase() + w.slice(1).toLowerCase())
    .join(" ");
}
