import { findDescendants, flattenText } from "../markup/markup-node.js";
import type { MarkupNode } from "../types.js";

const TAG_CLASS = "tag";

function isTagMarker(node: MarkupNode): boolean {
  const className = node.attributes.class ?? "";
  if (node.tag === "span") return className === TAG_CLASS;
  if (node.tag === "a") return className.includes(TAG_CLASS);
  return false;
}

/**
 * Collects inline tag labels below `root`: `span.tag` elements and links whose class mentions `tag`.
 * One entry per marker, in document order, blanks dropped.
 */
export function collectTags(root: MarkupNode): string[] {
  return findDescendants(root, isTagMarker)
    .map((marker) => flattenText(marker))
    .filter(Boolean);
}
