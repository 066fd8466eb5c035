import { HEADING_TAGS, IGNORED_TAGS } from "../constants.js";
import type { MarkupNode } from "../types.js";

/**
 * The handling rule a node receives during extraction.
 */
export type NodeKind =
  | "image"
  | "link"
  | "frame"
  | "heading"
  | "quote"
  | "lineBreak"
  | "inline"
  | "block"
  | "bold"
  | "italic"
  | "paragraph"
  | "ignored"
  | "transparent";

/**
 * Maps a node to its handling rule. Checked in priority order; the first match wins.
 */
export function classifyNode(node: MarkupNode): NodeKind {
  const tag = node.tag;
  switch (tag) {
    case "img":
      return "image";
    case "a":
      return "link";
    case "iframe":
      return "frame";
    case "blockquote":
      return "quote";
    case "br":
      return "lineBreak";
    case "span":
      return "inline";
    case "div":
      return "block";
    case "strong":
    case "b":
      return "bold";
    case "em":
    case "i":
      return "italic";
  }

  if (HEADING_TAGS.includes(tag)) {
    return "heading";
  }
  if (tag === "p" && node.text?.trim()) {
    return "paragraph";
  }
  if (IGNORED_TAGS.includes(tag)) {
    return "ignored";
  }
  return "transparent";
}
