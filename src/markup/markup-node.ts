import { parse, HTMLElement as NHPHTMLElement, TextNode as NHPTextNode } from "node-html-parser";
import { IGNORED_TAGS } from "../constants.js";
import type { MarkupNode } from "../types.js";

// Keep script/style bodies as raw text instead of parsing them; everything else (pre included) is parsed.
const PARSE_OPTIONS = {
  comment: false,
  blockTextElements: { script: true, style: true, noscript: true },
};

/**
 * Parses an HTML string with node-html-parser, preserving the options used for whole pages.
 */
export function parseHtml(html: string): NHPHTMLElement {
  return parse(html, PARSE_OPTIONS);
}

/**
 * Converts a node-html-parser element into the MarkupNode model.
 * Text nodes before the first element child become `text`; text after a child becomes its `tail`.
 */
export function toMarkupNode(element: NHPHTMLElement): MarkupNode {
  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(element.attributes)) {
    const name = key.toLowerCase();
    if (!(name in attributes)) {
      attributes[name] = value;
    }
  }

  const children: MarkupNode[] = [];
  let leading = "";
  let tail = "";

  for (const child of element.childNodes) {
    if (child instanceof NHPHTMLElement) {
      if (children.length > 0 && tail) {
        children[children.length - 1].tail = tail;
      }
      tail = "";
      children.push(toMarkupNode(child));
    } else if (child instanceof NHPTextNode) {
      if (children.length === 0) {
        leading += child.text;
      } else {
        tail += child.text;
      }
    }
  }
  if (children.length > 0 && tail) {
    children[children.length - 1].tail = tail;
  }

  const node: MarkupNode = {
    tag: (element.rawTagName || "").toLowerCase(),
    attributes,
    children,
  };
  if (leading) {
    node.text = leading;
  }
  return node;
}

/**
 * Parses an HTML fragment and returns it wrapped in a synthetic root (tag `""`).
 */
export function parseMarkup(html: string): MarkupNode {
  return toMarkupNode(parseHtml(html));
}

/**
 * Visits every text chunk below `node` in document order (leading text, then each child subtree and its tail).
 * The node's own tail is not part of its content; script and style bodies are left out.
 */
export function collectTexts(node: MarkupNode, out: string[] = []): string[] {
  if (node.text) out.push(node.text);
  for (const child of node.children) {
    if (!IGNORED_TAGS.includes(child.tag)) collectTexts(child, out);
    if (child.tail) out.push(child.tail);
  }
  return out;
}

/**
 * Flattened text content: every descendant text trimmed, blanks dropped, joined with single spaces.
 */
export function flattenText(node: MarkupNode): string {
  return collectTexts(node)
    .map((chunk) => chunk.trim())
    .filter(Boolean)
    .join(" ");
}

/**
 * Depth-first, document-order search for descendants (excluding `node` itself) that satisfy `predicate`.
 */
export function findDescendants(node: MarkupNode, predicate: (candidate: MarkupNode) => boolean): MarkupNode[] {
  const matches: MarkupNode[] = [];
  const stack: MarkupNode[] = [...node.children].reverse();
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (predicate(current)) matches.push(current);
    for (let i = current.children.length - 1; i >= 0; i--) {
      stack.push(current.children[i]);
    }
  }
  return matches;
}
