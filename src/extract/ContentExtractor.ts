import type { ExtractionResult, ExtractorOptions, MarkupNode } from "../types.js";
import {
  CAPTION_STYLE_FRAGMENTS,
  COUNTDOWN_LABEL,
  DEFAULT_MAX_DEPTH,
  EMBED_MARKER,
  EXTRACTION_FAILED_TEXT,
  FULL_RESOLUTION_ATTRIBUTE,
  LINK_LABEL,
  MAX_COUNTDOWN_YEAR,
  REGEX_SCRIPT_HREF,
  REGEX_TIMESTAMP,
  SKIPPED_CLASS_FRAGMENTS,
  WIDGET_LABEL,
} from "../constants.js";
import { findDescendants, flattenText } from "../markup/markup-node.js";
import { formatLocalDateTime } from "../utils/time.js";
import { classifyNode } from "./tag-classifier.js";
import { collectTags } from "./tag-collector.js";
import { assembleText } from "./text-assembler.js";
import { isDataUri, resolveUrl } from "./url-resolver.js";

/**
 * Mutable state of one `extract()` call. Never shared between calls.
 */
interface ExtractionContext {
  baseUrl: string;
  fragments: string[];
  images: string[];
  /** Armed after a storefront widget marker; cleared by the caption it swallows. */
  suppressCaption: boolean;
  depthLimitReported: boolean;
}

/**
 * Result returned when the post body cannot be walked at all.
 */
export function extractionFailure(): ExtractionResult {
  return { text: EXTRACTION_FAILED_TEXT, images: [], tags: [] };
}

/**
 * ContentExtractor - turns the message body of one forum post into annotated plain text.
 *
 * Headings, quotes, emphasis, links, storefront widgets and countdown frames are rendered as
 * short text markers; scripts, styles and decorative wrappers are dropped. Image sources and
 * inline tags are collected alongside the text.
 */
export class ContentExtractor {
  private readonly options: Required<ExtractorOptions>;

  private static readonly DEFAULT_OPTIONS: Required<ExtractorOptions> = {
    maxDepth: DEFAULT_MAX_DEPTH,
    dedupeImages: false,
    storefrontTokens: ["steam"],
    storefrontLabel: "Steam",
    countdownTokens: ["countdown"],
    linkPlatforms: [{ token: "steam", label: "Steam" }],
  };

  constructor(options: ExtractorOptions = {}) {
    const merged = { ...ContentExtractor.DEFAULT_OPTIONS, ...options };
    this.options = {
      ...merged,
      storefrontTokens: merged.storefrontTokens.map((token) => token.toLowerCase()),
      countdownTokens: merged.countdownTokens.map((token) => token.toLowerCase()),
      linkPlatforms: merged.linkPlatforms.map((platform) => ({ ...platform, token: platform.token.toLowerCase() })),
    };
  }

  /**
   * Extracts text, images and tags from a post body.
   *
   * @param root The message-body element of one post.
   * @param baseUrl Forum origin used to resolve relative links and image paths.
   * @returns The extraction result; the sentinel result when `root` is missing or the walk fails.
   */
  extract(root: MarkupNode | null | undefined, baseUrl: string): ExtractionResult {
    if (!root) {
      console.warn("ContentExtractor: no message body to extract.");
      return extractionFailure();
    }

    try {
      const context: ExtractionContext = {
        baseUrl,
        fragments: [],
        images: [],
        suppressCaption: false,
        depthLimitReported: false,
      };
      this.walk(root, context, 0);

      return {
        text: assembleText(context.fragments),
        images: [...context.images],
        tags: collectTags(root),
      };
    } catch (error: unknown) {
      console.error("ContentExtractor: failed to extract message body:", error);
      return extractionFailure();
    }
  }

  private walk(node: MarkupNode, context: ExtractionContext, depth: number): void {
    this.pushText(context, node.text);

    if (depth >= this.options.maxDepth) {
      if (!context.depthLimitReported) {
        context.depthLimitReported = true;
        console.warn(`ContentExtractor: nesting deeper than ${this.options.maxDepth} levels, skipping the rest.`);
      }
      return;
    }

    for (const child of node.children) {
      try {
        this.handleChild(child, context, depth + 1);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`ContentExtractor: could not apply <${child.tag}> rule (${message}), using plain text.`);
        this.walk(child, context, depth + 1);
      }
      this.pushText(context, child.tail);
    }
  }

  private handleChild(child: MarkupNode, context: ExtractionContext, depth: number): void {
    const kind = classifyNode(child);
    switch (kind) {
      case "image":
        this.collectImage(child, context);
        return;
      case "link":
        this.handleLink(child, context);
        return;
      case "frame":
        this.handleFrame(child, context);
        return;
      case "heading":
        this.pushWrapped(context, flattenText(child), "\n**", "**\n");
        return;
      case "quote": {
        const quoted = flattenText(child)
          .split("\n")
          .filter((line) => line.trim())
          .map((line) => `> ${line}`);
        if (quoted.length > 0) {
          context.fragments.push(`\n${quoted.join("\n")}\n`);
        }
        return;
      }
      case "lineBreak":
        context.fragments.push("\n");
        return;
      case "inline":
        if (this.isRedundantCaption(child, context)) {
          context.suppressCaption = false;
          return;
        }
        if (!this.isDecorative(child)) this.walk(child, context, depth);
        return;
      case "block":
        if (!this.isDecorative(child)) this.walk(child, context, depth);
        return;
      case "bold":
        this.pushWrapped(context, flattenText(child), "**", "**");
        return;
      case "italic":
        this.pushWrapped(context, flattenText(child), "*", "*");
        return;
      case "paragraph":
        this.pushWrapped(context, flattenText(child), "\n", "\n");
        return;
      case "ignored":
        return;
      case "transparent":
        this.walk(child, context, depth);
        return;
      default: {
        const unhandled: never = kind;
        throw new Error(`Unhandled node kind: ${String(unhandled)}`);
      }
    }
  }

  private collectImage(node: MarkupNode, context: ExtractionContext): void {
    const source = node.attributes[FULL_RESOLUTION_ATTRIBUTE]?.trim();
    if (!source || isDataUri(source)) return;

    const url = resolveUrl(context.baseUrl, source);
    if (this.options.dedupeImages && context.images.includes(url)) return;
    context.images.push(url);
  }

  private handleLink(node: MarkupNode, context: ExtractionContext): void {
    const href = (node.attributes.href ?? "").trim();
    const text = flattenText(node);
    const lowerHref = href.toLowerCase();

    const platform = this.options.linkPlatforms.find((candidate) => lowerHref.includes(candidate.token));
    if (platform) {
      context.fragments.push(`[${platform.label}${LINK_LABEL}: ${text || href}]`);
    } else if (href.startsWith("#")) {
      this.pushText(context, text);
    } else if (REGEX_SCRIPT_HREF.test(href)) {
      return;
    } else if (href && text) {
      context.fragments.push(`[${LINK_LABEL}: ${text} - ${resolveUrl(context.baseUrl, href)}]`);
    } else {
      this.pushText(context, text);
    }
  }

  private handleFrame(node: MarkupNode, context: ExtractionContext): void {
    const src = (node.attributes.src ?? "").trim();
    const lowerSrc = src.toLowerCase();

    if (this.options.storefrontTokens.some((token) => lowerSrc.includes(token))) {
      const pageUrl = src.split("?")[0].replace(/\/widget(?=\/|$)/g, "/app");
      context.fragments.push(`[${this.options.storefrontLabel}${WIDGET_LABEL}: ${pageUrl}]`);
      context.suppressCaption = true;
      return;
    }

    if (this.options.countdownTokens.some((token) => lowerSrc.includes(token))) {
      const query = src.split("?")[1]?.split("#")[0] ?? "";
      const timestamp = new URLSearchParams(query).get("t");
      if (timestamp && REGEX_TIMESTAMP.test(timestamp)) {
        const target = new Date(Number(timestamp) * 1000);
        if (Number.isFinite(target.getTime()) && target.getFullYear() <= MAX_COUNTDOWN_YEAR) {
          context.fragments.push(`[${COUNTDOWN_LABEL}: ${formatLocalDateTime(target)}]`);
        }
      }
      return;
    }

    context.fragments.push(EMBED_MARKER);
  }

  // A caption rendered under a storefront widget repeats the widget's content.
  private isRedundantCaption(node: MarkupNode, context: ExtractionContext): boolean {
    if (!context.suppressCaption) return false;

    const style = node.attributes.style ?? "";
    if (!CAPTION_STYLE_FRAGMENTS.some((fragment) => style.includes(fragment))) return false;

    const tokens = this.options.storefrontTokens;
    const text = flattenText(node).toLowerCase();
    if (tokens.some((token) => text.includes(token))) return true;

    const platformLinks = findDescendants(
      node,
      (candidate) =>
        candidate.tag === "a" && tokens.some((token) => (candidate.attributes.href ?? "").toLowerCase().includes(token))
    );
    return platformLinks.length > 0;
  }

  private isDecorative(node: MarkupNode): boolean {
    const className = node.attributes.class ?? "";
    return SKIPPED_CLASS_FRAGMENTS.some((fragment) => className.includes(fragment));
  }

  private pushText(context: ExtractionContext, text: string | undefined): void {
    const trimmed = text?.trim();
    if (trimmed) context.fragments.push(trimmed);
  }

  private pushWrapped(context: ExtractionContext, text: string, prefix: string, suffix: string): void {
    if (text) context.fragments.push(`${prefix}${text}${suffix}`);
  }
}

/**
 * Extracts one post body with a fresh ContentExtractor.
 */
export function extractContent(
  root: MarkupNode | null | undefined,
  baseUrl: string,
  options?: ExtractorOptions
): ExtractionResult {
  return new ContentExtractor(options).extract(root, baseUrl);
}
