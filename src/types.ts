/**
 * A parsed element of a post body. Produced by `toMarkupNode()`; the extraction core only reads it.
 */
export interface MarkupNode {
  /** Lower-cased tag name. Empty for a synthetic document root. */
  tag: string;
  /** Attribute map with lower-cased keys and decoded values. */
  attributes: Readonly<Record<string, string>>;
  /** Text before the first child element. */
  text?: string;
  /** Child elements in document order. */
  children: ReadonlyArray<MarkupNode>;
  /** Text following this node, before its next sibling. */
  tail?: string;
}

/**
 * Defines the structure for the result of extracting one post body.
 */
export interface ExtractionResult {
  /** The assembled, whitespace-normalised text. */
  text: string;
  /** Absolute image URLs in document order. */
  images: string[];
  /** Inline tag strings in document order. */
  tags: string[];
}

/**
 * An external link platform recognised by its domain token.
 */
export interface LinkPlatform {
  /** Lower-case substring matched against the link href. */
  token: string;
  /** Label rendered in the marker, e.g. `[Steam链接: ...]`. */
  label: string;
}

/**
 * Configuration options for the ContentExtractor.
 */
export interface ExtractorOptions {
  /**
   * Depth beyond which the walk stops descending.
   * @default 256
   */
  maxDepth?: number;
  /**
   * If true, an image URL already collected is not appended again.
   * @default false
   */
  dedupeImages?: boolean;
  /**
   * Domain tokens identifying game-storefront widget frames. Also used to decide whether
   * the caption following a widget mentions the same platform.
   * @default ["steam"]
   */
  storefrontTokens?: string[];
  /**
   * Label rendered in storefront widget markers.
   * @default "Steam"
   */
  storefrontLabel?: string;
  /**
   * Domain tokens identifying countdown widget frames.
   * @default ["countdown"]
   */
  countdownTokens?: string[];
  /**
   * External link platforms rendered as `[<label>链接: ...]`.
   * @default [{ token: "steam", label: "Steam" }]
   */
  linkPlatforms?: LinkPlatform[];
}

/**
 * Heavy fields of a post, populated by one call into the details loader.
 */
export interface PostDetails {
  content: string;
  publishTime: Date;
  images: string[];
  tags: string[];
}

/**
 * The identity of a post, available without loading its page.
 */
export interface PostSummary {
  id: number;
  title: string;
  url: string;
  author: string;
}

/**
 * Anything that can load the details of a post page. `ForumClient` is the production implementation.
 */
export interface PostDetailsLoader {
  loadPostDetails(url: string): Promise<PostDetails | null>;
}

/**
 * Configuration options for the ForumClient.
 */
export interface ForumClientOptions {
  /** Forum origin, e.g. `https://forum.example.com`. A trailing slash is ignored. */
  baseUrl: string;
  /** Optional headers to include in every request (e.g. a session `Cookie`). */
  headers?: Record<string, string>;
  /**
   * Maximum number of posts returned by `fetchLatestPosts()` when no limit is passed.
   * @default 10
   */
  maxPosts?: number;
  /** Options forwarded to the ContentExtractor. */
  extractor?: ExtractorOptions;
}
