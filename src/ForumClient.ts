import type { HTMLElement as NHPHTMLElement } from "node-html-parser";
import type { ExtractionResult, ForumClientOptions, PostDetails, PostDetailsLoader, PostSummary } from "./types.js";
import {
  COMMON_HEADERS,
  DEFAULT_MAX_POSTS,
  LATEST_THREADS_ANCHOR_ID,
  LATEST_THREADS_PATH,
  POST_ELEMENT_ID_PREFIX,
  POST_LIST_ID,
  POST_MESSAGE_ID_PREFIX,
  POST_TIME_ID_PREFIX,
  REGEX_LOGIN_PAGE,
  REGEX_THREAD_ID,
} from "./constants.js";
import { ForumError, ForumHttpError, toError } from "./errors.js";
import { ContentExtractor } from "./extract/ContentExtractor.js";
import { resolveUrl } from "./extract/url-resolver.js";
import { parseHtml, toMarkupNode } from "./markup/markup-node.js";
import { ForumPost } from "./ForumPost.js";
import { parseForumDateTime } from "./utils/time.js";

interface FetchedPage {
  html: string;
  url: string;
}

/**
 * ForumClient - reads thread listings and post pages from a Discuz-style forum with the standard `fetch` API.
 *
 * Authentication is the caller's concern: pass the session cookie through `headers`.
 * A listing that redirects to the login page raises `ERR_LOGIN_REQUIRED`.
 */
export class ForumClient implements PostDetailsLoader {
  private readonly options: Required<ForumClientOptions>;
  private readonly extractor: ContentExtractor;

  private static readonly DEFAULT_OPTIONS: Omit<Required<ForumClientOptions>, "baseUrl"> = {
    headers: {},
    maxPosts: DEFAULT_MAX_POSTS,
    extractor: {},
  };

  constructor(options: ForumClientOptions) {
    this.options = {
      ...ForumClient.DEFAULT_OPTIONS,
      ...options,
      baseUrl: options.baseUrl.replace(/\/+$/, ""),
    };
    this.extractor = new ContentExtractor(this.options.extractor);
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /**
   * Fetches the newest threads listing.
   *
   * @param limit Maximum number of posts to return. Defaults to the `maxPosts` option.
   * @returns Lazily loaded posts bound to this client, in listing order.
   * @throws {ForumError} `ERR_LOGIN_REQUIRED` when the forum serves its login page instead.
   */
  async fetchLatestPosts(limit: number = this.options.maxPosts): Promise<ForumPost[]> {
    const page = await this.fetchPage(this.options.baseUrl + LATEST_THREADS_PATH);
    if (page.url.includes("login") || REGEX_LOGIN_PAGE.test(page.html)) {
      throw new ForumError("Forum session expired, login required", "ERR_LOGIN_REQUIRED");
    }

    const root = parseHtml(page.html);
    const anchor = root.querySelector(`#${LATEST_THREADS_ANCHOR_ID}`);
    const table = anchor?.nextElementSibling;
    if (!table) {
      console.warn("ForumClient: latest threads table not found.");
      return [];
    }

    const posts: ForumPost[] = [];
    for (const row of table.querySelectorAll("tbody")) {
      if (posts.length >= limit) break;
      const summary = this.parseThreadRow(row);
      if (summary) {
        posts.push(new ForumPost(summary, this));
      }
    }
    return posts;
  }

  /**
   * Loads and extracts the first post of a thread page.
   *
   * @param url Absolute URL of the thread page.
   * @returns The post details.
   * @throws {ForumError} `ERR_POST_NOT_FOUND` when the page has no recognisable post, or any fetch error.
   */
  async loadPostDetails(url: string): Promise<PostDetails> {
    const page = await this.fetchPage(url);
    const root = parseHtml(page.html);

    const postElement = root
      .querySelectorAll(`#${POST_LIST_ID} > div`)
      .find((element) => (element.id || "").includes(POST_ELEMENT_ID_PREFIX));
    const postId = postElement?.id.split("_").pop();
    if (!postElement || !postId) {
      throw new ForumError(`No post found on ${url}`, "ERR_POST_NOT_FOUND");
    }

    const message = postElement.querySelector(`#${POST_MESSAGE_ID_PREFIX}${postId}`);
    if (!message) {
      throw new ForumError(`Post ${postId} has no message body on ${url}`, "ERR_POST_NOT_FOUND");
    }

    const extracted: ExtractionResult = this.extractor.extract(toMarkupNode(message), this.options.baseUrl);
    return {
      content: extracted.text,
      publishTime: this.parsePublishTime(postElement, postId),
      images: extracted.images,
      tags: extracted.tags,
    };
  }

  private parseThreadRow(row: NHPHTMLElement): PostSummary | null {
    const link = row.querySelector("th.common > a");
    const href = link?.getAttribute("href")?.trim();
    const title = link?.text.trim();
    const author = row.querySelector("td.by cite a")?.text.trim();
    const idMatch = href ? REGEX_THREAD_ID.exec(href) : null;
    const id = idMatch ? Number(idMatch[1] ?? idMatch[2]) : NaN;

    if (!href || !title || !author || !Number.isInteger(id)) {
      console.warn(`ForumClient: skipping unparsable thread row (href: ${href ?? "none"}).`);
      return null;
    }

    return { id, title, url: resolveUrl(this.options.baseUrl, href), author };
  }

  private parsePublishTime(postElement: NHPHTMLElement, postId: string): Date {
    const raw = postElement.querySelector(`#${POST_TIME_ID_PREFIX}${postId} span`)?.getAttribute("title") ?? "";
    const parsed = parseForumDateTime(raw);
    if (!parsed) {
      console.warn(`ForumClient: could not parse publish time "${raw}" of post ${postId}, using now.`);
      return new Date();
    }
    return parsed;
  }

  private async fetchPage(url: string): Promise<FetchedPage> {
    let response: Response;
    try {
      response = await fetch(url, {
        redirect: "follow",
        headers: { ...COMMON_HEADERS, ...this.options.headers },
      });

      if (!response.ok) {
        throw new ForumHttpError(`HTTP error! status: ${response.status}`, response.status);
      }

      const contentTypeHeader = response.headers.get("content-type");
      if (!contentTypeHeader || !contentTypeHeader.includes("text/html")) {
        throw new ForumError("Content-Type is not text/html", "ERR_NON_HTML_CONTENT");
      }

      return { html: await response.text(), url: response.url || url };
    } catch (error: unknown) {
      if (error instanceof ForumError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "Unknown fetch error";
      throw new ForumError(`Fetch failed: ${message}`, "ERR_FETCH_FAILED", toError(error));
    }
  }
}
