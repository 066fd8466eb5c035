import type { PostDetails, PostDetailsLoader, PostSummary } from "./types.js";
import { LOAD_FAILED_TEXT } from "./constants.js";

/**
 * A forum post whose body is loaded on first request and cached for the lifetime of the object.
 *
 * Loading happens at most once. A failed load is not retried: the post keeps the fallback
 * details (`内容加载失败`, the time of the failure, no images, no tags).
 */
export class ForumPost implements PostSummary {
  readonly id: number;
  readonly title: string;
  readonly url: string;
  readonly author: string;

  private details: PostDetails | undefined;
  private pending: Promise<PostDetails> | undefined;

  constructor(
    summary: PostSummary,
    private readonly loader?: PostDetailsLoader
  ) {
    this.id = summary.id;
    this.title = summary.title;
    this.url = summary.url;
    this.author = summary.author;
  }

  /**
   * Loads the post details once. Concurrent callers share the same load.
   * @returns The loaded or fallback details; never rejects.
   */
  ensureLoaded(): Promise<PostDetails> {
    if (this.details) {
      return Promise.resolve(this.details);
    }
    if (!this.pending) {
      this.pending = this.load().then((details) => {
        this.details = details;
        return details;
      });
    }
    return this.pending;
  }

  isLoaded(): boolean {
    return this.details !== undefined;
  }

  /** Cached details, or undefined before the first load completes. */
  getDetails(): PostDetails | undefined {
    return this.details;
  }

  async getContent(): Promise<string> {
    return (await this.ensureLoaded()).content;
  }

  async getPublishTime(): Promise<Date> {
    return (await this.ensureLoaded()).publishTime;
  }

  async getImages(): Promise<string[]> {
    return [...(await this.ensureLoaded()).images];
  }

  async getTags(): Promise<string[]> {
    return [...(await this.ensureLoaded()).tags];
  }

  private async load(): Promise<PostDetails> {
    if (!this.loader) {
      console.warn(`ForumPost: post ${this.id} has no loader, using fallback details.`);
      return ForumPost.fallbackDetails();
    }

    try {
      const details = await this.loader.loadPostDetails(this.url);
      if (details) {
        return details;
      }
      console.error(`ForumPost: no details returned for post ${this.id} (${this.url}).`);
    } catch (error: unknown) {
      console.error(`ForumPost: failed to load post ${this.id} (${this.url}):`, error);
    }
    return ForumPost.fallbackDetails();
  }

  private static fallbackDetails(): PostDetails {
    return { content: LOAD_FAILED_TEXT, publishTime: new Date(), images: [], tags: [] };
  }
}
