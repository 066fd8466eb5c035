import { z } from "zod";
import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_POSTS } from "./constants.js";
import { ForumError } from "./errors.js";
import type { ForumClientOptions } from "./types.js";

const envSchema = z.object({
  FORUM_BASE_URL: z.string().url(),
  FORUM_COOKIE: z.string().min(1).optional(),
  FORUM_USER_AGENT: z.string().min(1).optional(),
  MAX_POSTS_PER_CHECK: z.coerce.number().int().positive().default(DEFAULT_MAX_POSTS),
  EXTRACTOR_MAX_DEPTH: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
});

export type ForumEnv = z.infer<typeof envSchema>;

/**
 * Builds ForumClient options from environment variables.
 *
 * @param env Defaults to `process.env`.
 * @throws {ForumError} `ERR_INVALID_CONFIG` listing every invalid variable.
 */
export function loadForumConfig(env: NodeJS.ProcessEnv = process.env): ForumClientOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ForumError(`Invalid forum configuration: ${problems}`, "ERR_INVALID_CONFIG");
  }

  const config = parsed.data;
  const headers: Record<string, string> = {};
  if (config.FORUM_COOKIE) headers.Cookie = config.FORUM_COOKIE;
  if (config.FORUM_USER_AGENT) headers["User-Agent"] = config.FORUM_USER_AGENT;

  return {
    baseUrl: config.FORUM_BASE_URL,
    headers,
    maxPosts: config.MAX_POSTS_PER_CHECK,
    extractor: { maxDepth: config.EXTRACTOR_MAX_DEPTH },
  };
}
