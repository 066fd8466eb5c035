import { describe, it, expect } from "vitest";
import { loadForumConfig } from "../src/config.js";
import { ForumError } from "../src/errors.js";

describe("loadForumConfig", () => {
  it("builds client options from the environment", () => {
    const options = loadForumConfig({
      FORUM_BASE_URL: "https://forum.test",
      FORUM_COOKIE: "sid=test-session",
      MAX_POSTS_PER_CHECK: "5",
      EXTRACTOR_MAX_DEPTH: "64",
    });
    expect(options).toEqual({
      baseUrl: "https://forum.test",
      headers: { Cookie: "sid=test-session" },
      maxPosts: 5,
      extractor: { maxDepth: 64 },
    });
  });

  it("applies defaults", () => {
    expect(loadForumConfig({ FORUM_BASE_URL: "https://forum.test", FORUM_USER_AGENT: "test-agent" })).toEqual({
      baseUrl: "https://forum.test",
      headers: { "User-Agent": "test-agent" },
      maxPosts: 10,
      extractor: { maxDepth: 256 },
    });
  });

  it("rejects a missing base URL", () => {
    expect(() => loadForumConfig({})).toThrow(ForumError);
    expect(() => loadForumConfig({})).toThrow(/FORUM_BASE_URL/);
  });

  it("rejects a non-numeric post limit", () => {
    try {
      loadForumConfig({ FORUM_BASE_URL: "https://forum.test", MAX_POSTS_PER_CHECK: "many" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ForumError);
      expect(error).toHaveProperty("code", "ERR_INVALID_CONFIG");
    }
  });
});
