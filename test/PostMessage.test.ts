import { describe, it, expect } from "vitest";
import { renderPostMessage } from "../src/render/post-message.js";

const POST = { id: 1, title: "标题", url: "https://forum.test/thread-1-1-1.html", author: "alice" };

describe("renderPostMessage", () => {
  it("renders title, byline, tags, content and source link", () => {
    const message = renderPostMessage(POST, {
      content: "正文",
      publishTime: new Date(2024, 0, 2, 3, 4, 5),
      images: [],
      tags: ["新闻", "活动"],
    });
    expect(message).toBe(
      "**标题**\nalice \\ 2024-01-02 03:04\n标签: 新闻, 活动\n正文\n\n[查看原帖](https://forum.test/thread-1-1-1.html)"
    );
  });

  it("omits the tag line when there are no tags", () => {
    const message = renderPostMessage(POST, {
      content: "正文",
      publishTime: new Date(2024, 11, 31, 23, 59, 0),
      images: [],
      tags: [],
    });
    expect(message).toBe("**标题**\nalice \\ 2024-12-31 23:59\n正文\n\n[查看原帖](https://forum.test/thread-1-1-1.html)");
  });
});
