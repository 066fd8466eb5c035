import { describe, it, expect } from "vitest";
import { isDataUri, resolveUrl } from "../src/extract/url-resolver.js";

describe("resolveUrl", () => {
  const BASE = "https://forum.test";

  it("leaves absolute http(s) references unchanged", () => {
    expect(resolveUrl(BASE, "https://cdn.example.com/a.png")).toBe("https://cdn.example.com/a.png");
    expect(resolveUrl(BASE, "http://cdn.example.com/a.png")).toBe("http://cdn.example.com/a.png");
  });

  it("joins root-relative references onto the base", () => {
    expect(resolveUrl(BASE, "/img/pic.png")).toBe("https://forum.test/img/pic.png");
  });

  it("joins other references with a slash", () => {
    expect(resolveUrl(BASE, "data/attachment/a.jpg")).toBe("https://forum.test/data/attachment/a.jpg");
  });

  it("ignores a trailing slash on the base", () => {
    expect(resolveUrl("https://forum.test/", "/a")).toBe("https://forum.test/a");
  });
});

describe("isDataUri", () => {
  it("recognises inline data payloads", () => {
    expect(isDataUri("data:image/gif;base64,R0lGOD")).toBe(true);
    expect(isDataUri("/data/attachment/a.jpg")).toBe(false);
  });
});
