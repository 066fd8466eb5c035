import { describe, it, expect } from "vitest";
import { findDescendants, flattenText, parseMarkup } from "../src/markup/markup-node.js";

describe("parseMarkup", () => {
  it("splits text into leading text and tails", () => {
    const root = parseMarkup('<div id="Main" CLASS="a">lead<b>bold</b> tail <i>x</i></div>');
    expect(root.tag).toBe("");
    const div = root.children[0];
    expect(div.tag).toBe("div");
    expect(div.attributes).toEqual({ id: "Main", class: "a" });
    expect(div.text).toBe("lead");
    expect(div.children.map((child) => child.tag)).toEqual(["b", "i"]);
    expect(div.children[0].text).toBe("bold");
    expect(div.children[0].tail).toBe(" tail ");
    expect(div.children[1].tail).toBeUndefined();
  });

  it("lower-cases tag names", () => {
    expect(parseMarkup("<SPAN>x</SPAN>").children[0].tag).toBe("span");
  });

  it("drops comments", () => {
    const div = parseMarkup("<div>a<!-- hidden -->b</div>").children[0];
    expect(flattenText(div)).toBe("ab");
  });
});

describe("flattenText", () => {
  it("joins trimmed descendant text with single spaces", () => {
    expect(flattenText(parseMarkup("<p> a <b> b </b> c </p>").children[0])).toBe("a b c");
  });

  it("does not include the node's own tail", () => {
    const root = parseMarkup("<b>inside</b> outside");
    expect(flattenText(root.children[0])).toBe("inside");
  });
});

describe("findDescendants", () => {
  it("returns matches in document order", () => {
    const root = parseMarkup('<div><a id="1"></a><span><a id="2"></a></span></div><a id="3"></a>');
    expect(findDescendants(root, (node) => node.tag === "a").map((node) => node.attributes.id)).toEqual(["1", "2", "3"]);
  });
});

describe("flattenText with scripts", () => {
  it("leaves out script and style bodies but keeps the text after them", () => {
    const heading = parseMarkup("<h3>Title<script>var x = 1;</script> part<style>.a{}</style></h3>").children[0];
    expect(flattenText(heading)).toBe("Title part");
  });
});
