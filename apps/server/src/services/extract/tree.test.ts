import { describe, expect, it } from "vitest";
import { element } from "../../testing/tree.js";
import { attr, hasClasses, parseDocument, textOf, type TreeElement, type TreeNode } from "./tree.js";

function findFirst(nodes: TreeNode[], tag: string): TreeElement | undefined {
  for (const node of nodes) {
    if (node.kind !== "element") {
      continue;
    }
    if (node.tag === tag) {
      return node;
    }
    const nested = findFirst(node.children, tag);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

describe("markup tree", () => {
  it("builds elements with ordered attributes and decoded text", () => {
    const document = parseDocument(
      `<!-- export --><html><body><q class="a  b" lang="en">Fish &amp; chips</q></body></html>`
    );
    const q = findFirst(document.children, "q");

    expect(q?.attrs).toEqual([
      ["class", "a  b"],
      ["lang", "en"],
    ]);
    expect(q ? textOf(q) : null).toBe("Fish & chips");
    expect(q ? hasClasses(q, ["b", "a"]) : false).toBe(true);
    expect(q ? hasClasses(q, ["a", "c"]) : true).toBe(false);
  });

  it("drops comments and keeps the html skeleton", () => {
    const document = parseDocument("<!-- note --><p>hi</p>");

    expect(document.children.map((child) => (child.kind === "element" ? child.tag : child.kind))).toEqual(["html"]);
  });

  it("concatenates nested text and trims the ends", () => {
    const node = element("span", { title: "x" }, ["  Hello ", element("b", {}, ["big"]), " world \n"]);

    expect(textOf(node)).toBe("Hello big world");
    expect(attr(node, "title")).toBe("x");
    expect(attr(node, "missing")).toBeUndefined();
  });
});
