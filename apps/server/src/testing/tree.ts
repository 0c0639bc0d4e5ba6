import type { TreeElement, TreeNode } from "../services/extract/tree.js";

export function element(tag: string, attrs: Record<string, string> = {}, children: Array<TreeNode | string> = []): TreeElement {
  return {
    kind: "element",
    tag,
    attrs: Object.entries(attrs),
    children: children.map((child): TreeNode => (typeof child === "string" ? { kind: "text", text: child } : child)),
  };
}
