import { defaultTreeAdapter, parse, type DefaultTreeAdapterMap } from "parse5";

export interface TreeElement {
  kind: "element";
  tag: string;
  attrs: ReadonlyArray<readonly [name: string, value: string]>;
  children: TreeNode[];
}

export interface TreeText {
  kind: "text";
  text: string;
}

export type TreeNode = TreeElement | TreeText;

export interface TreeDocument {
  kind: "document";
  children: TreeNode[];
}

type Parse5ChildNode = DefaultTreeAdapterMap["childNode"];

// Comments, doctypes and processing instructions carry nothing we read.
// Explicit stack: nesting may run deeper than the call stack.
function convertChildren(nodes: Parse5ChildNode[]): TreeNode[] {
  const root: TreeNode[] = [];
  const pending: Array<[Parse5ChildNode[], TreeNode[]]> = [[nodes, root]];

  for (let next = pending.pop(); next; next = pending.pop()) {
    const [sources, target] = next;
    for (const node of sources) {
      if (defaultTreeAdapter.isTextNode(node)) {
        target.push({ kind: "text", text: node.value });
      } else if (defaultTreeAdapter.isElementNode(node)) {
        const children: TreeNode[] = [];
        target.push({
          kind: "element",
          tag: node.tagName,
          attrs: node.attrs.map((attr) => [attr.name, attr.value] as const),
          children,
        });
        pending.push([node.childNodes, children]);
      }
    }
  }
  return root;
}

export function parseDocument(html: string): TreeDocument {
  const document = parse(html);
  return { kind: "document", children: convertChildren(document.childNodes) };
}

export function attr(element: TreeElement, name: string): string | undefined {
  return element.attrs.find(([key]) => key === name)?.[1];
}

export function classTokens(element: TreeElement): string[] {
  return (attr(element, "class") ?? "").split(/\s+/).filter(Boolean);
}

export function hasClasses(element: TreeElement, required: readonly string[]): boolean {
  if (required.length === 0) {
    return true;
  }
  const tokens = new Set(classTokens(element));
  return required.every((token) => tokens.has(token));
}

export function textOf(node: TreeNode): string {
  return rawText(node).trim();
}

function rawText(node: TreeNode): string {
  let text = "";
  const pending: TreeNode[] = [node];
  for (let next = pending.pop(); next; next = pending.pop()) {
    if (next.kind === "text") {
      text += next.text;
    } else {
      for (let i = next.children.length - 1; i >= 0; i -= 1) {
        const child = next.children[i];
        if (child) {
          pending.push(child);
        }
      }
    }
  }
  return text;
}
