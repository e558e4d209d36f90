import type { NodeAttributes, NodeElement, TelegraphNode } from "@/types/telegraph";
import { DecodeError } from "@/types/errors";
import { expectRecord, requireString } from "./fields";

const ATTRIBUTE_NAMES = ["href", "src"] as const;

function mapAttributes(value: unknown, path: string): NodeAttributes {
  const source = expectRecord(value, path);
  const attrs: NodeAttributes = {};
  for (const name of ATTRIBUTE_NAMES) {
    const attr = source[name];
    if (attr === undefined) {
      continue;
    }
    if (typeof attr !== "string") {
      throw DecodeError.missingField(`${path}.${name}`, "a string");
    }
    attrs[name] = attr;
  }
  return attrs;
}

/**
 * Decode one content node. Element nodes recurse into their children;
 * `attrs` and `children` are kept only when the source has them.
 */
export function mapNode(json: unknown, path = "node"): TelegraphNode {
  if (typeof json === "string") {
    return json;
  }

  const source = expectRecord(json, path);
  const element: NodeElement = { tag: requireString(source, "tag", path) };

  if (source.attrs !== undefined) {
    element.attrs = mapAttributes(source.attrs, `${path}.attrs`);
  }
  if (source.children !== undefined) {
    element.children = mapNodes(source.children, `${path}.children`);
  }

  return element;
}

export function mapNodes(json: unknown, path = "content"): TelegraphNode[] {
  if (!Array.isArray(json)) {
    throw DecodeError.missingField(path, "an array of nodes");
  }
  return json.map((item, index) => mapNode(item, `${path}[${index}]`));
}

/**
 * Serialize a node into the `{ tag, attrs?, children? }` shape the API expects
 */
export function nodeToJson(node: TelegraphNode): TelegraphNode {
  if (typeof node === "string") {
    return node;
  }

  const json: NodeElement = { tag: node.tag };
  if (node.attrs) {
    json.attrs = { ...node.attrs };
  }
  if (node.children) {
    json.children = nodesToJson(node.children);
  }
  return json;
}

export function nodesToJson(nodes: TelegraphNode[]): TelegraphNode[] {
  return nodes.map(nodeToJson);
}
