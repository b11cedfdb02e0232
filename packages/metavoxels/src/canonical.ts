import { ByteWriter, hashBytes, type CanonicalHashResult } from "@metavoxel/core";
import type { Attribute } from "@metavoxel/attributes";
import type { MetavoxelData } from "./data.js";
import { CHILD_COUNT, type MetavoxelNode } from "./node.js";

const MAGIC = "MV01";
const LEAF = 0;
const INTERNAL = 1;

function writeNode(writer: ByteWriter, attribute: Attribute, node: MetavoxelNode): void {
  if (node.isLeaf()) {
    writer.writeU8(LEAF);
    attribute.encode(attribute.coerce(node.value), writer);
    return;
  }
  writer.writeU8(INTERNAL);
  for (let i = 0; i < CHILD_COUNT; i++) {
    const child = node.getChild(i);
    if (!child) {
      throw new Error(`Internal node of "${attribute.name}" is missing child ${i}`);
    }
    writeNode(writer, attribute, child);
  }
}

/**
 * Deterministic byte form of a data set: the size, then every stored tree in
 * attribute-name order, pre-order. Internal values are left out since they
 * follow from the leaves. A root that is a default leaf reads the same as an
 * absent one and is skipped.
 */
export function encodeMetavoxelData(data: MetavoxelData): Uint8Array {
  const writer = new ByteWriter();
  for (const ch of MAGIC) {
    writer.writeU8(ch.charCodeAt(0));
  }
  writer.writeF64LE(data.getSize());

  const trees = data
    .getAttributes()
    .map((attribute) => ({ attribute, root: data.getRoot(attribute) }))
    .filter(
      ({ attribute, root }) =>
        root !== undefined &&
        !(root.isLeaf() && attribute.equal(attribute.coerce(root.value), attribute.defaultValue))
    )
    .sort((a, b) => (a.attribute.name < b.attribute.name ? -1 : a.attribute.name > b.attribute.name ? 1 : 0));

  writer.writeU32LE(trees.length);
  for (const { attribute, root } of trees) {
    if (!root) continue;
    writer.writeString(attribute.name);
    writeNode(writer, attribute, root);
  }
  return writer.toBytes();
}

export function hashMetavoxelData(data: MetavoxelData): CanonicalHashResult {
  return hashBytes(encodeMetavoxelData(data));
}
