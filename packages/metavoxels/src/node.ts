import { Vector3 } from "three";
import type { Attribute } from "@metavoxel/attributes";

export const CHILD_COUNT = 8;

/**
 * Immutable octree node: a leaf holding a value, or an internal node with
 * exactly eight children whose value is the merge of theirs. Edits build new
 * nodes along the changed path and share every other subtree.
 */
export class MetavoxelNode {
  public readonly value: unknown;
  private readonly children?: readonly MetavoxelNode[];

  private constructor(value: unknown, children?: readonly MetavoxelNode[]) {
    if (children && children.length !== CHILD_COUNT) {
      throw new Error(`Metavoxel node must have 0 or ${CHILD_COUNT} children, got ${children.length}`);
    }
    this.value = value;
    this.children = children;
  }

  public static leaf(value: unknown): MetavoxelNode {
    return new MetavoxelNode(value);
  }

  /** Builds a parent, collapsing to a leaf when every child is an equal leaf. */
  public static merge(attribute: Attribute, children: readonly MetavoxelNode[]): MetavoxelNode {
    const { value, collapse } = attribute.merge(children.map((child) => child.value));
    if (collapse && children.every((child) => child.isLeaf())) {
      return new MetavoxelNode(value);
    }
    return new MetavoxelNode(value, children);
  }

  public isLeaf(): boolean {
    return this.children === undefined;
  }

  public getChild(index: number): MetavoxelNode | undefined {
    return this.children?.[index];
  }

  public countNodes(): number {
    let count = 1;
    for (const child of this.children ?? []) {
      count += child.countNodes();
    }
    return count;
  }
}

export function getOppositeChildIndex(index: number): number {
  return CHILD_COUNT - 1 - index;
}

/** Octant `index` sets bit 0 for the upper x half, bit 1 for y, bit 2 for z. */
export function getNextMinimum(minimum: Vector3, nextSize: number, index: number): Vector3 {
  return new Vector3(
    minimum.x + (index & 1 ? nextSize : 0),
    minimum.y + (index & 2 ? nextSize : 0),
    minimum.z + (index & 4 ? nextSize : 0)
  );
}

export function getChildIndexContaining(center: Vector3, point: { x: number; y: number; z: number }): number {
  return (point.x >= center.x ? 1 : 0) | (point.y >= center.y ? 2 : 0) | (point.z >= center.z ? 4 : 0);
}
