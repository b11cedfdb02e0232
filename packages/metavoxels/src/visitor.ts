import type { Box3, Vector3 } from "three";
import { cubeAt } from "@metavoxel/core";
import { AttributeValue, type Attribute } from "@metavoxel/attributes";

export const STOP_RECURSION = 0;
export const DEFAULT_ORDER = 1;

export type VisitResult = typeof STOP_RECURSION | typeof DEFAULT_ORDER;

/**
 * Traversal context for one node. Lives only for the duration of a single
 * `guide` call; `parentInfo` is a borrowed link up the current path.
 */
export class MetavoxelInfo {
  public readonly outputValues: (AttributeValue | undefined)[];
  private bounds?: Box3;

  public constructor(
    public readonly minimum: Vector3,
    public readonly size: number,
    public readonly parentInfo: MetavoxelInfo | undefined,
    public readonly inputValues: readonly AttributeValue[],
    public readonly outputs: readonly Attribute[],
    /** The node is at the visitor's minimum size and will not be subdivided. */
    public readonly isLeaf: boolean,
    /** No input node has finer structure below this one. */
    public readonly inputsAreLeaves: boolean
  ) {
    this.outputValues = outputs.map(() => undefined);
  }

  public getBounds(): Box3 {
    this.bounds ??= cubeAt(this.minimum, this.size);
    return this.bounds;
  }

  public getCenter(): Vector3 {
    const half = this.size / 2;
    return this.minimum.clone().addScalar(half);
  }

  public getInput<T>(attribute: Attribute<T>): T | undefined {
    for (const input of this.inputValues) {
      if (input.attribute === attribute) {
        return input.get(attribute);
      }
    }
    return undefined;
  }

  public getOutput<T>(attribute: Attribute<T>): T | undefined {
    const value = this.outputValues[this.outputs.indexOf(attribute)];
    return value === undefined ? undefined : value.get(attribute);
  }

  /** Current value of an attribute: the output if set, else the input. */
  public getCurrent<T>(attribute: Attribute<T>): T {
    return this.getOutput(attribute) ?? this.getInput(attribute) ?? attribute.defaultValue;
  }

  /** Returns false when the visitor does not write `attribute`. */
  public setOutput<T>(attribute: Attribute<T>, value: T): boolean {
    const index = this.outputs.indexOf(attribute);
    if (index < 0) return false;
    this.outputValues[index] = new AttributeValue(attribute, value);
    return true;
  }
}

/**
 * Declares what a traversal reads and writes. `visit` returns
 * `STOP_RECURSION` to accept the node's outputs as they are, or
 * `DEFAULT_ORDER` to descend into the eight children.
 */
export abstract class MetavoxelVisitor {
  protected constructor(
    public readonly inputs: readonly Attribute[],
    public readonly outputs: readonly Attribute[]
  ) {}

  /** Smallest node edge the guide may produce for this visitor. */
  public getMinimumSize(): number {
    const attributes = this.outputs.length > 0 ? this.outputs : this.inputs;
    return attributes.reduce((min, attribute) => Math.min(min, attribute.placementGranularity), Infinity);
  }

  public abstract visit(info: MetavoxelInfo): VisitResult;
}
