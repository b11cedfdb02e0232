import { Vector3, type Box3 } from "three";
import { assertFiniteBox, assertPowerOfTwo, cubeAt, overlapFraction, type Vec3Like } from "@metavoxel/core";
import {
  AttributeValue,
  type Attribute,
  type AttributeRegistry,
  type SharedObjectSetAttribute
} from "@metavoxel/attributes";
import { CHILD_COUNT, MetavoxelNode, getChildIndexContaining, getNextMinimum, getOppositeChildIndex } from "./node.js";
import type { Spanner } from "./spanner.js";
import {
  GetIntersectingVisitor,
  InsertVisitor,
  RemoveVisitor,
  ReplaceVisitor,
  SpannerUpdateVisitor
} from "./spanner-visitors.js";
import { DEFAULT_ORDER, MetavoxelInfo, MetavoxelVisitor, STOP_RECURSION, type VisitResult } from "./visitor.js";

/**
 * Mutable handle over a set of immutable attribute trees. The tree spans a
 * power-of-two cube centred on the origin; `clone` shares every node, so a
 * clone is a snapshot that later edits to either handle cannot disturb.
 */
export class MetavoxelData {
  public readonly registry: AttributeRegistry;
  private size: number;
  private readonly roots: Map<Attribute, MetavoxelNode>;

  public constructor(registry: AttributeRegistry, size = 1, roots?: ReadonlyMap<Attribute, MetavoxelNode>) {
    assertPowerOfTwo(size, "Metavoxel data size");
    this.registry = registry;
    this.size = size;
    this.roots = new Map<Attribute, MetavoxelNode>(roots);
  }

  public clone(): MetavoxelData {
    return new MetavoxelData(this.registry, this.size, this.roots);
  }

  public getSize(): number {
    return this.size;
  }

  public getMinimum(): Vector3 {
    const half = this.size / 2;
    return new Vector3(-half, -half, -half);
  }

  public getBounds(): Box3 {
    return cubeAt(this.getMinimum(), this.size);
  }

  public getRoot(attribute: Attribute): MetavoxelNode | undefined {
    return this.roots.get(attribute);
  }

  public setRoot(attribute: Attribute, root: MetavoxelNode): void {
    this.roots.set(attribute, root);
  }

  /** Drops an attribute's tree; it then reads as its default everywhere. */
  public clear(attribute: Attribute): void {
    this.roots.delete(attribute);
  }

  /** Attributes that currently have a stored tree. */
  public getAttributes(): Attribute[] {
    return [...this.roots.keys()];
  }

  public countNodes(attribute: Attribute): number {
    return this.roots.get(attribute)?.countNodes() ?? 0;
  }

  /**
   * Doubles the edge length, keeping every stored value where it was: the
   * old octant `i` becomes the innermost grandchild of the new octant `i`.
   */
  public expand(): void {
    for (const [attribute, root] of this.roots) {
      const filler = MetavoxelNode.leaf(attribute.defaultValue);
      const children: MetavoxelNode[] = [];
      for (let i = 0; i < CHILD_COUNT; i++) {
        const grandchildren: MetavoxelNode[] = [];
        for (let j = 0; j < CHILD_COUNT; j++) {
          grandchildren.push(filler);
        }
        grandchildren[getOppositeChildIndex(i)] = root.isLeaf() ? root : (root.getChild(i) ?? filler);
        children.push(MetavoxelNode.merge(attribute, grandchildren));
      }
      this.roots.set(attribute, MetavoxelNode.merge(attribute, children));
    }
    this.size *= 2;
  }

  public expandToContain(box: Box3): void {
    assertFiniteBox(box, "Region");
    while (!this.getBounds().containsBox(box)) {
      this.expand();
    }
  }

  public guide(visitor: MetavoxelVisitor): void {
    const { inputs, outputs } = visitor;
    const inputNodes = inputs.map((attribute) => this.roots.get(attribute));
    const outputNodes = outputs.map((attribute) => this.roots.get(attribute));
    const traversal: Traversal = { visitor, minimumSize: visitor.getMinimumSize() };

    const results = guideNode(
      traversal,
      this.getMinimum(),
      this.size,
      undefined,
      inputNodes,
      inputs.map((attribute, i) => inputNodes[i]?.value ?? attribute.defaultValue),
      outputNodes,
      outputs.map((attribute, i) => outputNodes[i]?.value ?? attribute.defaultValue)
    );
    outputs.forEach((attribute, i) => {
      const result = results[i];
      if (result && result !== outputNodes[i]) {
        this.roots.set(attribute, result);
      }
    });
  }

  /** Value stored at `point`; the default outside the bounds. */
  public getValue<T>(attribute: Attribute<T>, point: Vec3Like): T {
    let node = this.roots.get(attribute);
    if (!node || !this.getBounds().containsPoint(new Vector3(point.x, point.y, point.z))) {
      return attribute.defaultValue;
    }
    let minimum = this.getMinimum();
    let size = this.size;
    while (!node.isLeaf()) {
      const half = size / 2;
      const index = getChildIndexContaining(minimum.clone().addScalar(half), point);
      const child: MetavoxelNode | undefined = node.getChild(index);
      if (!child) break;
      node = child;
      minimum = getNextMinimum(minimum, half, index);
      size = half;
    }
    return attribute.coerce(node.value);
  }

  /**
   * The single value covering every point of `box`, or undefined when the
   * region holds more than one. Parts of `box` outside the bounds read as
   * the default.
   */
  public getUniformValue<T>(attribute: Attribute<T>, box: Box3): T | undefined {
    const bounds = this.getBounds();
    const values: T[] = [];
    if (!bounds.containsBox(box)) {
      values.push(attribute.defaultValue);
    }
    const root = this.roots.get(attribute);
    if (!root) {
      values.push(attribute.defaultValue);
    } else if (!collectUniform(attribute, root, this.getMinimum(), this.size, box, values)) {
      return undefined;
    }
    const first = values[0];
    if (first === undefined) {
      // box lies entirely within the bounds but covers no volume
      return this.getValue(attribute, box.min);
    }
    return values.every((value) => attribute.equal(value, first)) ? first : undefined;
  }

  public getIntersecting(attribute: SharedObjectSetAttribute, box: Box3): Spanner[] {
    const visitor = new GetIntersectingVisitor(attribute, box);
    this.guide(visitor);
    return visitor.results;
  }

  public insert(attribute: SharedObjectSetAttribute, spanner: Spanner): void {
    const bounds = spanner.bounds;
    this.expandToContain(bounds);
    this.guide(new InsertVisitor(attribute, spanner));
    this.guide(SpannerUpdateVisitor.forSpanner(spanner, attribute));
  }

  public remove(attribute: SharedObjectSetAttribute, spanner: Spanner): void {
    this.guide(new RemoveVisitor(attribute, spanner));
    this.guide(SpannerUpdateVisitor.forSpanner(spanner, attribute));
  }

  /** Swaps `oldSpanner` for `newSpanner`; a changed shape is reinserted. */
  public replace(attribute: SharedObjectSetAttribute, oldSpanner: Spanner, newSpanner: Spanner): void {
    if (
      oldSpanner.placementGranularity !== newSpanner.placementGranularity ||
      !oldSpanner.bounds.equals(newSpanner.bounds)
    ) {
      this.remove(attribute, oldSpanner);
      this.insert(attribute, newSpanner);
      return;
    }
    this.guide(new ReplaceVisitor(attribute, oldSpanner, newSpanner));
    this.guide(SpannerUpdateVisitor.forSpanner(newSpanner, attribute));
  }

  /**
   * Copies another data set so that its minimum corner lands on `minimum`.
   * Shared-object sets are skipped: their members live in world space.
   */
  public set(minimum: Vec3Like, source: MetavoxelData, blend: boolean): void {
    const region = cubeAt(minimum, source.getSize());
    this.expandToContain(region);
    const offset = source.getMinimum().sub(new Vector3(minimum.x, minimum.y, minimum.z));
    for (const attribute of source.getAttributes()) {
      if (attribute.kind === "shared-object-set") continue;
      this.guide(new SetDataVisitor(attribute, source, region, offset, blend));
    }
  }
}

interface Traversal {
  visitor: MetavoxelVisitor;
  minimumSize: number;
}

function guideNode(
  traversal: Traversal,
  minimum: Vector3,
  size: number,
  parentInfo: MetavoxelInfo | undefined,
  inputNodes: readonly (MetavoxelNode | undefined)[],
  inputValues: readonly unknown[],
  outputNodes: readonly (MetavoxelNode | undefined)[],
  outputValues: readonly unknown[]
): (MetavoxelNode | undefined)[] {
  const { visitor, minimumSize } = traversal;
  const { inputs, outputs } = visitor;
  const isLeaf = size / 2 < minimumSize;
  const inputsAreLeaves = inputNodes.length > 0 && inputNodes.every((node) => !node || node.isLeaf());
  const info = new MetavoxelInfo(
    minimum,
    size,
    parentInfo,
    inputs.map((attribute, i) => new AttributeValue(attribute, inputValues[i])),
    outputs,
    isLeaf,
    inputsAreLeaves
  );
  const result: VisitResult = visitor.visit(info);
  const descend = result === DEFAULT_ORDER && !isLeaf;

  const nodes = outputNodes.slice();
  const values = outputValues.slice();
  outputs.forEach((attribute, i) => {
    const written = info.outputValues[i];
    if (!written) return;
    const value = attribute.coerce(written.value);
    const current = nodes[i];
    values[i] = value;
    if (current && current.isLeaf() && attribute.equal(attribute.coerce(current.value), value)) {
      return;
    }
    if (descend && current && !current.isLeaf()) {
      // the children stay; their merge recomputes this node's value
      return;
    }
    nodes[i] = MetavoxelNode.leaf(value);
  });
  if (!descend) {
    return nodes;
  }

  const nextSize = size / 2;
  const children: (MetavoxelNode | undefined)[][] = outputs.map(() => []);
  const changed = outputs.map(() => false);
  for (let index = 0; index < CHILD_COUNT; index++) {
    const childInputNodes = inputNodes.map((node) => node?.getChild(index));
    const childOutputNodes = nodes.map((node) => node?.getChild(index));
    const childResults = guideNode(
      traversal,
      getNextMinimum(minimum, nextSize, index),
      nextSize,
      info,
      childInputNodes,
      inputs.map((attribute, i) => childInputNodes[i]?.value ?? attribute.inherit(inputValues[i])),
      childOutputNodes,
      outputs.map((attribute, i) => childOutputNodes[i]?.value ?? attribute.inherit(values[i]))
    );
    childResults.forEach((child, i) => {
      children[i]?.push(child);
      if (child !== childOutputNodes[i]) {
        changed[i] = true;
      }
    });
  }
  outputs.forEach((attribute, i) => {
    if (!changed[i]) return;
    const filler = MetavoxelNode.leaf(attribute.inherit(values[i]));
    const full = (children[i] ?? []).map((child) => child ?? filler);
    nodes[i] = MetavoxelNode.merge(attribute, full);
  });
  return nodes;
}

/** Walks a stored tree over `box`, collecting leaf values; false once two differ. */
function collectUniform<T>(
  attribute: Attribute<T>,
  node: MetavoxelNode,
  minimum: Vector3,
  size: number,
  box: Box3,
  values: T[]
): boolean {
  if (overlapFraction(cubeAt(minimum, size), box) === 0) {
    return true;
  }
  if (node.isLeaf()) {
    const value = attribute.coerce(node.value);
    const first = values[0];
    if (first !== undefined && !attribute.equal(first, value)) {
      return false;
    }
    values.push(value);
    return true;
  }
  const half = size / 2;
  for (let index = 0; index < CHILD_COUNT; index++) {
    const child = node.getChild(index);
    if (child && !collectUniform(attribute, child, getNextMinimum(minimum, half, index), half, box, values)) {
      return false;
    }
  }
  return true;
}

class SetDataVisitor extends MetavoxelVisitor {
  public constructor(
    private readonly attribute: Attribute,
    private readonly source: MetavoxelData,
    private readonly region: Box3,
    /** Destination-to-source translation. */
    private readonly offset: Vector3,
    private readonly blend: boolean
  ) {
    super([attribute], [attribute]);
  }

  private assign(info: MetavoxelInfo, value: unknown): void {
    const next = this.blend ? this.attribute.blend(value, info.getCurrent(this.attribute)) : value;
    info.setOutput(this.attribute, next);
  }

  public visit(info: MetavoxelInfo): VisitResult {
    const bounds = info.getBounds();
    const overlap = overlapFraction(bounds, this.region);
    if (overlap === 0) {
      return STOP_RECURSION;
    }
    if (overlap >= 1) {
      const sourceBox = bounds.clone().translate(this.offset);
      const uniform = this.source.getUniformValue(this.attribute, sourceBox);
      if (uniform !== undefined) {
        this.assign(info, uniform);
        return STOP_RECURSION;
      }
    }
    if (info.isLeaf) {
      if (overlap >= 0.5) {
        this.assign(info, this.source.getValue(this.attribute, info.getCenter().add(this.offset)));
      }
      return STOP_RECURSION;
    }
    return DEFAULT_ORDER;
  }
}
