import type { Box3 } from "three";
import { boxLongestSide, roundHalfAwayFromZero } from "@metavoxel/core";
import {
  withMember,
  withReplacedMember,
  withoutMember,
  type Attribute,
  type SharedObjectSetAttribute
} from "@metavoxel/attributes";
import { Spanner } from "./spanner.js";
import { DEFAULT_ORDER, MetavoxelVisitor, STOP_RECURSION, type MetavoxelInfo, type VisitResult } from "./visitor.js";

function spannerExtent(spanner: Spanner): number {
  return Math.max(boxLongestSide(spanner.bounds), spanner.placementGranularity);
}

/** Adds a spanner to every node of the set attribute that its bounds touch. */
export class InsertVisitor extends MetavoxelVisitor {
  private readonly bounds: Box3;
  private readonly longestSide: number;

  public constructor(
    private readonly attribute: SharedObjectSetAttribute,
    private readonly spanner: Spanner
  ) {
    super([attribute], [attribute]);
    this.bounds = spanner.bounds;
    this.longestSide = spannerExtent(spanner);
  }

  public visit(info: MetavoxelInfo): VisitResult {
    if (!this.bounds.intersectsBox(info.getBounds())) {
      return STOP_RECURSION;
    }
    if (!info.isLeaf && (info.size > this.longestSide || !info.inputsAreLeaves)) {
      return DEFAULT_ORDER;
    }
    info.setOutput(this.attribute, withMember(info.getCurrent(this.attribute), this.spanner));
    return STOP_RECURSION;
  }
}

/**
 * Unlinks a spanner. Descent follows set membership only: a parent holds the
 * union of its children, so a node without the spanner has none below it.
 */
export class RemoveVisitor extends MetavoxelVisitor {
  public constructor(
    private readonly attribute: SharedObjectSetAttribute,
    private readonly spanner: Spanner
  ) {
    super([attribute], [attribute]);
  }

  public visit(info: MetavoxelInfo): VisitResult {
    const set = info.getCurrent(this.attribute);
    if (!set.has(this.spanner)) {
      return STOP_RECURSION;
    }
    if (info.isLeaf || info.inputsAreLeaves) {
      info.setOutput(this.attribute, withoutMember(set, this.spanner));
      return STOP_RECURSION;
    }
    return DEFAULT_ORDER;
  }
}

/** Swaps one member for another in place, for replacements with identical bounds. */
export class ReplaceVisitor extends MetavoxelVisitor {
  public constructor(
    private readonly attribute: SharedObjectSetAttribute,
    private readonly oldSpanner: Spanner,
    private readonly newSpanner: Spanner
  ) {
    super([attribute], [attribute]);
  }

  public visit(info: MetavoxelInfo): VisitResult {
    const set = info.getCurrent(this.attribute);
    if (!set.has(this.oldSpanner)) {
      return STOP_RECURSION;
    }
    if (info.isLeaf || info.inputsAreLeaves) {
      info.setOutput(this.attribute, withReplacedMember(set, this.oldSpanner, this.newSpanner));
      return STOP_RECURSION;
    }
    return DEFAULT_ORDER;
  }
}

export class GetIntersectingVisitor extends MetavoxelVisitor {
  private readonly found = new Set<Spanner>();

  public constructor(
    private readonly attribute: SharedObjectSetAttribute,
    private readonly box: Box3
  ) {
    super([attribute], []);
  }

  public get results(): Spanner[] {
    return [...this.found];
  }

  public visit(info: MetavoxelInfo): VisitResult {
    const bounds = info.getBounds();
    const set = info.getCurrent(this.attribute);
    if (set.size === 0 || !this.box.intersectsBox(bounds)) {
      return STOP_RECURSION;
    }
    if (!this.box.containsBox(bounds) && !info.isLeaf && !info.inputsAreLeaves) {
      return DEFAULT_ORDER;
    }
    for (const member of set) {
      if (member instanceof Spanner && member.bounds.intersectsBox(this.box)) {
        this.found.add(member);
      }
    }
    return STOP_RECURSION;
  }
}

/**
 * Re-voxelizes the spanner attributes over a region. Nodes are written at
 * roughly `voxelizationSize`, from the spanner set of the ancestor `steps`
 * levels up, so neighbouring spanners that overlap the node are blended too.
 */
export class SpannerUpdateVisitor extends MetavoxelVisitor {
  public readonly voxelizationSize: number;
  public readonly steps: number;

  public constructor(
    private readonly bounds: Box3,
    granularity: number,
    private readonly spannersAttribute: SharedObjectSetAttribute,
    outputs: readonly Attribute[]
  ) {
    super([spannersAttribute], outputs);
    const multiplier = spannersAttribute.lodThresholdMultiplier;
    this.voxelizationSize = (Math.max(boxLongestSide(bounds), granularity) * 2) / multiplier;
    this.steps = roundHalfAwayFromZero(Math.log2(multiplier) - 2);
  }

  public static forSpanner(spanner: Spanner, spannersAttribute: SharedObjectSetAttribute): SpannerUpdateVisitor {
    return new SpannerUpdateVisitor(spanner.bounds, spanner.placementGranularity, spannersAttribute, spanner.attributes);
  }

  public visit(info: MetavoxelInfo): VisitResult {
    if (!this.bounds.intersectsBox(info.getBounds())) {
      return STOP_RECURSION;
    }
    if (info.size > this.voxelizationSize && !info.isLeaf) {
      return DEFAULT_ORDER;
    }
    for (const output of this.outputs) {
      info.setOutput(output, output.defaultValue);
    }
    let ancestor: MetavoxelInfo | undefined = info;
    for (let i = 0; i < this.steps && ancestor; i++) {
      ancestor = ancestor.parentInfo;
    }
    if (ancestor) {
      for (const member of ancestor.getCurrent(this.spannersAttribute)) {
        if (member instanceof Spanner) {
          member.blendAttributeValues(info, true);
        }
      }
    }
    return STOP_RECURSION;
  }
}
