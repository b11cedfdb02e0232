import type { ByteWriter } from "@metavoxel/core";

let nextSharedObjectId = 1;

/**
 * Base of objects shared between node values and edits. Ids come from a
 * process-wide counter; a clone may keep its source's id so that tables keyed
 * by id continue to resolve.
 */
export abstract class SharedObject {
  public readonly id: number;

  protected constructor(id?: number) {
    if (id === undefined) {
      this.id = nextSharedObjectId++;
    } else {
      if (!Number.isInteger(id) || id <= 0) {
        throw new Error(`Shared object id must be a positive integer, got ${id}`);
      }
      this.id = id;
      nextSharedObjectId = Math.max(nextSharedObjectId, id + 1);
    }
  }

  public encode(writer: ByteWriter): void {
    writer.writeU32LE(this.id);
  }
}

/** Non-owning id lookup: entries never keep their objects alive. */
export class WeakSharedObjectHash {
  private readonly entries = new Map<number, WeakRef<SharedObject>>();

  public register(object: SharedObject): void {
    this.entries.set(object.id, new WeakRef(object));
  }

  public value(id: number): SharedObject | undefined {
    const ref = this.entries.get(id);
    if (!ref) return undefined;
    const object = ref.deref();
    if (!object) {
      this.entries.delete(id);
    }
    return object;
  }

  public remove(id: number): boolean {
    return this.entries.delete(id);
  }

  public get size(): number {
    return this.entries.size;
  }
}
