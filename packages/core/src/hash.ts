import { createHash } from "node:crypto";
import { Buffer } from "node:buffer";
import type { CanonicalHashResult } from "./types.js";

export class ByteWriter {
  private readonly bytes: number[] = [];
  private readonly scratch = new DataView(new ArrayBuffer(8));

  public writeU8(value: number): void {
    this.bytes.push(value & 0xff);
  }

  public writeU32LE(value: number): void {
    this.bytes.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
  }

  public writeI32LE(value: number): void {
    this.writeU32LE(value >>> 0);
  }

  public writeF64LE(value: number): void {
    this.scratch.setFloat64(0, value, true);
    for (let i = 0; i < 8; i++) {
      this.bytes.push(this.scratch.getUint8(i));
    }
  }

  public writeString(value: string): void {
    const utf8 = Buffer.from(value, "utf8");
    this.writeU32LE(utf8.length);
    for (const byte of utf8) {
      this.bytes.push(byte);
    }
  }

  public writeBytes(values: ArrayLike<number>): void {
    this.writeU32LE(values.length);
    for (let i = 0; i < values.length; i++) {
      this.bytes.push((values[i] ?? 0) & 0xff);
    }
  }

  public get length(): number {
    return this.bytes.length;
  }

  public toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

export function hashBytes(canonicalBytes: Uint8Array): CanonicalHashResult {
  const sha256 = createHash("sha256").update(canonicalBytes).digest("hex");
  return { sha256, canonicalBytes };
}
