import type { ByteWriter } from "@metavoxel/core";
import { SharedObject } from "@metavoxel/attributes";

export interface MaterialOptions {
  name: string;
  diffuse?: string;
  scaleS?: number;
  scaleT?: number;
  id?: number;
}

/** Surface material referenced by heightfield samples. */
export class Material extends SharedObject {
  public readonly name: string;
  public readonly diffuse?: string;
  public readonly scaleS: number;
  public readonly scaleT: number;

  public constructor(options: MaterialOptions) {
    super(options.id);
    this.name = options.name;
    this.diffuse = options.diffuse;
    this.scaleS = options.scaleS ?? 1;
    this.scaleT = options.scaleT ?? 1;
  }

  public override encode(writer: ByteWriter): void {
    super.encode(writer);
    writer.writeString(this.name);
    writer.writeString(this.diffuse ?? "");
    writer.writeF64LE(this.scaleS);
    writer.writeF64LE(this.scaleT);
  }
}
