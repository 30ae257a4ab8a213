import { StructuralError } from "../errors.js";

export enum FrameKind {
  Array = 1,
  Object = 2,
}

export enum Expect {
  ValueStart,
  AfterValue,
  ObjectKeyStart,
  ObjectAfterKey,
  ObjectValueStart,
  ArrayAfterValue,
}

export type Frame = {
  kind: FrameKind;
  /** Unique per push; tells a cursor whether its container is still open. */
  serial: number;
  expect: Expect;
};

/** Serial owned by the top level, which has no frame. */
export const ROOT_SERIAL = 0;

export class ContextStack {
  private readonly frames: Frame[] = [];
  private nextSerial = ROOT_SERIAL + 1;

  constructor(private readonly maxDepth: number) {}

  get depth(): number {
    return this.frames.length;
  }

  top(): Frame | undefined {
    return this.frames.at(-1);
  }

  /** Whether the frame opened at `depth` with `serial` is still on the stack. */
  holds(depth: number, serial: number): boolean {
    if (depth === 0) {
      return serial === ROOT_SERIAL;
    }
    return depth <= this.frames.length && this.frames[depth - 1].serial === serial;
  }

  push(kind: FrameKind, offset: number): Frame {
    if (this.frames.length >= this.maxDepth) {
      throw new StructuralError(
        "depth-exceeded",
        `Maximum nesting depth of ${this.maxDepth} exceeded`,
        offset
      );
    }
    const frame: Frame = {
      kind,
      serial: this.nextSerial,
      expect: kind === FrameKind.Array ? Expect.ValueStart : Expect.ObjectKeyStart,
    };
    this.nextSerial += 1;
    this.frames.push(frame);
    return frame;
  }

  pop(): Frame | undefined {
    return this.frames.pop();
  }
}
