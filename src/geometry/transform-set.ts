import { Transform } from './transform';

export const MAX_TRANSFORMS = 2;

// Which time slots a transform directive mutates.
export enum ActiveTransformBits {
  Start = 1 << 0,
  End = 1 << 1,
  All = (1 << MAX_TRANSFORMS) - 1,
}

export type TransformSlot = 0 | 1;

/**
 * The current transform at the start (slot 0) and end (slot 1) of the
 * shutter interval. Immutable; updates return a new set.
 */
export class TransformSet {
  private readonly slots: readonly [Transform, Transform];

  constructor(start: Transform = Transform.identity(), end: Transform = start) {
    this.slots = [start, end];
  }

  get(slot: TransformSlot): Transform {
    return this.slots[slot];
  }

  get start(): Transform {
    return this.slots[0];
  }

  get end(): Transform {
    return this.slots[1];
  }

  /** Applies `fn` to the slots selected by `bits`, leaving the others untouched. */
  update(bits: ActiveTransformBits, fn: (t: Transform, slot: TransformSlot) => Transform): TransformSet {
    const start = bits & ActiveTransformBits.Start ? fn(this.slots[0], 0) : this.slots[0];
    const end = bits & ActiveTransformBits.End ? fn(this.slots[1], 1) : this.slots[1];
    return new TransformSet(start, end);
  }

  map(fn: (t: Transform, slot: TransformSlot) => Transform): TransformSet {
    return this.update(ActiveTransformBits.All, fn);
  }

  inverse(): TransformSet {
    return this.map(t => t.inverse());
  }

  isAnimated(): boolean {
    return !this.slots[0].equals(this.slots[1]);
  }
}
