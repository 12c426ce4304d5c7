import { describe, it, expect } from 'vitest';
import { Transform } from './transform';
import { ActiveTransformBits, TransformSet } from './transform-set';

describe('TransformSet', () => {
  it('should start unanimated at the identity', () => {
    const set = new TransformSet();
    expect(set.start.isIdentity()).toBe(true);
    expect(set.isAnimated()).toBe(false);
  });

  it('should only update the active slots', () => {
    const moved = new TransformSet().update(ActiveTransformBits.End, t => t.compose(Transform.translate(0, 0, 1)));
    expect(moved.start.isIdentity()).toBe(true);
    expect(moved.end.equals(Transform.translate(0, 0, 1))).toBe(true);
    expect(moved.isAnimated()).toBe(true);
  });

  it('should invert every slot', () => {
    const set = new TransformSet(Transform.translate(1, 0, 0), Transform.translate(2, 0, 0));
    const inverse = set.inverse();
    expect(inverse.get(0).applyToPoint([1, 0, 0])).toEqual([0, 0, 0]);
    expect(inverse.get(1).applyToPoint([2, 0, 0])).toEqual([0, 0, 0]);
  });
});
