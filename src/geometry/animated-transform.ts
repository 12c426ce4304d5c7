import { Transform } from './transform';

/**
 * A transform keyed at two times. Both endpoints are cache handles, so
 * "animated" is decided by handle identity.
 */
export class AnimatedTransform {
  readonly startTransform: Transform;
  readonly startTime: number;
  readonly endTransform: Transform;
  readonly endTime: number;
  readonly actuallyAnimated: boolean;

  constructor(startTransform: Transform, startTime: number, endTransform: Transform, endTime: number) {
    this.startTransform = startTransform;
    this.startTime = startTime;
    this.endTransform = endTransform;
    this.endTime = endTime;
    this.actuallyAnimated = startTransform !== endTransform;
  }
}
