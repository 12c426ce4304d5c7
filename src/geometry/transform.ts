import { mat4, vec3 } from 'gl-matrix';
import { hashNumbers } from '../utils/hash';

export type Point3 = [number, number, number];

// Matrices are stored column-major (gl-matrix layout) in double precision.
function newMatrix(): Float64Array {
  return new Float64Array(16);
}

function newVector(): Float64Array {
  return new Float64Array(3);
}

function identityMatrix(): Float64Array {
  const m = newMatrix();
  mat4.identity(m);
  return m;
}

function invertOrNaN(m: Float64Array): Float64Array {
  const out = newMatrix();
  if (!mat4.invert(out, m)) {
    out.fill(Number.NaN);
  }
  return out;
}

/**
 * Immutable 4x4 affine/projective transform with its cached inverse.
 *
 * Instances are never mutated after construction; every operation returns a
 * new Transform. Singular matrices get a NaN-filled inverse.
 */
export class Transform {
  readonly m: Float64Array;
  readonly mInv: Float64Array;

  private constructor(m: Float64Array, mInv: Float64Array) {
    this.m = m;
    this.mInv = mInv;
  }

  static identity(): Transform {
    return new Transform(identityMatrix(), identityMatrix());
  }

  /** From 16 values in column-major order, as they appear in a `Transform [...]` directive. */
  static fromColumnMajor(values: ArrayLike<number>): Transform {
    if (values.length !== 16) {
      throw new Error(`Transform requires 16 values, got ${values.length}`);
    }
    const m = Float64Array.from(values);
    return new Transform(m, invertOrNaN(m));
  }

  static translate(dx: number, dy: number, dz: number): Transform {
    const m = newMatrix();
    const mInv = newMatrix();
    mat4.fromTranslation(m, [dx, dy, dz]);
    mat4.fromTranslation(mInv, [-dx, -dy, -dz]);
    return new Transform(m, mInv);
  }

  static scale(sx: number, sy: number, sz: number): Transform {
    const m = newMatrix();
    const mInv = newMatrix();
    mat4.fromScaling(m, [sx, sy, sz]);
    mat4.fromScaling(mInv, [1 / sx, 1 / sy, 1 / sz]);
    return new Transform(m, mInv);
  }

  /** Rotation by `degrees` about `axis`. A zero-length axis yields the identity. */
  static rotate(degrees: number, ax: number, ay: number, az: number): Transform {
    const m = newMatrix();
    if (!mat4.fromRotation(m, (degrees * Math.PI) / 180, [ax, ay, az])) {
      return Transform.identity();
    }
    // Pure rotation: the inverse is the transpose.
    const mInv = newMatrix();
    mat4.transpose(mInv, m);
    return new Transform(m, mInv);
  }

  /**
   * Camera-from-world transform for a camera at `eye` looking at `look`.
   * Returns null when `up` is parallel to the viewing direction.
   */
  static lookAt(eye: Point3, look: Point3, up: Point3): Transform | null {
    const dir = newVector();
    vec3.subtract(dir, look, eye);
    vec3.normalize(dir, dir);
    const upNorm = newVector();
    vec3.normalize(upNorm, up);
    const right = newVector();
    vec3.cross(right, upNorm, dir);
    if (!(vec3.length(right) > 0)) return null;
    vec3.normalize(right, right);
    const newUp = newVector();
    vec3.cross(newUp, dir, right);

    // Columns: right, up, dir, eye.
    const worldFromCamera = Float64Array.from([
      right[0], right[1], right[2], 0,
      newUp[0], newUp[1], newUp[2], 0,
      dir[0], dir[1], dir[2], 0,
      eye[0], eye[1], eye[2], 1,
    ]);
    return new Transform(invertOrNaN(worldFromCamera), worldFromCamera);
  }

  /** `this ∘ other`: applies `other` first. */
  compose(other: Transform): Transform {
    const m = newMatrix();
    const mInv = newMatrix();
    mat4.multiply(m, this.m, other.m);
    mat4.multiply(mInv, other.mInv, this.mInv);
    return new Transform(m, mInv);
  }

  inverse(): Transform {
    return new Transform(this.mInv, this.m);
  }

  applyToPoint(p: Point3): Point3 {
    const m = this.m;
    const x = m[0] * p[0] + m[4] * p[1] + m[8] * p[2] + m[12];
    const y = m[1] * p[0] + m[5] * p[1] + m[9] * p[2] + m[13];
    const z = m[2] * p[0] + m[6] * p[1] + m[10] * p[2] + m[14];
    const w = m[3] * p[0] + m[7] * p[1] + m[11] * p[2] + m[15];
    return w === 1 ? [x, y, z] : [x / w, y / w, z / w];
  }

  isIdentity(): boolean {
    return this.equals(IDENTITY);
  }

  /** Exact element-wise equality of the forward matrices (NaN equals NaN). */
  equals(other: Transform): boolean {
    if (this === other) return true;
    for (let i = 0; i < 16; i++) {
      const a = this.m[i];
      const b = other.m[i];
      if (a !== b && !(Number.isNaN(a) && Number.isNaN(b))) return false;
    }
    return true;
  }

  approxEquals(other: Transform, epsilon = 1e-9): boolean {
    for (let i = 0; i < 16; i++) {
      if (Math.abs(this.m[i] - other.m[i]) > epsilon) return false;
    }
    return true;
  }

  hash(): number {
    return hashNumbers(this.m);
  }

  /** Column-major values, the layout `fromColumnMajor` accepts. */
  toArray(): number[] {
    return Array.from(this.m);
  }
}

const IDENTITY = Transform.identity();
