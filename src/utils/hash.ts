const scratch = new Float64Array(1);
const scratchWords = new Uint32Array(scratch.buffer);

/**
 * 32-bit FNV-1a over the IEEE-754 bit patterns of `values`.
 *
 * +0/-0 hash alike, as do all NaNs, so values that compare equal under
 * `Transform.equals` always share a hash.
 */
export function hashNumbers(values: ArrayLike<number>): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    scratch[0] = v === 0 ? 0 : Number.isNaN(v) ? Number.NaN : v;
    h = Math.imul(h ^ scratchWords[0], 0x01000193);
    h = Math.imul(h ^ scratchWords[1], 0x01000193);
  }
  return h >>> 0;
}
