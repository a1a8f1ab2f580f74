/**
 * Pure shape utilities shared by tensor values and element-wise ops.
 */

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function broadcastShapes(
  a: readonly number[],
  b: readonly number[],
): number[] {
  const outRank = Math.max(a.length, b.length);
  const out = new Array<number>(outRank);
  for (let i = 0; i < outRank; i++) {
    const aDim = a[a.length - 1 - i] ?? 1;
    const bDim = b[b.length - 1 - i] ?? 1;
    if (aDim !== bDim && aDim !== 1 && bDim !== 1) {
      throw new Error(`Cannot broadcast shapes [${a}] and [${b}]`);
    }
    out[outRank - 1 - i] = Math.max(aDim, bDim);
  }
  return out;
}

export function shapesEqual(
  a: readonly number[],
  b: readonly number[],
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function contiguousStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

/**
 * Map a flat index into `outShape` to the flat index of the same element in
 * a (smaller or equal rank) input shape that broadcasts to it.
 */
export function broadcastOffset(
  flatIndex: number,
  outShape: readonly number[],
  inShape: readonly number[],
): number {
  const inStrides = contiguousStrides(inShape);
  const rankDiff = outShape.length - inShape.length;
  let remaining = flatIndex;
  let offset = 0;
  for (let i = outShape.length - 1; i >= 0; i--) {
    const coord = remaining % outShape[i];
    remaining = Math.floor(remaining / outShape[i]);
    const inAxis = i - rankDiff;
    if (inAxis >= 0 && inShape[inAxis] !== 1) {
      offset += coord * inStrides[inAxis];
    }
  }
  return offset;
}
