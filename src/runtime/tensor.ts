import { shapesEqual, sizeOf } from "../core/shape";

export type DType = "f32" | "i32" | "bool";

export type TensorData = Float32Array | Int32Array | Uint8Array;

export interface TensorCreateOptions {
  dtype?: DType;
  requiresGrad?: boolean;
}

function allocate(dtype: DType, size: number): TensorData {
  switch (dtype) {
    case "f32":
      return new Float32Array(size);
    case "i32":
      return new Int32Array(size);
    case "bool":
      return new Uint8Array(size);
  }
}

let nextTensorId = 1;

/**
 * Dense CPU tensor. Values held by module attributes and graph constants.
 */
export class Tensor {
  readonly id: number;
  readonly shape: readonly number[];
  readonly dtype: DType;
  readonly data: TensorData;
  private _requiresGrad: boolean;

  constructor(
    data: TensorData,
    shape: readonly number[],
    dtype: DType,
    requiresGrad = false,
  ) {
    if (data.length !== sizeOf(shape)) {
      throw new Error(
        `Tensor data length ${data.length} does not match shape [${shape}]`,
      );
    }
    this.id = nextTensorId++;
    this.data = data;
    this.shape = shape.slice();
    this.dtype = dtype;
    this._requiresGrad = requiresGrad;
  }

  static fromArray(
    values: readonly number[],
    shape: readonly number[] = [values.length],
    options: TensorCreateOptions = {},
  ): Tensor {
    const dtype = options.dtype ?? "f32";
    const data = allocate(dtype, values.length);
    for (let i = 0; i < values.length; i++) {
      data[i] = dtype === "bool" ? (values[i] ? 1 : 0) : values[i];
    }
    return new Tensor(data, shape, dtype, options.requiresGrad ?? false);
  }

  static scalar(value: number, options: TensorCreateOptions = {}): Tensor {
    return Tensor.fromArray([value], [], options);
  }

  static empty(shape: readonly number[], dtype: DType): Tensor {
    return new Tensor(allocate(dtype, sizeOf(shape)), shape, dtype);
  }

  get requiresGrad(): boolean {
    return this._requiresGrad;
  }

  setRequiresGrad(requiresGrad: boolean): this {
    if (requiresGrad && this.dtype !== "f32") {
      throw new Error("Only floating point tensors can require gradients");
    }
    this._requiresGrad = requiresGrad;
    return this;
  }

  get numel(): number {
    return this.data.length;
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  item(): number {
    if (this.numel !== 1) {
      throw new Error(
        `item() needs a single-element tensor, got shape [${this.shape}]`,
      );
    }
    return this.data[0];
  }

  /**
   * Copy with fresh storage. The gradient flag travels with the copy.
   */
  clone(): Tensor {
    return new Tensor(
      this.data.slice(),
      this.shape,
      this.dtype,
      this._requiresGrad,
    );
  }

  equals(other: Tensor): boolean {
    if (this.dtype !== other.dtype || !shapesEqual(this.shape, other.shape)) {
      return false;
    }
    for (let i = 0; i < this.data.length; i++) {
      const a = this.data[i];
      const b = other.data[i];
      if (a !== b && !(Number.isNaN(a) && Number.isNaN(b))) {
        return false;
      }
    }
    return true;
  }

  toString(): string {
    return `tensor([${this.toArray().join(", ")}], shape=[${this.shape}], dtype=${this.dtype})`;
  }
}
