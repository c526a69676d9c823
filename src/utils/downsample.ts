/**
 * Stride downsampling for time series.
 *
 * Keeps every `stride`-th sample starting at index 0, so output index `i`
 * is input index `i * stride`. Values are never reordered or interpolated.
 */

export type DownsamplePlan =
  | { downsampled: false; stride: 1 }
  | { downsampled: true; stride: number };

export interface Downsampled<T> {
  values: T[];
  downsampled: boolean;
  stride: number;
}

/**
 * Decide the stride for a series of `length` samples bounded by `maxPoints`.
 */
export function planDownsample(length: number, maxPoints: number): DownsamplePlan {
  if (!Number.isInteger(maxPoints) || maxPoints < 1) {
    throw new RangeError(`maxPoints must be a positive integer, got ${maxPoints}`);
  }

  if (length <= maxPoints) {
    return { downsampled: false, stride: 1 };
  }

  return { downsampled: true, stride: Math.floor(length / maxPoints) };
}

/**
 * Apply a plan computed for another series of the same length.
 */
export function applyStride<T>(values: ArrayLike<T>, plan: DownsamplePlan): T[] {
  const result: T[] = [];
  for (let i = 0; i < values.length; i += plan.stride) {
    result.push(values[i]);
  }
  return result;
}

export function downsample<T>(values: ArrayLike<T>, maxPoints: number): Downsampled<T> {
  const plan = planDownsample(values.length, maxPoints);
  return {
    values: applyStride(values, plan),
    downsampled: plan.downsampled,
    stride: plan.stride
  };
}
