import { ArithmeticOverflowError } from "./errors.js";

// amounts are unsigned 128-bit integers
export const UINT128_MAX = (1n << 128n) - 1n;

export function isUint128(value: bigint): boolean {
  return value >= 0n && value <= UINT128_MAX;
}

export function checkedAdd(a: bigint, b: bigint, operation: string): bigint {
  const sum = a + b;
  if (sum > UINT128_MAX) {
    throw new ArithmeticOverflowError(operation);
  }
  return sum;
}

export function checkedMul(a: bigint, b: bigint, operation: string): bigint {
  const product = a * b;
  if (product > UINT128_MAX) {
    throw new ArithmeticOverflowError(operation);
  }
  return product;
}

export function checkedSum(values: readonly bigint[], operation: string): bigint {
  return values.reduce((sum, value) => checkedAdd(sum, value, operation), 0n);
}
