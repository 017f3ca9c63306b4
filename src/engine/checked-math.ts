import { SaleEngineError } from './sale-engine.error.js';

/** Domain of quantities, supply counters, quota counters and sale versions. */
export const UINT32_MAX = 0xffff_ffff;
export const UINT128_MAX = (1n << 128n) - 1n;
export const UINT256_MAX = (1n << 256n) - 1n;

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= UINT32_MAX;
}

export function isTimestamp(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function isPositiveQuantity(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function checkedAdd(a: number, b: number, field: string): number {
  const sum = a + b;
  if (sum > UINT32_MAX) {
    throw new SaleEngineError(
      'ARITHMETIC_OVERFLOW',
      `${field} overflows: ${a} + ${b}`,
    );
  }
  return sum;
}

export function checkedAmountAdd(a: bigint, b: bigint, field: string): bigint {
  const sum = a + b;
  if (sum > UINT256_MAX) {
    throw new SaleEngineError('ARITHMETIC_OVERFLOW', `${field} overflows`);
  }
  return sum;
}

export function checkedAmountMul(a: bigint, b: bigint, field: string): bigint {
  const product = a * b;
  if (product > UINT256_MAX) {
    throw new SaleEngineError('ARITHMETIC_OVERFLOW', `${field} overflows`);
  }
  return product;
}
