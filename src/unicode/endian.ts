/**
 * Byte Order
 * Host detection and unit byte swapping
 */

import { endianness } from 'node:os';
import type { ByteOrder } from './types.js';

export type ConcreteByteOrder = 'le' | 'be';

export function hostByteOrder(): ConcreteByteOrder {
  return endianness() === 'LE' ? 'le' : 'be';
}

export function resolveByteOrder(order: ByteOrder): ConcreteByteOrder {
  return order === 'native' ? hostByteOrder() : order;
}

/** True when units stored in `order` must be swapped to be read on this host */
export function needsSwap(order: ByteOrder): boolean {
  return resolveByteOrder(order) !== hostByteOrder();
}

export function swap16(unit: number): number {
  return ((unit & 0xff) << 8) | ((unit >> 8) & 0xff);
}

export function swap32(unit: number): number {
  return (
    (((unit & 0xff) << 24) |
      ((unit & 0xff00) << 8) |
      ((unit >>> 8) & 0xff00) |
      ((unit >>> 24) & 0xff)) >>>
    0
  );
}

/** Swap the byte order of the first `length` units in place */
export function swapUtf16Endian(units: Uint16Array, length = units.length): void {
  const end = Math.min(length, units.length);
  for (let i = 0; i < end; i++) {
    units[i] = swap16(units[i]);
  }
}

/** Swap the byte order of the first `length` units in place */
export function swapUtf32Endian(units: Uint32Array, length = units.length): void {
  const end = Math.min(length, units.length);
  for (let i = 0; i < end; i++) {
    units[i] = swap32(units[i]);
  }
}
