/**
 * Byte-Order Marks
 * Detection of the UTF-8, UTF-16 and UTF-32 BOM byte patterns
 */

import { hostByteOrder, swap16, swap32 } from './endian.js';
import type { ConcreteByteOrder } from './endian.js';

const BOM = 0xfeff;

/** EF BB BF */
export function utf8HasBom(bytes: Uint8Array, length = bytes.length): boolean {
  return (
    length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf
  );
}

/** Value of a host-read 16-bit unit when its memory bytes are taken in `order` */
function unit16In(unit: number, order: ConcreteByteOrder): number {
  return order === hostByteOrder() ? unit : swap16(unit);
}

function unit32In(unit: number, order: ConcreteByteOrder): number {
  return order === hostByteOrder() ? unit : swap32(unit);
}

/** Memory bytes FF FE */
export function utf16IsBomLe(unit: number): boolean {
  return unit16In(unit, 'le') === BOM;
}

/** Memory bytes FE FF */
export function utf16IsBomBe(unit: number): boolean {
  return unit16In(unit, 'be') === BOM;
}

export function utf16HasBom(units: Uint16Array, length = units.length): boolean {
  return length >= 1 && (utf16IsBomLe(units[0]) || utf16IsBomBe(units[0]));
}

/** Memory bytes FF FE 00 00 */
export function utf32IsBomLe(unit: number): boolean {
  return unit32In(unit, 'le') === BOM;
}

/** Memory bytes 00 00 FE FF */
export function utf32IsBomBe(unit: number): boolean {
  return unit32In(unit, 'be') === BOM;
}

export function utf32HasBom(units: Uint32Array, length = units.length): boolean {
  return length >= 1 && (utf32IsBomLe(units[0]) || utf32IsBomBe(units[0]));
}

/**
 * Byte order announced by a leading 16-bit unit, or null when it is no BOM.
 */
export function utf16BomOrder(unit: number): ConcreteByteOrder | null {
  if (utf16IsBomLe(unit)) return 'le';
  if (utf16IsBomBe(unit)) return 'be';
  return null;
}

export function utf32BomOrder(unit: number): ConcreteByteOrder | null {
  if (utf32IsBomLe(unit)) return 'le';
  if (utf32IsBomBe(unit)) return 'be';
  return null;
}
