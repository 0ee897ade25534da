/**
 * ProDOS access byte <-> eight-character access string.
 *
 * Bits from MSB to LSB: destroy (d), rename (n), backup (b), two reserved
 * bits shown as `.`, invisible (i), write (w), read (r). A clear bit is `-`.
 * 0xC3 formats as `dn-..-wr`.
 */

const ACCESS_LAYOUT: ReadonlyArray<{ bit: number; letter: string } | null> = [
  { bit: 0x80, letter: 'd' },
  { bit: 0x40, letter: 'n' },
  { bit: 0x20, letter: 'b' },
  null,
  null,
  { bit: 0x04, letter: 'i' },
  { bit: 0x02, letter: 'w' },
  { bit: 0x01, letter: 'r' }
];

export const DEFAULT_ACCESS = 'dn-..-wr';

export function formatAccessByte(accessByte: number): string {
  if (!Number.isInteger(accessByte) || accessByte < 0 || accessByte > 0xff) {
    throw new RangeError(`access byte out of range: ${accessByte}`);
  }
  return ACCESS_LAYOUT.map(slot => {
    if (!slot) return '.';
    return accessByte & slot.bit ? slot.letter : '-';
  }).join('');
}

/**
 * Returns null unless `value` is exactly eight characters in the layout above.
 */
export function parseAccessByte(value: string): number | null {
  if (value.length !== ACCESS_LAYOUT.length) return null;

  let result = 0;
  for (let i = 0; i < ACCESS_LAYOUT.length; i++) {
    const slot = ACCESS_LAYOUT[i];
    const char = value[i];
    if (!slot) {
      if (char !== '.') return null;
      continue;
    }
    if (char === slot.letter) {
      result |= slot.bit;
    } else if (char !== '-') {
      return null;
    }
  }
  return result;
}

export function isValidAccess(value: string): boolean {
  return parseAccessByte(value) !== null;
}
