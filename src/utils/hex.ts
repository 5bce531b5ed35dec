/**
 * Fixed-width uppercase hex renderings used for FormIDs and flag words.
 */
export function toHex(value: number, width: number): string {
  return (value >>> 0).toString(16).toUpperCase().padStart(width, '0');
}

export function hex8(value: number): string {
  return toHex(value, 8);
}
