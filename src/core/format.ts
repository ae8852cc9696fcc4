/**
 * Strips trailing zeroes after a decimal point, then the point itself if it
 * is left bare. Strings without a point come back unchanged.
 */
export function trimZeroes(input: string): string {
  if (!input.includes('.')) return input;
  return input.replace(/0+$/, '').replace(/\.$/, '');
}
