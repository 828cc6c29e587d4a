// b2i converts a boolean to 0 or 1.
export function b2i(b: boolean): number {
  return b ? 1 : 0;
}
