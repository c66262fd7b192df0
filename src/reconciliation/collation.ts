// Shared ordering for every name-sorted output
export const nameCollator = new Intl.Collator('he');

export function compareNames(a: string, b: string): number {
  return nameCollator.compare(a, b);
}
