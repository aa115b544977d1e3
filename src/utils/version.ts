/**
 * Compare dotted version strings numerically ("1.10" > "1.9"). Missing
 * components count as zero. Versions with non-numeric components fall back
 * to plain string ordering.
 */
export function compareVersions(a: string, b: string): number {
  const partsA = parseNumericVersion(a);
  const partsB = parseNumericVersion(b);
  if (partsA === null || partsB === null) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const length = Math.max(partsA.length, partsB.length);
  for (let i = 0; i < length; i += 1) {
    const left = partsA[i] ?? 0;
    const right = partsB[i] ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return 0;
}

function parseNumericVersion(version: string): number[] | null {
  const parts = version.trim().split(".");
  const numbers: number[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part)) {
      return null;
    }
    numbers.push(Number(part));
  }
  return numbers;
}
