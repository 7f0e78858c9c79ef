/**
 * Memory quantity helpers
 */

const MEMORY_UNITS: ReadonlyArray<readonly [suffix: string, factor: number]> = [
  ['gib', 1024],
  ['gi', 1024],
  ['gb', 1000],
  ['g', 1000],
  ['mib', 1],
  ['mi', 1],
  ['mb', 1],
  ['m', 1],
];

const DECIMAL = /^(\d+\.?\d*|\.\d+)$/;

/**
 * Convert a memory quantity (`6Gi`, `512m`, `2g`, `1024`) to whole megabytes.
 *
 * Suffixes are matched case-insensitively, longest first, so `gib` wins over
 * `g`. Returns `undefined` when the remainder is not a decimal number.
 */
export function memoryQuantityToMB(text: string): number | undefined {
  let raw = text.trim().toLowerCase();
  if (!raw) {
    return undefined;
  }

  let factor = 1;
  for (const [suffix, unitFactor] of MEMORY_UNITS) {
    if (raw.endsWith(suffix)) {
      factor = unitFactor;
      raw = raw.slice(0, -suffix.length).trim();
      break;
    }
  }

  if (!DECIMAL.test(raw)) {
    return undefined;
  }
  return Math.trunc(Number.parseFloat(raw) * factor);
}
