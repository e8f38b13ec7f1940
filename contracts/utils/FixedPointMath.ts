import { CustomError } from "./CustomError";

export const WAD = 10n ** 18n;

const RAY36 = 10n ** 36n;
const LN2_36 = 693_147_180_559_945_309_417_232_121_458_176_568n;
const MIN_EXP = -41_446_531_673_892_822_313n;
const MAX_EXP = 135_305_999_368_893_231_589n;

export function mulDivDown(x: bigint, y: bigint, denominator: bigint) {
  return (x * y) / denominator;
}

export function mulDivUp(x: bigint, y: bigint, denominator: bigint) {
  const product = x * y;
  if (product === 0n) return 0n;
  return (product - 1n) / denominator + 1n;
}

export function mulWadDown(x: bigint, y: bigint) {
  return mulDivDown(x, y, WAD);
}

export function mulWadUp(x: bigint, y: bigint) {
  return mulDivUp(x, y, WAD);
}

export function divWadDown(x: bigint, y: bigint) {
  return mulDivDown(x, WAD, y);
}

export function divWadUp(x: bigint, y: bigint) {
  return mulDivUp(x, WAD, y);
}

export function min(a: bigint, b: bigint) {
  return a < b ? a : b;
}

export function max(a: bigint, b: bigint) {
  return a > b ? a : b;
}

/**
 * `e^(x / 1e18)` scaled by 1e18, truncated.
 * `x` is reduced to `k·ln2 + r` with `|r| ≤ ln2 / 2`; `e^r` runs as a taylor series at 36 decimals.
 */
export function expWad(x: bigint) {
  if (x <= MIN_EXP) return 0n;
  if (x >= MAX_EXP) throw new ExpOverflow(x);

  const scaled = x * WAD;
  const k = (scaled + (scaled < 0n ? -LN2_36 : LN2_36) / 2n) / LN2_36;
  const r = scaled - k * LN2_36;

  let term = RAY36;
  let sum = RAY36;
  for (let i = 1n; term !== 0n; i++) {
    term = (term * r) / (RAY36 * i);
    sum += term;
  }
  return (k >= 0n ? sum << k : sum >> -k) / WAD;
}

export class ExpOverflow extends CustomError {
  constructor(readonly x: bigint) {
    super([x]);
  }
}
