import { CustomError } from "./CustomError";
import { mulDivDown, mulDivUp, mulWadDown, min } from "./FixedPointMath";

export const INTERVAL = 4 * 7 * 86_400;

const MATURITY_MASK = (1n << 32n) - 1n;

export interface Pool {
  /** principal borrowed from the maturity. */
  borrowed: bigint;
  /** principal deposited into the maturity. */
  supplied: bigint;
  /** part of `borrowed` funded by the smart pool, always `max(0, borrowed - supplied)`. */
  suppliedSP: bigint;
  unassignedEarnings: bigint;
  lastAccrual: number;
}

export interface Position {
  principal: bigint;
  fee: bigint;
}

export enum State {
  NONE,
  INVALID,
  MATURED,
  VALID,
  NOT_READY,
}

export function emptyPool(timestamp: number): Pool {
  return { borrowed: 0n, supplied: 0n, suppliedSP: 0n, unassignedEarnings: 0n, lastAccrual: timestamp };
}

function backupSupplied(borrowed: bigint, supplied: bigint) {
  return borrowed > supplied ? borrowed - supplied : 0n;
}

/** Releases the unassigned earnings linearly until maturity, returning what the smart pool earned. */
export function accrueEarnings(pool: Pool, maturity: number, timestamp: number) {
  const { lastAccrual } = pool;

  if (timestamp < maturity) {
    const { unassignedEarnings } = pool;
    pool.lastAccrual = timestamp;
    const earnings =
      maturity > lastAccrual
        ? mulDivDown(unassignedEarnings, BigInt(timestamp - lastAccrual), BigInt(maturity - lastAccrual))
        : 0n;
    pool.unassignedEarnings = unassignedEarnings - earnings;
    return earnings;
  }
  if (lastAccrual === maturity) return 0n;

  pool.lastAccrual = maturity;
  const earnings = pool.unassignedEarnings;
  pool.unassignedEarnings = 0n;
  return earnings;
}

/** Earnings {@link accrueEarnings} would release at `timestamp`, without touching the pool. */
export function pendingEarnings(pool: Pool, maturity: number, timestamp: number) {
  if (maturity <= pool.lastAccrual) return 0n;
  if (timestamp >= maturity) return pool.unassignedEarnings;
  return mulDivDown(pool.unassignedEarnings, BigInt(timestamp - pool.lastAccrual), BigInt(maturity - pool.lastAccrual));
}

/**
 * Fee a deposit of `amount` takes from the unassigned earnings, in proportion to the share of the smart pool's
 * backup it replaces. Returns the depositor's yield and the fee kept for the smart pool.
 */
export function calculateDeposit(pool: Pool, amount: bigint, backupFeeRate: bigint): [bigint, bigint] {
  const { suppliedSP } = pool;
  if (suppliedSP === 0n) return [0n, 0n];

  const earnings = mulDivDown(pool.unassignedEarnings, min(amount, suppliedSP), suppliedSP);
  const backupFee = mulWadDown(earnings, backupFeeRate);
  return [earnings - backupFee, backupFee];
}

/**
 * Inverse of {@link calculateDeposit}, taken on the pool after the withdrawal: the share of the unassigned earnings,
 * plus the `fee` the withdrawn position had earned, that matches the backup the withdrawal creates.
 */
export function calculateWithdraw(pool: Pool, amount: bigint, fee: bigint) {
  const { suppliedSP } = pool;
  if (suppliedSP === 0n) return 0n;

  return mulDivUp(pool.unassignedEarnings + fee, min(amount, suppliedSP), suppliedSP);
}

/** @returns the smart pool backup debt the deposit replaces. */
export function deposit(pool: Pool, amount: bigint) {
  pool.supplied += amount;
  return updateBackup(pool);
}

/** @returns the smart pool backup debt the withdrawal creates. */
export function withdraw(pool: Pool, amount: bigint) {
  pool.supplied -= amount;
  return -updateBackup(pool);
}

/** @returns the smart pool backup debt the borrow creates. */
export function borrow(pool: Pool, amount: bigint) {
  pool.borrowed += amount;
  return -updateBackup(pool);
}

/** @returns the smart pool backup debt the repayment releases. */
export function repay(pool: Pool, amount: bigint) {
  pool.borrowed -= amount;
  return updateBackup(pool);
}

function updateBackup(pool: Pool) {
  const previous = pool.suppliedSP;
  pool.suppliedSP = backupSupplied(pool.borrowed, pool.supplied);
  return previous - pool.suppliedSP;
}

/**
 * Splits `earnings` produced by an operation of `amount` into the part backed by the smart pool and the part
 * funded by maturity depositors alone.
 */
export function distributeEarnings(pool: Pool, earnings: bigint, amount: bigint): [bigint, bigint] {
  const backupEarnings = amount === 0n ? 0n : mulDivDown(earnings, min(pool.suppliedSP, amount), amount);
  return [backupEarnings, earnings - backupEarnings];
}

export function scaleProportionally(position: Readonly<Position>, amount: bigint): Position {
  const total = position.principal + position.fee;
  if (total === 0n) return { principal: 0n, fee: 0n };
  const principal = mulDivDown(position.principal, amount, total);
  return { principal, fee: amount - principal };
}

export function reduceProportionally(position: Position, amount: bigint) {
  const scaled = scaleProportionally(position, amount);
  position.principal -= scaled.principal;
  position.fee -= scaled.fee;
}

export function getPoolState(maturity: number, timestamp: number, maxPools: number) {
  if (maturity % INTERVAL !== 0) return State.INVALID;
  if (maturity < timestamp) return State.MATURED;
  if (maturity > timestamp - (timestamp % INTERVAL) + INTERVAL * maxPools) return State.NOT_READY;
  return State.VALID;
}

export function setMaturity(encoded: bigint, maturity: number) {
  const target = BigInt(maturity);
  if (encoded === 0n) return target | (1n << 32n);

  const baseMaturity = encoded & MATURITY_MASK;
  if (target < baseMaturity) {
    const range = (baseMaturity - target) / BigInt(INTERVAL);
    return target | ((((encoded >> 32n) << range) | 1n) << 32n);
  }
  const range = (target - baseMaturity) / BigInt(INTERVAL);
  if (range > 223n) throw new MaturityOverflow();
  return encoded | (1n << (32n + range));
}

export function clearMaturity(encoded: bigint, maturity: number) {
  const target = BigInt(maturity);
  if (encoded === 0n || encoded === (target | (1n << 32n))) return 0n;

  const baseMaturity = encoded & MATURITY_MASK;
  if (target !== baseMaturity) {
    return encoded & ~(1n << (32n + (target - baseMaturity) / BigInt(INTERVAL)));
  }

  let packed = (encoded >> 32n) & ~1n;
  let base = baseMaturity;
  while (packed !== 0n && (packed & 1n) === 0n) {
    packed >>= 1n;
    base += BigInt(INTERVAL);
  }
  return packed === 0n ? 0n : base | (packed << 32n);
}

export function hasMaturity(encoded: bigint, maturity: number) {
  if (encoded === 0n) return false;
  const baseMaturity = encoded & MATURITY_MASK;
  const target = BigInt(maturity);
  if (target < baseMaturity) return false;
  return ((encoded >> (32n + (target - baseMaturity) / BigInt(INTERVAL))) & 1n) === 1n;
}

/** Maturities present in `encoded`, ascending. */
export function maturities(encoded: bigint) {
  const result: number[] = [];
  let maturity = Number(encoded & MATURITY_MASK);
  for (let packed = encoded >> 32n; packed !== 0n; packed >>= 1n, maturity += INTERVAL) {
    if ((packed & 1n) === 1n) result.push(maturity);
  }
  return result;
}

export class MaturityOverflow extends CustomError {}
