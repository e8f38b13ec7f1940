export interface IInterestRateModel {
  readonly address: string;
  /** Fee rate, 18 decimals, owed on a borrow at `maturity` for the whole remaining term. */
  getRateToBorrow(maturity: number, timestamp: number, borrowed: bigint, suppliedMP: bigint, suppliedSP: bigint): bigint;
  /** Yearly rate, 18 decimals, of the flexible pool at `utilization`. */
  getFlexibleBorrowRate(utilization: bigint): bigint;
}
