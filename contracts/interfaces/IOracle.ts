/** USD price source, 18 decimals, keyed by market. */
export interface IOracle {
  readonly address: string;
  price(market: string): bigint;
}
