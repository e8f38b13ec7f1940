export interface IERC20 {
  readonly address: string;
  decimals(): number;
  symbol(): string;
  balanceOf(account: string): bigint;
  connect(account: string): IERC20;
  transfer(to: string, amount: bigint): boolean;
  transferFrom(from: string, to: string, amount: bigint): boolean;
}
