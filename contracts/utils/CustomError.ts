export type ErrorArg = bigint | number | string | boolean;

/** Named failure of a ledger call; the whole transaction is rolled back when one is thrown. */
export abstract class CustomError extends Error {
  readonly args: readonly ErrorArg[];

  constructor(args: readonly ErrorArg[] = []) {
    super();
    this.name = new.target.name;
    this.args = args;
    this.message = `${this.name}(${args.join(", ")})`;
  }
}
