import { CustomError } from "./CustomError";

export class InsufficientBalance extends CustomError {
  constructor(account: string, amount: bigint) {
    super([account, amount]);
  }
}

export class InsufficientAllowance extends CustomError {
  constructor(owner: string, spender: string, amount: bigint) {
    super([owner, spender, amount]);
  }
}
