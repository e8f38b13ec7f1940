import type { Chain } from "../../contracts/Chain";
import type { Deployments } from "./deployments";
import format from "./format";

/** Prints every committed ledger event, addresses replaced by deployment names. */
export default (chain: Chain, deployments: Deployments) =>
  chain.events$.subscribe(({ address, event, args }) => {
    console.log(`${String(format(address, deployments))}.${event}`, format(args, deployments));
  });
