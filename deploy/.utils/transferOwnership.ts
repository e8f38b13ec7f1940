import type { Owned } from "../../contracts/utils/Contract";
import type { Deployments } from "./deployments";
import format from "./format";

export default (contract: Owned, from: string, to: string, deployments: Deployments) => {
  if (contract.owner === to) return;
  deployments.log("executing", `${String(format(contract.address, deployments))}.transferOwnership`, format(to, deployments));
  contract.connect(from).transferOwnership(to);
};
