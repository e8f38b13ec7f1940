import { InterestRateModel } from "../contracts/InterestRateModel";
import type { DeployFunction } from "./.utils/deployments";
import transferOwnership from "./.utils/transferOwnership";

const func: DeployFunction = ({
  chain,
  finance: { markets },
  namedAccounts: { deployer, multisig },
  deployments,
}) => {
  for (const [symbol, { interestRateModel }] of Object.entries(markets)) {
    const name = `InterestRateModel${symbol}`;
    const irm = deployments.save(
      name,
      InterestRateModel.deploy(chain, interestRateModel.fixedCurve, interestRateModel.flexibleCurve, deployer),
    );
    deployments.interestRateModels.set(symbol, irm);
    transferOwnership(irm, deployer, multisig, deployments);
  }
};

func.tags = ["InterestRateModel"];

export default func;
