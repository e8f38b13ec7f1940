import { Market } from "../contracts/Market";
import type { DeployFunction } from "./.utils/deployments";
import transferOwnership from "./.utils/transferOwnership";

const func: DeployFunction = ({ chain, finance, namedAccounts: { deployer, multisig, treasury }, deployments }) => {
  const { auditor } = deployments;

  for (const [symbol, config] of Object.entries(finance.markets)) {
    const asset = deployments.get(deployments.assets, symbol);
    const market = deployments.save(
      `Market${symbol}`,
      Market.deploy(
        chain,
        asset,
        auditor,
        {
          maxFuturePools: finance.futurePools,
          earningsAccumulatorSmoothFactor: finance.earningsAccumulatorSmoothFactor,
          interestRateModel: deployments.get(deployments.interestRateModels, symbol),
          penaltyRate: finance.penaltyRate,
          backupFeeRate: finance.backupFeeRate,
          reserveFactor: finance.reserveFactor,
          dampSpeedUp: finance.dampSpeed.up,
          dampSpeedDown: finance.dampSpeed.down,
        },
        deployer,
      ),
    );
    deployments.markets.set(symbol, market);

    if (market.treasury !== treasury || market.treasuryFeeRate !== finance.treasuryFeeRate) {
      deployments.log("executing", `Market${symbol}.setTreasury`, "treasury", finance.treasuryFeeRate);
      market.connect(deployer).setTreasury(treasury, finance.treasuryFeeRate);
    }

    if (!auditor.allMarkets().includes(market.address)) {
      deployments.log("executing", `Auditor.enableMarket`, `Market${symbol}`, config.adjustFactor);
      auditor.connect(deployer).enableMarket(market, config.adjustFactor, asset.decimals());
    } else if (auditor.markets(market.address).adjustFactor !== config.adjustFactor) {
      auditor.connect(deployer).setAdjustFactor(market.address, config.adjustFactor);
    }

    transferOwnership(market, deployer, multisig, deployments);
  }

  transferOwnership(auditor, deployer, multisig, deployments);
};

func.tags = ["Markets"];
func.dependencies = ["Assets", "Auditor", "InterestRateModel"];

export default func;
