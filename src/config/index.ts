import "dotenv/config";
import { feePercentToFraction } from "../engine/fees.js";

const optionalEnv = (key: string, fallback: string): string => {
  const value = process.env[key];
  return value === undefined || value === "" ? fallback : value;
};

function makeConfig() {
  return {
    get nodeEnv(): string {
      return optionalEnv("NODE_ENV", "development");
    },
    get appName(): string {
      return optionalEnv("APP_NAME", "outcome-market");
    },
    /** pino level; tests run silent unless LOG_LEVEL says otherwise. */
    get logLevel(): string {
      return optionalEnv("LOG_LEVEL", this.nodeEnv === "test" ? "silent" : "info");
    },
    /** Default fee for registry-created markets, as a decimal percent (e.g. "2" or "0.25"). */
    get marketFeePercent(): string {
      return optionalEnv("MARKET_FEE_PERCENT", "0");
    },
    get defaultFeeFraction(): bigint {
      return feePercentToFraction(this.marketFeePercent);
    },
  };
}

export const config = makeConfig();
