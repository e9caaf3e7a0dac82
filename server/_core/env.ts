import { z } from "zod";

// Optional numeric env var: blank or unparseable falls back to the default.
const numeric = (fallback: number) =>
  z.coerce.number().finite().catch(fallback).default(fallback);

const engineEnvSchema = z.object({
  HEDGE_ALERT_THRESHOLD_USD: numeric(100_000),
  DEFAULT_FUNDING_RATE: numeric(0.053),
  REBALANCING_THRESHOLD_SHARES: numeric(1000),
  FUTURES_CONTRACT_MULTIPLIER: numeric(25),
  DEFAULT_FUTURES_PRICE: numeric(5300),
  RESULT_CACHE_TTL_MS: numeric(5 * 60 * 1000),
});

export interface EngineConfig {
  hedgeAlertThresholdUsd: number;   // |net equity exposure| above this raises the hedge alert
  defaultFundingRate: number;       // decimal, used when a basket has no cash borrow leg
  rebalancingThresholdShares: number;
  futuresContractMultiplier: number; // USD per index point per contract
  defaultFuturesPrice: number;      // reference level when a basket holds no futures
  resultCacheTtlMs: number;
}

function readEngineConfig(env: NodeJS.ProcessEnv): EngineConfig {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(engineEnvSchema.shape)) {
    const value = env[key];
    raw[key] = value === undefined || value.trim() === "" ? undefined : value;
  }

  const parsed = engineEnvSchema.parse(raw);

  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && !Number.isFinite(Number(value))) {
      console.warn(`[Config] Ignoring non-numeric ${key}="${value}", using default`);
    }
  }

  return {
    hedgeAlertThresholdUsd: parsed.HEDGE_ALERT_THRESHOLD_USD,
    defaultFundingRate: parsed.DEFAULT_FUNDING_RATE,
    rebalancingThresholdShares: parsed.REBALANCING_THRESHOLD_SHARES,
    futuresContractMultiplier: parsed.FUTURES_CONTRACT_MULTIPLIER,
    defaultFuturesPrice: parsed.DEFAULT_FUTURES_PRICE,
    resultCacheTtlMs: parsed.RESULT_CACHE_TTL_MS,
  };
}

export const ENV = {
  engine: readEngineConfig(process.env),
};

export const ENGINE_CONFIG: EngineConfig = ENV.engine;

export { readEngineConfig };
