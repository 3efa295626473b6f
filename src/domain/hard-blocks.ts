import type { NormalizedTransaction, ScoringConfig } from "./types.js";

export type HardBlockPredicate = (transaction: NormalizedTransaction, config: ScoringConfig) => boolean;

export type HardBlockRegistry = Readonly<Record<string, HardBlockPredicate>>;

export const DEFAULT_HARD_BLOCKS: HardBlockRegistry = {
  chargeback_high_ip_risk: (transaction, config) =>
    transaction.chargeback_count >= config.hardBlock.minChargebacks
    && config.hardBlock.ipRiskLevels.includes(transaction.ip_risk),
};

/** Names of every predicate that holds, in registry order. */
export function matchHardBlocks(
  transaction: NormalizedTransaction,
  config: ScoringConfig,
  registry: HardBlockRegistry = DEFAULT_HARD_BLOCKS,
): string[] {
  return Object.entries(registry)
    .filter(([, predicate]) => predicate(transaction, config))
    .map(([name]) => name);
}

export function hardBlockReason(name: string): string {
  return `hard_block:${name}`;
}
