import { aggregateSignals } from "../domain/aggregator.js";
import { DEFAULT_HARD_BLOCKS, hardBlockReason, matchHardBlocks, type HardBlockRegistry } from "../domain/hard-blocks.js";
import { DEFAULT_RULES, type RiskRule } from "../domain/rules.js";
import { describeScoringConfig } from "../domain/scoring-config.js";
import type {
  NormalizedTransaction,
  RiskEvaluation,
  ScoreSignal,
  ScoringConfig,
  ScoringConfigSnapshot,
} from "../domain/types.js";
import type { RiskEnginePort } from "../ports/risk-engine.js";
import { normalizeTransaction } from "./transaction-normalizer.js";

export type EvaluationListener = (
  evaluation: RiskEvaluation,
  signals: readonly ScoreSignal[],
) => void;

interface RiskScorerOptions {
  rules?: readonly RiskRule[];
  hardBlocks?: HardBlockRegistry;
  onEvaluated?: EvaluationListener;
}

export class RiskScorer implements RiskEnginePort {
  private readonly rules: readonly RiskRule[];
  private readonly hardBlocks: HardBlockRegistry;
  private readonly onEvaluated: EvaluationListener | undefined;

  constructor(
    private readonly config: ScoringConfig,
    options: RiskScorerOptions = {},
  ) {
    this.rules = options.rules ?? DEFAULT_RULES;
    this.hardBlocks = options.hardBlocks ?? DEFAULT_HARD_BLOCKS;
    this.onEvaluated = options.onEvaluated;
  }

  evaluate(payload: unknown): RiskEvaluation {
    const transaction = normalizeTransaction(payload);
    const signals = this.collectSignals(transaction);
    const hardBlocks = matchHardBlocks(transaction, this.config, this.hardBlocks);
    const { riskScore, decision } = aggregateSignals(
      signals,
      hardBlocks.length > 0,
      this.config.scoreToDecision,
    );

    const evaluation: RiskEvaluation = {
      transaction_id: transaction.transaction_id,
      risk_score: riskScore,
      decision,
      reasons: [...signals.map((signal) => signal.reason), ...hardBlocks.map(hardBlockReason)],
      hard_blocks: hardBlocks,
    };
    this.onEvaluated?.(evaluation, signals);
    return evaluation;
  }

  collectSignals(transaction: NormalizedTransaction): ScoreSignal[] {
    const signals: ScoreSignal[] = [];
    for (const rule of this.rules) {
      const signal = rule.evaluate(transaction, this.config);
      if (signal) {
        signals.push(signal);
      }
    }
    return signals;
  }

  describeConfig(): ScoringConfigSnapshot {
    return describeScoringConfig(
      this.config,
      this.rules.map((rule) => rule.name),
      Object.keys(this.hardBlocks),
    );
  }
}
