import type { Decision, ScoreSignal, ScoreThreshold } from "./types.js";

export interface AggregatedScore {
  /** Sum of every delta, before clamping. */
  rawScore: number;
  /** Reported score; net-negative totals clamp to zero. */
  riskScore: number;
  decision: Decision;
}

export function sumSignals(signals: readonly ScoreSignal[]): number {
  return signals.reduce((total, signal) => total + signal.delta, 0);
}

export function decisionForScore(score: number, scoreToDecision: readonly ScoreThreshold[]): Decision {
  for (const { threshold, decision } of scoreToDecision) {
    if (score >= threshold) {
      return decision;
    }
  }
  return "ACCEPTED";
}

export function aggregateSignals(
  signals: readonly ScoreSignal[],
  hardBlocked: boolean,
  scoreToDecision: readonly ScoreThreshold[],
): AggregatedScore {
  const rawScore = sumSignals(signals);
  const riskScore = Math.max(0, rawScore);
  return {
    rawScore,
    riskScore,
    decision: hardBlocked ? "REJECTED" : decisionForScore(riskScore, scoreToDecision),
  };
}
