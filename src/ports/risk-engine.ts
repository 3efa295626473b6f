import type { RiskEvaluation, ScoringConfigSnapshot } from "../domain/types.js";

export interface RiskEnginePort {
  /** Throws `InvalidInputError` for payloads that cannot be scored. */
  evaluate(payload: unknown): RiskEvaluation;
  describeConfig(): ScoringConfigSnapshot;
}
