import type { Decision } from "./types.js";

const DECISION_SEVERITY: Record<Decision, number> = {
  ACCEPTED: 0,
  IN_REVIEW: 1,
  REJECTED: 2,
};

export function isDecision(value: unknown): value is Decision {
  return typeof value === "string" && Object.hasOwn(DECISION_SEVERITY, value);
}

export function compareDecisions(left: Decision, right: Decision): number {
  return DECISION_SEVERITY[left] - DECISION_SEVERITY[right];
}

export function isMoreSevere(candidate: Decision, baseline: Decision): boolean {
  return compareDecisions(candidate, baseline) > 0;
}
