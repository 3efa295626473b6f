import { describe, expect, it } from "vitest";
import { createScoringConfig, describeScoringConfig } from "../src/domain/scoring-config.js";
import type { ScoreThreshold } from "../src/domain/types.js";
import { ConfigurationError } from "../src/infra/app-error.js";

describe("Scoring config", () => {
  it("builds the default thresholds", () => {
    const config = createScoringConfig();
    expect(config.scoreToDecision).toEqual([
      { threshold: 10, decision: "REJECTED" },
      { threshold: 4, decision: "IN_REVIEW" },
    ]);
    expect(config.amountThresholds).toEqual({ digital: 2500, physical: 6000, subscription: 1500, _default: 4000 });
    expect(config.latencyExtremeMs).toBe(2500);
    expect(config.nightWindow).toEqual({ startHour: 22, endHour: 6 });
    expect(config.frequencyBuffer).toEqual({ reputation: "recurrent", minTransactions30d: 3 });
    expect(config.hardBlock).toEqual({ minChargebacks: 2, ipRiskLevels: ["high"] });
  });

  it("is deeply frozen", () => {
    const config = createScoringConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.scoreToDecision)).toBe(true);
    expect(Object.isFrozen(config.weights.ipRisk)).toBe(true);
    expect(Object.isFrozen(config.amountThresholds)).toBe(true);
  });

  it("merges overrides over the defaults", () => {
    const config = createScoringConfig({
      rejectAt: 12,
      reviewAt: 5,
      amountThresholds: { digital: 3000, luxury: 9000 },
      weights: { geoMismatch: 4, deviceFingerprintRisk: { high: 5 } },
    });
    expect(config.scoreToDecision).toEqual([
      { threshold: 12, decision: "REJECTED" },
      { threshold: 5, decision: "IN_REVIEW" },
    ]);
    expect(config.amountThresholds.digital).toBe(3000);
    expect(config.amountThresholds.luxury).toBe(9000);
    expect(config.amountThresholds.physical).toBe(6000);
    expect(config.weights.geoMismatch).toBe(4);
    expect(config.weights.deviceFingerprintRisk).toEqual({ low: 0, medium: 1, high: 5 });
  });

  it("sorts an explicit threshold table from the highest threshold down", () => {
    const config = createScoringConfig({
      scoreToDecision: [
        { threshold: 4, decision: "IN_REVIEW" },
        { threshold: 9, decision: "REJECTED" },
      ],
    });
    expect(config.scoreToDecision.map((entry) => entry.threshold)).toEqual([9, 4]);
  });

  it("rejects malformed threshold tables", () => {
    expect(() => createScoringConfig({ reviewAt: 10, rejectAt: 10 })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ reviewAt: 0 })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ scoreToDecision: [] })).toThrowError(ConfigurationError);
    expect(() =>
      createScoringConfig({
        scoreToDecision: [
          { threshold: 8, decision: "IN_REVIEW" },
          { threshold: 4, decision: "REJECTED" },
        ],
      }),
    ).toThrowError(ConfigurationError);
    expect(() =>
      createScoringConfig({
        scoreToDecision: [
          { threshold: 4, decision: "IN_REVIEW" },
          { threshold: 4, decision: "REJECTED" },
        ],
      }),
    ).toThrowError(ConfigurationError);
  });

  it("rejects unknown decision tiers", () => {
    const table: unknown = JSON.parse('[{"threshold":5,"decision":"BLOCKED"},{"threshold":2,"decision":"IN_REVIEW"}]');
    if (!Array.isArray(table)) {
      throw new Error("fixture must be an array");
    }
    expect(() => createScoringConfig({ scoreToDecision: table })).toThrowError(
      "'score_to_decision' maps 5 to unknown decision 'BLOCKED'.",
    );
  });

  it("copies an explicit threshold table instead of freezing the caller's entries", () => {
    const table: ScoreThreshold[] = [
      { threshold: 3, decision: "IN_REVIEW" },
      { threshold: 9, decision: "REJECTED" },
    ];
    const config = createScoringConfig({ scoreToDecision: table });

    expect(Object.isFrozen(config.scoreToDecision[0])).toBe(true);
    expect(Object.isFrozen(table)).toBe(false);
    expect(Object.isFrozen(table[0])).toBe(false);
    expect(table[0]).toEqual({ threshold: 3, decision: "IN_REVIEW" });
  });

  it("rejects out-of-range weights and windows", () => {
    expect(() => createScoringConfig({ weights: { frequencyBuffer: 1 } })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ weights: { ipRisk: { high: -1 } } })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ weights: { nightHour: 1.5 } })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ amountThresholds: { digital: -10 } })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ nightWindow: { startHour: 5, endHour: 5 } })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ nightWindow: { startHour: 24, endHour: 5 } })).toThrowError(
      ConfigurationError,
    );
    expect(() => createScoringConfig({ latencyExtremeMs: 0 })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ hardBlock: { ipRiskLevels: [] } })).toThrowError(ConfigurationError);
    expect(() => createScoringConfig({ frequencyBuffer: { reputation: " " } })).toThrowError(ConfigurationError);
  });

  it("describes itself in a serializable form", () => {
    const snapshot = describeScoringConfig(createScoringConfig(), ["night_hour"], ["chargeback_high_ip_risk"]);
    expect(JSON.parse(JSON.stringify(snapshot))).toEqual({
      score_to_decision: [
        { threshold: 10, decision: "REJECTED" },
        { threshold: 4, decision: "IN_REVIEW" },
      ],
      amount_thresholds: { digital: 2500, physical: 6000, subscription: 1500, _default: 4000 },
      weights: {
        high_amount: 2,
        new_user_high_amount: 2,
        night_hour: 1,
        geo_mismatch: 2,
        latency_extreme: 2,
        frequency_buffer: -1,
        ip_risk: { low: 0, medium: 2, high: 3 },
        device_fingerprint_risk: { low: 0, medium: 1, high: 3 },
        email_risk: { low: 0, new_domain: 1, medium: 1, high: 3 },
      },
      night_window: { start_hour: 22, end_hour: 6 },
      latency_extreme_ms: 2500,
      frequency_buffer: { reputation: "recurrent", min_transactions_30d: 3 },
      hard_block: { min_chargebacks: 2, ip_risk_levels: ["high"] },
      hard_block_predicates: ["chargeback_high_ip_risk"],
      rules: ["night_hour"],
    });
  });
});
