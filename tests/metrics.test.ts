import { describe, expect, it } from "vitest";
import { RiskMetricsRegistry } from "../src/infra/metrics.js";

describe("Risk metrics registry", () => {
  it("counts decisions and rule triggers per label", () => {
    const metrics = new RiskMetricsRegistry();
    const nightSignal = { rule: "night_hour", reason: "night_hour:23(+1)", delta: 1 };
    metrics.recordEvaluation({ decision: "ACCEPTED", risk_score: 1, hard_blocks: [] }, [nightSignal]);
    metrics.recordEvaluation({ decision: "ACCEPTED", risk_score: 1, hard_blocks: [] }, [nightSignal]);
    metrics.recordEvaluation({ decision: "REJECTED", risk_score: 3, hard_blocks: ["chargeback_high_ip_risk"] }, []);

    const lines = metrics.renderPrometheus().split("\n");
    expect(lines).toContain("# TYPE risk_decisions_total counter");
    expect(lines).toContain('risk_decisions_total{decision="ACCEPTED"} 2');
    expect(lines).toContain('risk_decisions_total{decision="REJECTED"} 1');
    expect(lines).toContain('risk_rule_triggers_total{rule="night_hour"} 2');
    expect(lines).toContain('risk_hard_blocks_total{predicate="chargeback_high_ip_risk"} 1');
  });

  it("renders cumulative score buckets without labels", () => {
    const metrics = new RiskMetricsRegistry();
    metrics.recordEvaluation({ decision: "IN_REVIEW", risk_score: 5, hard_blocks: [] }, []);

    const lines = metrics.renderPrometheus().split("\n");
    expect(lines).toContain('risk_score_bucket{le="4"} 0');
    expect(lines).toContain('risk_score_bucket{le="6"} 1');
    expect(lines).toContain('risk_score_bucket{le="20"} 1');
    expect(lines).toContain('risk_score_bucket{le="+Inf"} 1');
    expect(lines).toContain("risk_score_sum 5");
    expect(lines).toContain("risk_score_count 1");
  });

  it("keeps label order and appends the bucket bound last", () => {
    const metrics = new RiskMetricsRegistry();
    metrics.recordHttpRequest("post", "/transaction", 200, 0.003);

    const lines = metrics.renderPrometheus().split("\n");
    expect(lines).toContain('risk_http_requests_total{method="POST",route="/transaction",status_code="200"} 1');
    expect(lines).toContain('risk_http_request_duration_seconds_bucket{method="POST",route="/transaction",le="0.001"} 0');
    expect(lines).toContain('risk_http_request_duration_seconds_bucket{method="POST",route="/transaction",le="0.005"} 1');
    expect(lines).toContain('risk_http_request_duration_seconds_sum{method="POST",route="/transaction"} 0.003');
  });

  it("escapes quotes in label values", () => {
    const metrics = new RiskMetricsRegistry();
    metrics.recordInvalidInput('bad"code');

    expect(metrics.renderPrometheus().split("\n")).toContain('risk_invalid_inputs_total{code="bad\\"code"} 1');
  });

  it("ends the exposition with a newline", () => {
    expect(new RiskMetricsRegistry().renderPrometheus().endsWith("\n")).toBe(true);
  });
});
