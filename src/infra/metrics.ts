import type { Decision, ScoreSignal } from "../domain/types.js";

type Labels = Readonly<Record<string, string>>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function renderLabels(labelNames: readonly string[], labels: Labels, extra?: readonly [string, string]): string {
  const pairs: string[] = labelNames.map((name) => `${name}="${escapeLabelValue(labels[name] ?? "")}"`);
  if (extra) {
    pairs.push(`${extra[0]}="${extra[1]}"`);
  }
  return pairs.length === 0 ? "" : `{${pairs.join(",")}}`;
}

/** One series per distinct label combination, keyed by its rendered label text. */
class LabelledSeries<TValue> {
  private readonly series = new Map<string, TValue>();

  constructor(
    private readonly labelNames: readonly string[],
    private readonly initial: () => TValue,
  ) {}

  get(labels: Labels): TValue {
    const key = renderLabels(this.labelNames, labels);
    let value = this.series.get(key);
    if (value === undefined) {
      value = this.initial();
      this.series.set(key, value);
    }
    return value;
  }

  entries(): IterableIterator<[string, TValue]> {
    return this.series.entries();
  }
}

class Counter {
  private readonly series: LabelledSeries<{ value: number }>;

  constructor(
    private readonly name: string,
    private readonly help: string,
    labelNames: readonly string[],
  ) {
    this.series = new LabelledSeries(labelNames, () => ({ value: 0 }));
  }

  inc(labels: Labels, amount = 1): void {
    this.series.get(labels).value += amount;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const [labelText, { value }] of this.series.entries()) {
      lines.push(`${this.name}${labelText} ${value}`);
    }
    return lines;
  }
}

interface HistogramState {
  labels: Labels;
  count: number;
  sum: number;
  bucketCounts: number[];
}

class Histogram {
  private readonly series: LabelledSeries<HistogramState>;

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: readonly string[],
    private readonly bounds: readonly number[],
  ) {
    this.series = new LabelledSeries(labelNames, () => ({
      labels: {},
      count: 0,
      sum: 0,
      bucketCounts: bounds.map(() => 0),
    }));
  }

  observe(labels: Labels, value: number): void {
    const state = this.series.get(labels);
    state.labels = labels;
    state.count += 1;
    state.sum += value;
    this.bounds.forEach((bound, index) => {
      if (value <= bound) {
        state.bucketCounts[index] = (state.bucketCounts[index] ?? 0) + 1;
      }
    });
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const [labelText, state] of this.series.entries()) {
      this.bounds.forEach((bound, index) => {
        const bucketLabels = renderLabels(this.labelNames, state.labels, ["le", String(bound)]);
        lines.push(`${this.name}_bucket${bucketLabels} ${state.bucketCounts[index] ?? 0}`);
      });
      lines.push(`${this.name}_bucket${renderLabels(this.labelNames, state.labels, ["le", "+Inf"])} ${state.count}`);
      lines.push(`${this.name}_sum${labelText} ${state.sum}`);
      lines.push(`${this.name}_count${labelText} ${state.count}`);
    }
    return lines;
  }
}

export class RiskMetricsRegistry {
  private readonly httpRequests = new Counter(
    "risk_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new Histogram(
    "risk_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  );
  private readonly decisions = new Counter(
    "risk_decisions_total",
    "Total number of scored transactions by decision.",
    ["decision"],
  );
  private readonly ruleTriggers = new Counter(
    "risk_rule_triggers_total",
    "Total number of rule signals emitted by rule.",
    ["rule"],
  );
  private readonly hardBlocks = new Counter(
    "risk_hard_blocks_total",
    "Total number of hard-block matches by predicate.",
    ["predicate"],
  );
  private readonly scores = new Histogram(
    "risk_score",
    "Distribution of reported risk scores.",
    [],
    [0, 1, 2, 4, 6, 8, 10, 15, 20],
  );
  private readonly invalidInputs = new Counter(
    "risk_invalid_inputs_total",
    "Total number of scoring requests rejected as invalid input by error code.",
    ["code"],
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    this.httpRequests.inc({
      method: method.toUpperCase(),
      route,
      status_code: String(statusCode),
    });
    this.httpDuration.observe(
      {
        method: method.toUpperCase(),
        route,
      },
      durationSeconds,
    );
  }

  recordEvaluation(
    evaluation: { decision: Decision; risk_score: number; hard_blocks: readonly string[] },
    signals: readonly ScoreSignal[],
  ): void {
    this.decisions.inc({ decision: evaluation.decision });
    this.scores.observe({}, evaluation.risk_score);
    for (const signal of signals) {
      this.ruleTriggers.inc({ rule: signal.rule });
    }
    for (const predicate of evaluation.hard_blocks) {
      this.hardBlocks.inc({ predicate });
    }
  }

  recordInvalidInput(code: string): void {
    this.invalidInputs.inc({ code });
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.decisions.render(),
      ...this.ruleTriggers.render(),
      ...this.hardBlocks.render(),
      ...this.scores.render(),
      ...this.invalidInputs.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
