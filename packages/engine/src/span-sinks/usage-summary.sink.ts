import { Injectable } from "@nestjs/common";
import type { SpanRecord, SpanSink } from "@agentmd/types";

export interface AgentUsageSummary {
  agent: string;
  executions: number;
  failures: number;
  inputTokens: number;
  outputTokens: number;
  totalCostUsd: number;
  averageCostUsd: number;
  lastModel: string | null;
}

type UsageTotals = Omit<AgentUsageSummary, "averageCostUsd">;

/** Running per-agent totals built from recorded spans. */
@Injectable()
export class UsageSummarySink implements SpanSink {
  private readonly totals = new Map<string, UsageTotals>();

  record(span: SpanRecord): void {
    const current = this.totals.get(span.agent) ?? {
      agent: span.agent,
      executions: 0,
      failures: 0,
      inputTokens: 0,
      outputTokens: 0,
      totalCostUsd: 0,
      lastModel: null,
    };

    this.totals.set(span.agent, {
      agent: span.agent,
      executions: current.executions + 1,
      failures: current.failures + (span.status === "failure" ? 1 : 0),
      inputTokens: current.inputTokens + span.inputTokens,
      outputTokens: current.outputTokens + span.outputTokens,
      totalCostUsd: current.totalCostUsd + span.costUsd,
      lastModel: span.model ?? current.lastModel,
    });
  }

  summary(agent: string): AgentUsageSummary | undefined {
    const totals = this.totals.get(agent);
    return totals ? this.withAverage(totals) : undefined;
  }

  list(): AgentUsageSummary[] {
    return Array.from(this.totals.values(), (totals) => this.withAverage(totals));
  }

  reset(): void {
    this.totals.clear();
  }

  private withAverage(totals: UsageTotals): AgentUsageSummary {
    return {
      ...totals,
      averageCostUsd:
        totals.executions > 0 ? totals.totalCostUsd / totals.executions : 0,
    };
  }
}
