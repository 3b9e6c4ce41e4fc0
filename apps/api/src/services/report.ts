import type { CostRecord, Insight, Priority } from "@costlens/types";
import { PRIORITIES } from "@costlens/types";
import { rankServicesBySpend } from "./analytics";
import { totalSavings } from "./insightGenerator";
import { formatMoney } from "./money";

export type ReportInput = {
  tenantId: string;
  generation: number;
  lastSyncAt: string | null;
  currency: string;
  records: readonly CostRecord[];
  insights: readonly Insight[];
};

const TOP_DRIVERS = 10;

/**
 * Markdown rollup of the current insights. Built only from the snapshot,
 * so the same snapshot always renders the same text.
 */
export function renderReport(input: ReportInput): string {
  const { currency, insights } = input;
  const lines: string[] = [
    "# Cost optimization report",
    "",
    `Tenant: ${input.tenantId}`,
    `Data as of: ${input.lastSyncAt ?? "never synced"}`,
    `Generation: ${input.generation}`,
    "",
    "## Summary",
    "",
    `- Cost records: ${input.records.length}`,
    `- Insights: ${insights.length}`,
    `- Total potential savings: ${formatMoney(totalSavings(insights), currency)}`,
  ];

  for (const priority of PRIORITIES) {
    lines.push("", `## ${priority} priority`, "");
    const section = insights.filter((i) => i.priority === priority);
    if (section.length === 0) {
      lines.push("None.");
      continue;
    }
    section.forEach((insight, n) => {
      if (n > 0) lines.push("");
      lines.push(...renderInsight(insight, priority));
    });
  }

  lines.push("", "## Top cost drivers", "");
  const drivers = rankServicesBySpend(input.records, TOP_DRIVERS);
  if (drivers.length === 0) {
    lines.push("No cost records.");
  } else {
    lines.push("| Service | Spend | Share |", "| --- | ---: | ---: |");
    for (const d of drivers) lines.push(`| ${d.service} | ${formatMoney(d.totalMicros, currency)} | ${d.sharePct}% |`);
  }

  return `${lines.join("\n")}\n`;
}

function renderInsight(insight: Insight, priority: Priority): string[] {
  return [
    `### ${insight.title}`,
    "",
    `- Category: ${insight.category}`,
    `- Service: ${insight.service}`,
    `- Priority: ${priority}`,
    `- Potential savings: ${formatMoney(insight.potentialSavingsMicros, insight.currency)}`,
    "",
    insight.description,
    "",
    `Recommendation: ${insight.recommendation}`,
  ];
}
