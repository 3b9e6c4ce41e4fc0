import type { AnomalyEvent, ForecastResult, IsoDate, Micros, ServiceSpend, TrendSignal } from "./cost";
import type { Insight } from "./insights";

export type SyncResult =
  | {
      status: "success";
      recordsIngested: number;
      recordsRejected: number;
      recordsSuperseded: number;
      insightsGenerated: number;
      insightsRetired: number;
      generation: number;
      period: { start: IsoDate; end: IsoDate };
    }
  | { status: "skipped"; reason: string; recordsIngested: 0 }
  | { status: "error"; message: string; recordsIngested: 0 };

export type EngineSummary = {
  tenantId: string;
  generation: number;
  lastSyncAt: string | null;
  currency: string;
  recordCount: number;
  totalInsights: number;
  totalPotentialSavingsMicros: Micros;
  topInsights: Insight[];
};

export type AnalyticsSnapshot = {
  trends: TrendSignal[];
  anomalies: AnomalyEvent[];
  forecast: ForecastResult;
};

export type QueryState =
  | "received"
  | "retrieving"
  | "contextAssembled"
  | "awaitingGeneration"
  | "completed"
  | "failed";

export type SupportingData = {
  records: string[];
  insights: string[];
  topServices: ServiceSpend[];
};

export type AskResponse = {
  status: "completed" | "degraded";
  conversationId: string;
  responseText: string;
  supportingData: SupportingData;
  trace: QueryState[];
  note?: string;
};
