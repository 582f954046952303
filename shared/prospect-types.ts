import type { AuditStatus, CategoryKey, Grade, Tier, TierCounts } from "./audit-types";

export interface ProspectEntry {
  id: string;
  url: string;
  domain: string;
  company: string | null;
  status: AuditStatus;
  tier: Tier | "FAILED";
  /** null when the audit failed. */
  score: number | null;
  grade: Grade | null;
  categoryScores: Partial<Record<CategoryKey, number>>;
  topOpportunities: string[];
  error: string | null;
  auditedAt: string;
}

export interface ProspectSummary {
  totalProspects: number;
  avgScore: number;
  countsByTier: TierCounts;
  recent: ProspectEntry[];
}
