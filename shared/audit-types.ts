export const CATEGORY_KEYS = ["visual_design", "conversion", "trust", "seo", "technical"] as const;

export type CategoryKey = (typeof CATEGORY_KEYS)[number];

export const TIERS = ["STRONG YES", "YES", "MAYBE", "NO"] as const;

export type Tier = (typeof TIERS)[number];

export type Grade = "A" | "B" | "C" | "D";

export type FindingSeverity = "pass" | "low" | "med" | "high";

export type FindingStatus = "pass" | "partial" | "fail" | "unavailable";

export type OpportunityPriority = "high" | "medium" | "low";

export interface Finding {
  check: string;
  status: FindingStatus;
  severity: FindingSeverity;
  message: string;
  points: number;
  maxPoints: number;
}

export interface Opportunity {
  category: CategoryKey;
  check: string;
  priority: OpportunityPriority;
  message: string;
  /** Budget of the sub-check this suggestion would recover. */
  points: number;
}

export interface CategoryResult {
  key: CategoryKey;
  name: string;
  score: number;
  max: number;
  findings: Finding[];
  opportunities: Opportunity[];
}

export interface DegradedCheck {
  category: CategoryKey;
  check: string;
  reason: string;
}

export type AuditStatus = "done" | "partial" | "failed";

export type LoadFailureKind = "timeout" | "blocked" | "connection" | "invalid_url" | "http_error";

export type AuditFailureKind = LoadFailureKind | "cancelled" | "internal";

interface AuditResultBase {
  /** Normalized URL that was loaded. */
  url: string;
  inputUrl: string;
  company: string | null;
  timestamp: string;
  durationMs: number;
}

export interface ScoredAuditResult extends AuditResultBase {
  status: "done" | "partial";
  title: string | null;
  categories: Record<CategoryKey, CategoryResult>;
  totalScore: number;
  tier: Tier;
  grade: Grade;
  gradeSummary: string;
  rankedOpportunities: Opportunity[];
  degraded: DegradedCheck[];
  error: string | null;
}

export interface FailedAuditResult extends AuditResultBase {
  status: "failed";
  categories: null;
  totalScore: null;
  tier: null;
  grade: null;
  rankedOpportunities: [];
  degraded: [];
  error: string;
  failure: { kind: AuditFailureKind; message: string };
}

export type AuditResult = ScoredAuditResult | FailedAuditResult;

export type TierCounts = Record<Tier | "FAILED", number>;

export interface BatchResult {
  items: AuditResult[];
  startedAt: string;
  finishedAt: string;
  countsByTier: TierCounts;
  cancelled: boolean;
  skipped: number;
}

export interface AuditRequest {
  url: string;
  company?: string;
  timeoutMs?: number;
  judgeTimeoutMs?: number;
}

export function emptyTierCounts(): TierCounts {
  return { "STRONG YES": 0, YES: 0, MAYBE: 0, NO: 0, FAILED: 0 };
}
