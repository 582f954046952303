import { z } from "zod";
import { CATEGORY_KEYS, TIERS } from "./audit-types";
import type { AuditResult, BatchResult } from "./audit-types";

const categoryKey = z.enum(CATEGORY_KEYS);

export const FindingSchema = z.object({
  check: z.string(),
  status: z.enum(["pass", "partial", "fail", "unavailable"]),
  severity: z.enum(["pass", "low", "med", "high"]),
  message: z.string(),
  points: z.number(),
  maxPoints: z.number(),
});

export const OpportunitySchema = z.object({
  category: categoryKey,
  check: z.string(),
  priority: z.enum(["high", "medium", "low"]),
  message: z.string(),
  points: z.number(),
});

export const CategoryResultSchema = z.object({
  key: categoryKey,
  name: z.string(),
  score: z.number().min(0),
  max: z.number(),
  findings: z.array(FindingSchema),
  opportunities: z.array(OpportunitySchema),
});

const resultBase = {
  url: z.string(),
  inputUrl: z.string(),
  company: z.string().nullable(),
  timestamp: z.string(),
  durationMs: z.number(),
};

export const ScoredAuditResultSchema = z.object({
  ...resultBase,
  status: z.enum(["done", "partial"]),
  title: z.string().nullable(),
  categories: z.object({
    visual_design: CategoryResultSchema,
    conversion: CategoryResultSchema,
    trust: CategoryResultSchema,
    seo: CategoryResultSchema,
    technical: CategoryResultSchema,
  }),
  totalScore: z.number().min(0).max(100),
  tier: z.enum(TIERS),
  grade: z.enum(["A", "B", "C", "D"]),
  gradeSummary: z.string(),
  rankedOpportunities: z.array(OpportunitySchema),
  degraded: z.array(z.object({ category: categoryKey, check: z.string(), reason: z.string() })),
  error: z.string().nullable(),
});

export const FailedAuditResultSchema = z.object({
  ...resultBase,
  status: z.literal("failed"),
  categories: z.null(),
  totalScore: z.null(),
  tier: z.null(),
  grade: z.null(),
  rankedOpportunities: z.tuple([]),
  degraded: z.tuple([]),
  error: z.string(),
  failure: z.object({
    kind: z.enum(["timeout", "blocked", "connection", "invalid_url", "http_error", "cancelled", "internal"]),
    message: z.string(),
  }),
});

export const AuditResultSchema: z.ZodType<AuditResult> = z.discriminatedUnion("status", [
  ScoredAuditResultSchema.extend({ status: z.literal("done") }),
  ScoredAuditResultSchema.extend({ status: z.literal("partial") }),
  FailedAuditResultSchema,
]);

const tierCount = z.number().int().min(0);

export const BatchResultSchema: z.ZodType<BatchResult> = z.object({
  items: z.array(AuditResultSchema),
  startedAt: z.string(),
  finishedAt: z.string(),
  countsByTier: z.object({
    "STRONG YES": tierCount,
    YES: tierCount,
    MAYBE: tierCount,
    NO: tierCount,
    FAILED: tierCount,
  }),
  cancelled: z.boolean(),
  skipped: z.number().int().min(0),
});
