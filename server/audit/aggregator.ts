import { CATEGORY_KEYS } from "@shared/audit-types";
import type { CategoryKey, CategoryResult, Grade, Opportunity, Tier } from "./types";
import { AggregationInvariantError } from "./errors";
import { roundPoints } from "./scorer";

/** Lower bounds, checked highest first. Each band is closed low, open high. */
const TIER_THRESHOLDS: Array<[number, Tier]> = [
  [85, "NO"],
  [75, "MAYBE"],
  [60, "YES"],
  [0, "STRONG YES"],
];

const GRADE_THRESHOLDS: Array<[number, Grade]> = [
  [85, "A"],
  [75, "B"],
  [60, "C"],
  [0, "D"],
];

export const GRADE_SUMMARIES: Record<Grade, string> = {
  A: "Your website is performing well across most areas. Minor optimizations could further enhance your online presence.",
  B: "Your website has a solid foundation with some areas that could be improved to better convert visitors into clients.",
  C: "Your website has several opportunities for improvement that could significantly increase leads and client inquiries.",
  D: "Your website has significant room for improvement. Addressing these issues could substantially grow your online presence and client base.",
};

export interface Aggregate {
  totalScore: number;
  tier: Tier;
  grade: Grade;
  gradeSummary: string;
  rankedOpportunities: Opportunity[];
}

function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

export function tierForScore(score: number): Tier {
  const bounded = clampScore(score);
  for (const [floor, tier] of TIER_THRESHOLDS) {
    if (bounded >= floor) return tier;
  }
  return "STRONG YES";
}

export function gradeForScore(score: number): Grade {
  const bounded = clampScore(score);
  for (const [floor, grade] of GRADE_THRESHOLDS) {
    if (bounded >= floor) return grade;
  }
  return "D";
}

/**
 * Orders opportunities by the budget of the sub-check they recover, then by
 * category priority, then by emission order.
 */
export function rankOpportunities(categories: Record<CategoryKey, CategoryResult>): Opportunity[] {
  const indexed = CATEGORY_KEYS.flatMap((key, categoryIndex) =>
    categories[key].opportunities.map((opportunity, emissionIndex) => ({ opportunity, categoryIndex, emissionIndex }))
  );

  indexed.sort(
    (a, b) =>
      b.opportunity.points - a.opportunity.points ||
      a.categoryIndex - b.categoryIndex ||
      a.emissionIndex - b.emissionIndex
  );

  return indexed.map((item) => item.opportunity);
}

function indexCategories(results: CategoryResult[]): Record<CategoryKey, CategoryResult> {
  const byKey = new Map<CategoryKey, CategoryResult>();
  for (const result of results) {
    byKey.set(result.key, result);
  }

  const missing = CATEGORY_KEYS.filter((key) => !byKey.has(key));
  if (missing.length > 0) {
    throw new AggregationInvariantError(missing);
  }

  const pick = (key: CategoryKey): CategoryResult => {
    const result = byKey.get(key);
    if (!result) throw new AggregationInvariantError([key]);
    return result;
  };

  return {
    visual_design: pick("visual_design"),
    conversion: pick("conversion"),
    trust: pick("trust"),
    seo: pick("seo"),
    technical: pick("technical"),
  };
}

export function aggregate(results: CategoryResult[] | Record<CategoryKey, CategoryResult>): Aggregate {
  const categories = indexCategories(Array.isArray(results) ? results : Object.values(results));

  const totalScore = clampScore(
    roundPoints(CATEGORY_KEYS.reduce((sum, key) => sum + categories[key].score, 0))
  );
  const grade = gradeForScore(totalScore);

  return {
    totalScore,
    tier: tierForScore(totalScore),
    grade,
    gradeSummary: GRADE_SUMMARIES[grade],
    rankedOpportunities: rankOpportunities(categories),
  };
}
