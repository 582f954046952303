import { describe, expect, it } from "vitest";
import { aggregate, gradeForScore, rankOpportunities, tierForScore } from "./aggregator";
import { AggregationInvariantError } from "./errors";
import { scoreAll } from "./scorer";
import { present } from "./signal";
import { passingSignals } from "./test-support";

describe("tierForScore", () => {
  it.each([
    [0, "STRONG YES"],
    [59.9, "STRONG YES"],
    [60, "YES"],
    [74.9, "YES"],
    [75, "MAYBE"],
    [84.9, "MAYBE"],
    [85, "NO"],
    [100, "NO"],
  ])("maps %s to %s", (score, tier) => {
    expect(tierForScore(score)).toBe(tier);
  });
});

describe("gradeForScore", () => {
  it("uses the same band edges as the tiers", () => {
    expect([85, 84.9, 75, 74.9, 60, 59.9].map(gradeForScore)).toEqual(["A", "B", "B", "C", "C", "D"]);
  });
});

describe("aggregate", () => {
  it("sums the five category scores", () => {
    const categories = scoreAll(passingSignals());
    const result = aggregate(categories);

    expect(result.totalScore).toBe(96);
    expect(result.tier).toBe("NO");
    expect(result.grade).toBe("A");
    expect(result.gradeSummary).toBe(
      "Your website is performing well across most areas. Minor optimizations could further enhance your online presence."
    );
    expect(result.rankedOpportunities).toEqual([]);
  });

  it("accepts the categories as a list in any order", () => {
    const categories = scoreAll(passingSignals());
    const reversed = Object.values(categories).reverse();

    expect(aggregate(reversed)).toEqual(aggregate(categories));
  });

  it("rejects a result set missing a category", () => {
    const { technical: _technical, ...rest } = scoreAll(passingSignals());

    expect(() => aggregate(Object.values(rest))).toThrow(AggregationInvariantError);
    expect(() => aggregate(Object.values(rest))).toThrow("missing: technical");
  });

  it("ranks larger opportunities first, regardless of category order", () => {
    const signals = passingSignals();
    const categories = scoreAll({
      ...signals,
      visual: {
        ...signals.visual,
        mobileLayout: present({ horizontalOverflow: true, viewportWidth: 375, contentWidth: 600 }),
      },
      conversion: { ...signals.conversion, cta: present({ ctaTexts: [] }) },
      seo: { ...signals.seo, metaDescription: present({ content: null }) },
    });

    expect(rankOpportunities(categories).map((o) => [o.check, o.points])).toEqual([
      ["clear_cta", 10],
      ["mobile_layout", 5],
      ["meta_description", 5],
    ]);
    expect(aggregate(categories).totalScore).toBe(76);
  });
});
