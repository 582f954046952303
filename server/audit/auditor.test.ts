import { describe, expect, it } from "vitest";
import type { AuditState, LoadOptions, PageLoader } from "./types";
import { AuditStateMachine, LOAD_GRACE_MS, SiteAuditor } from "./auditor";
import { IllegalTransitionError, LoadError } from "./errors";
import { absent } from "./signal";
import { FakeJudge, FakeLoader, loadedPage, silentLogger, unreachable, withoutScreenshots } from "./test-support";

const fixedNow = () => new Date("2026-10-18T09:00:00.000Z");

function auditorWith(loader: FakeLoader, judge: FakeJudge | null = new FakeJudge()) {
  return new SiteAuditor({ loader, judge, logger: silentLogger, now: fixedNow, config: { timeoutMs: 1000 } });
}

describe("SiteAuditor", () => {
  it("scores a fully loaded site", async () => {
    const loader = new FakeLoader();
    const result = await auditorWith(loader).audit({ url: "example-cpa.com", company: "Example CPA" });

    expect(loader.calls).toEqual(["https://example-cpa.com/"]);
    expect(result.status).toBe("done");
    expect(result.url).toBe("https://example-cpa.com/");
    expect(result.inputUrl).toBe("example-cpa.com");
    expect(result.company).toBe("Example CPA");
    expect(result.timestamp).toBe("2026-10-18T09:00:00.000Z");
    expect(result.totalScore).toBe(96);
    expect(result.tier).toBe("NO");
    expect(result.error).toBeNull();
    expect(result.degraded).toEqual([]);
  });

  it("walks the happy path through every state", async () => {
    const transitions: string[] = [];
    const auditor = new SiteAuditor({
      loader: new FakeLoader(),
      judge: new FakeJudge(),
      logger: silentLogger,
      onStateChange: (_url, from, to) => transitions.push(`${from}->${to}`),
    });

    await auditor.audit("https://example-cpa.com");

    expect(transitions).toEqual(["PENDING->LOADING", "LOADING->EXTRACTING", "EXTRACTING->SCORING", "SCORING->DONE"]);
  });

  it("marks the result partial when the design judgment is missing", async () => {
    const result = await auditorWith(new FakeLoader(), null).audit("https://example-cpa.com");

    expect(result.status).toBe("partial");
    expect(result.totalScore).toBe(80);
    expect(result.degraded).toEqual([
      {
        category: "visual_design",
        check: "design_quality",
        reason: "Visual design judgment unavailable: no vision judge configured (ANTHROPIC_API_KEY not set)",
      },
    ]);
    expect(result.error).toBe(
      "Partial audit, 1 check(s) could not be evaluated: Visual design judgment unavailable: no vision judge configured (ANTHROPIC_API_KEY not set)"
    );
  });

  it("keeps scoring markup when the renderer captured nothing", async () => {
    const loader = new FakeLoader(() => loadedPage(withoutScreenshots("the fetch renderer does not render pages")));
    const result = await auditorWith(loader).audit("https://example-cpa.com");

    expect(result.status).toBe("partial");
    expect(result.degraded.map((d) => d.check)).toEqual(["design_quality", "mobile_layout"]);
    expect(result.totalScore).toBe(75);
  });

  it("records a judge failure as a degraded check", async () => {
    const judge = new FakeJudge(() => {
      throw new Error("overloaded");
    });
    const result = await auditorWith(new FakeLoader(), judge).audit("https://example-cpa.com");

    expect(result.status).toBe("partial");
    expect(result.degraded[0].reason).toBe("Visual design judgment unavailable: vision judgment failed: overloaded");
  });

  it("fails without scoring when the page cannot be loaded", async () => {
    const transitions: AuditState[] = [];
    const auditor = new SiteAuditor({
      loader: new FakeLoader(() => unreachable()),
      logger: silentLogger,
      now: fixedNow,
      onStateChange: (_url, _from, to) => transitions.push(to),
    });

    const result = await auditor.audit({ url: "https://gone.example-cpa.com", company: "Gone LLP" });

    expect(transitions).toEqual(["LOADING", "FAILED"]);
    expect(result).toMatchObject({
      status: "failed",
      url: "https://gone.example-cpa.com/",
      company: "Gone LLP",
      categories: null,
      totalScore: null,
      tier: null,
      rankedOpportunities: [],
      error: "Could not resolve or connect to the site (ENOTFOUND)",
      failure: { kind: "connection", message: "Could not resolve or connect to the site (ENOTFOUND)" },
    });
  });

  it("distinguishes a blocked site", async () => {
    const loader = new FakeLoader(() => {
      throw new LoadError("blocked", "Access to the site was blocked (HTTP 403)", 403);
    });
    const result = await auditorWith(loader).audit("https://example-cpa.com");

    expect(result.status === "failed" && result.failure.kind).toBe("blocked");
  });

  it("rejects an unusable URL before loading", async () => {
    const loader = new FakeLoader();
    const result = await auditorWith(loader).audit("   not a url   ");

    expect(loader.calls).toEqual([]);
    expect(result.status === "failed" && result.failure).toEqual({
      kind: "invalid_url",
      message: '"not a url" is not a valid website URL',
    });
  });

  it("times out a loader that ignores its own deadline and tells it to stop", async () => {
    const received: LoadOptions[] = [];
    const hung: PageLoader = {
      load: (_url, options) => {
        received.push(options);
        return new Promise(() => undefined);
      },
    };
    const auditor = new SiteAuditor({ loader: hung, logger: silentLogger, config: { timeoutMs: 100 } });

    const started = Date.now();
    const result = await auditor.audit("https://example-cpa.com");

    expect(result.status === "failed" && result.failure).toEqual({
      kind: "timeout",
      message: `Page load timed out after ${(100 + LOAD_GRACE_MS) / 1000}s`,
    });
    expect(received).toHaveLength(1);
    expect(received[0].timeoutMs).toBe(100);
    expect(received[0].signal?.aborted).toBe(true);
    expect(Date.now() - started).toBeLessThan(7000);
  });

  it("produces identical results for identical inputs", async () => {
    const auditor = auditorWith(new FakeLoader());
    const { durationMs: _a, ...first } = await auditor.audit("https://example-cpa.com");
    const { durationMs: _b, ...second } = await auditor.audit("https://example-cpa.com");

    expect(second).toEqual(first);
  });

  it("returns a frozen result", async () => {
    const result = await auditorWith(new FakeLoader()).audit("https://example-cpa.com");

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.rankedOpportunities)).toBe(true);
  });

  it("flags a failed mobile render without failing the audit", async () => {
    const loader = new FakeLoader(() =>
      loadedPage({ rendered: absent("mobile rendering failed: Target closed"), html: "" })
    );
    const result = await auditorWith(loader).audit("https://example-cpa.com");

    expect(result.status).toBe("partial");
    expect(result.degraded).toEqual([
      { category: "visual_design", check: "mobile_layout", reason: "Mobile layout could not be evaluated: mobile rendering failed: Target closed" },
    ]);
  });
});

describe("AuditStateMachine", () => {
  it("rejects transitions the lifecycle does not allow", () => {
    const machine = new AuditStateMachine("https://example-cpa.com/");

    expect(() => machine.transition("SCORING")).toThrow(IllegalTransitionError);
    machine.transition("LOADING");
    machine.transition("FAILED");
    expect(() => machine.transition("DONE")).toThrow("Illegal audit state transition FAILED -> DONE");
    expect(machine.state).toBe("FAILED");
  });
});
