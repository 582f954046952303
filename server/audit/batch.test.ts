import { describe, expect, it } from "vitest";
import type { AuditResult, AuditTarget } from "./types";
import { SiteAuditor } from "./auditor";
import { BatchAuditor, type BatchProgress, type SiteAuditRunner } from "./batch";
import { FakeJudge, FakeLoader, loadedPage, silentLogger, unreachable } from "./test-support";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function siteAuditor(loader: FakeLoader): SiteAuditor {
  return new SiteAuditor({ loader, judge: new FakeJudge(), logger: silentLogger });
}

describe("BatchAuditor", () => {
  it("isolates a failing site and keeps input order", async () => {
    const loader = new FakeLoader((url) => (url.includes("two") ? unreachable() : loadedPage({ url, finalUrl: url })));
    const batch = new BatchAuditor({ auditor: siteAuditor(loader), concurrency: 3, logger: silentLogger });

    const result = await batch.run(["one.example-cpa.com", "two.example-cpa.com", "three.example-cpa.com"]);

    expect(result.items.map((item) => [item.url, item.status])).toEqual([
      ["https://one.example-cpa.com/", "done"],
      ["https://two.example-cpa.com/", "failed"],
      ["https://three.example-cpa.com/", "done"],
    ]);
    expect(result.items[0].totalScore).toBe(96);
    expect(result.items[2].totalScore).toBe(96);
    expect(result.countsByTier).toEqual({ "STRONG YES": 0, YES: 0, MAYBE: 0, NO: 2, FAILED: 1 });
    expect(result.cancelled).toBe(false);
  });

  it("turns an auditor crash into a failed item", async () => {
    const crashing: SiteAuditRunner = {
      audit: async (target: AuditTarget): Promise<AuditResult> => {
        throw new TypeError(`cannot read ${target.url}`);
      },
    };
    const batch = new BatchAuditor({ auditor: crashing, logger: silentLogger });

    const result = await batch.run([{ url: "example-cpa.com", company: "Example CPA" }]);

    expect(result.items[0]).toMatchObject({
      status: "failed",
      url: "https://example-cpa.com/",
      company: "Example CPA",
      failure: { kind: "internal", message: "Audit crashed unexpectedly: cannot read example-cpa.com" },
    });
  });

  it("never runs more audits at once than the limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const slowLoader = new FakeLoader(async (url) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(100);
      inFlight -= 1;
      return loadedPage({ url, finalUrl: url });
    });
    const batch = new BatchAuditor({ auditor: siteAuditor(slowLoader), concurrency: 2, logger: silentLogger });

    const started = Date.now();
    const result = await batch.run(["a.example.com", "b.example.com", "c.example.com", "d.example.com", "e.example.com"]);
    const elapsed = Date.now() - started;

    expect(result.items).toHaveLength(5);
    expect(peak).toBe(2);
    expect(elapsed).toBeGreaterThanOrEqual(290);
    expect(elapsed).toBeLessThan(480);
  });

  it("reports progress with running tier counts after each site", async () => {
    const loader = new FakeLoader((url) => (url.includes("bad") ? unreachable() : loadedPage({ url, finalUrl: url })));
    const batch = new BatchAuditor({ auditor: siteAuditor(loader), concurrency: 1, logger: silentLogger });
    const progress: BatchProgress[] = [];

    await batch.run(["good.example.com", "bad.example.com"], { onProgress: (update) => progress.push(update) });

    expect(progress.map((p) => [p.completed, p.total, p.countsByTier.NO, p.countsByTier.FAILED])).toEqual([
      [1, 2, 1, 0],
      [2, 2, 1, 1],
    ]);
    expect(progress[1].latest.status).toBe("failed");
  });

  it("hands each listener a snapshot rather than the live tallies", async () => {
    const batch = new BatchAuditor({ auditor: siteAuditor(new FakeLoader()), concurrency: 1, logger: silentLogger });
    const snapshots: number[] = [];
    const seen: BatchProgress[] = [];

    await batch.run(["a.example.com", "b.example.com"], {
      onProgress: (update) => {
        seen.push(update);
        snapshots.push(update.countsByTier.NO);
      },
    });

    expect(snapshots).toEqual([1, 2]);
    expect(seen[0].countsByTier.NO).toBe(1);
  });

  it("stops starting new audits once cancelled", async () => {
    const controller = new AbortController();
    const loader = new FakeLoader(async (url) => {
      // Interrupted while the first site is still loading.
      controller.abort();
      await sleep(20);
      return loadedPage({ url, finalUrl: url });
    });
    const batch = new BatchAuditor({ auditor: siteAuditor(loader), concurrency: 1, logger: silentLogger });

    const result = await batch.run(["a.example.com", "b.example.com", "c.example.com"], {
      signal: controller.signal,
    });

    expect(loader.calls).toEqual(["https://a.example.com/"]);
    expect(result.cancelled).toBe(true);
    expect(result.items.map((item) => (item.status === "failed" ? item.failure.kind : item.status))).toEqual([
      "done",
      "cancelled",
      "cancelled",
    ]);
    expect(result.countsByTier.FAILED).toBe(2);
  });

  it("returns a frozen batch, cancelled items included", async () => {
    const controller = new AbortController();
    controller.abort();
    const batch = new BatchAuditor({ auditor: siteAuditor(new FakeLoader()), logger: silentLogger });

    const result = await batch.run(["a.example.com"], { signal: controller.signal });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.items)).toBe(true);
    expect(Object.isFrozen(result.countsByTier)).toBe(true);
    const [item] = result.items;
    if (item.status !== "failed") throw new Error(`expected a cancelled item, got ${item.status}`);
    expect(Object.isFrozen(item)).toBe(true);
    expect(Object.isFrozen(item.failure)).toBe(true);
  });

  it("skips targets the caller has already audited", async () => {
    const loader = new FakeLoader((url) => loadedPage({ url, finalUrl: url }));
    const batch = new BatchAuditor({ auditor: siteAuditor(loader), logger: silentLogger });

    const result = await batch.run(["a.example.com", "b.example.com"], {
      skip: (target) => target.url.startsWith("a."),
    });

    expect(result.skipped).toBe(1);
    expect(result.items.map((item) => item.url)).toEqual(["https://b.example.com/"]);
    expect(loader.calls).toEqual(["https://b.example.com/"]);
  });

  it("survives a throwing progress listener", async () => {
    const batch = new BatchAuditor({ auditor: siteAuditor(new FakeLoader()), logger: silentLogger });

    const result = await batch.run(["a.example.com"], {
      onProgress: () => {
        throw new Error("listener bug");
      },
    });

    expect(result.items).toHaveLength(1);
  });
});
