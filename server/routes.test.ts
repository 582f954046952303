import type { Server } from "http";
import type { AddressInfo } from "net";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AuditResultSchema, BatchResultSchema } from "@shared/audit-schema";
import { SiteAuditor } from "./audit/auditor";
import { BatchAuditor } from "./audit/batch";
import { FakeJudge, FakeLoader, loadedPage, silentLogger } from "./audit/test-support";
import { createApp } from "./app";
import { MemoryProspectStore } from "./prospects";

let server: Server;
let baseUrl: string;
let store: MemoryProspectStore;
let loader: FakeLoader;

beforeEach(async () => {
  loader = new FakeLoader((url) => loadedPage({ url, finalUrl: url }));
  store = new MemoryProspectStore();
  const auditor = new SiteAuditor({ loader, judge: new FakeJudge(), logger: silentLogger });
  const { httpServer } = await createApp({
    auditor,
    createBatch: (concurrency) => new BatchAuditor({ auditor, concurrency, logger: silentLogger }),
    store,
    logger: silentLogger,
  });

  server = httpServer;
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") throw new Error("server did not bind a port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("POST /api/audit", () => {
  it("audits a site and records the prospect", async () => {
    const res = await post("/api/audit", { url: "example-cpa.com", company: "Example CPA" });
    const body = AuditResultSchema.parse(await res.json());

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "done", url: "https://example-cpa.com/", totalScore: 96, tier: "NO" });

    const prospects = await (await fetch(`${baseUrl}/api/prospects`)).json();
    expect(prospects).toEqual([
      expect.objectContaining({ domain: "example-cpa.com", company: "Example CPA", score: 96 }),
    ]);
  });

  it("rejects a body without a URL", async () => {
    const res = await post("/api/audit", { company: "Example CPA" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: true, message: "Invalid request body" });
    expect(loader.calls).toEqual([]);
  });
});

describe("POST /api/batch", () => {
  it("audits every target in order", async () => {
    const res = await post("/api/batch", {
      targets: ["a.example-cpa.com", { url: "b.example-cpa.com", company: "B Partners" }],
      concurrency: 2,
    });
    const body = BatchResultSchema.parse(await res.json());

    expect(res.status).toBe(200);
    expect(body.items.map((item) => item.url)).toEqual([
      "https://a.example-cpa.com/",
      "https://b.example-cpa.com/",
    ]);
    expect(body.countsByTier).toEqual({ "STRONG YES": 0, YES: 0, MAYBE: 0, NO: 2, FAILED: 0 });
    expect((await store.getAll()).map((entry) => entry.domain).sort()).toEqual(["a.example-cpa.com", "b.example-cpa.com"]);
  });

  it("skips domains already scored when resuming", async () => {
    await post("/api/audit", { url: "a.example-cpa.com" });

    const res = await post("/api/batch", { targets: ["www.a.example-cpa.com", "b.example-cpa.com"], resume: true });
    const body = BatchResultSchema.parse(await res.json());

    expect(body.skipped).toBe(1);
    expect(loader.calls).toEqual(["https://a.example-cpa.com/", "https://b.example-cpa.com/"]);
  });

  it("caps the concurrency a caller may ask for", async () => {
    const res = await post("/api/batch", { targets: ["a.example-cpa.com"], concurrency: 50 });

    expect(res.status).toBe(400);
  });
});

describe("export endpoints", () => {
  it("renders a posted audit result as markdown", async () => {
    const result: unknown = await (await post("/api/audit", { url: "example-cpa.com" })).json();

    const res = await post("/api/export/markdown", result);
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/markdown; charset=utf-8");
    expect(text.split("\n")[0]).toBe("# Website Audit Report");
    expect(text.split("\n")).toContain("**Score:** 96/100");
  });

  it("rejects a malformed batch", async () => {
    const res = await post("/api/export/csv", { items: "nope" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: true, message: "Invalid batch result data" });
  });
});

describe("misc routes", () => {
  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(await res.json()).toEqual({ status: "ok", service: "cpa-prospect-audit" });
  });

  it("answers unknown API paths with a JSON 404", async () => {
    const res = await fetch(`${baseUrl}/api/nowhere`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: true, message: "Endpoint not found" });
  });
});
