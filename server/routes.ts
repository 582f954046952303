import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { AuditResultSchema, BatchResultSchema } from "@shared/audit-schema";
import type { AuditLogger, AuditTarget } from "./audit/types";
import type { AuditOptions } from "./audit/auditor";
import type { BatchAuditor, SiteAuditRunner } from "./audit/batch";
import { errorMessage } from "./audit/errors";
import { targetDomain } from "./audit/url-utils";
import { generateBatchCsv, generateMarkdownReport } from "./export";
import type { ProspectStore } from "./prospects";

const MAX_BATCH_TARGETS = 100;

const AuditRequestSchema = z.object({
  url: z.string().trim().min(1),
  company: z.string().trim().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  judgeTimeoutMs: z.coerce.number().int().positive().optional(),
});

const TargetSchema = z.union([
  z.string().trim().min(1).transform((url): AuditTarget => ({ url })),
  z.object({
    url: z.string().trim().min(1),
    company: z.string().trim().min(1).optional(),
    notes: z.string().optional(),
  }),
]);

const BatchRequestSchema = z.object({
  targets: z.array(TargetSchema).min(1).max(MAX_BATCH_TARGETS),
  concurrency: z.coerce.number().int().positive().max(10).optional(),
  resume: z.boolean().optional(),
});

export interface RouteDeps {
  auditor: SiteAuditRunner;
  createBatch: (concurrency?: number) => Pick<BatchAuditor, "run">;
  store: ProspectStore;
  logger?: AuditLogger;
}

function sendError(res: Response, status: number, message: string, details?: unknown): void {
  res.status(status).json({ error: true, message, ...(details === undefined ? {} : { details }) });
}

function attachmentName(prefix: string, extension: string): string {
  return `${prefix}-${new Date().toISOString().split("T")[0]}.${extension}`;
}

export async function registerRoutes(httpServer: Server, app: Express, deps: RouteDeps): Promise<Server> {
  const { auditor, createBatch, store } = deps;
  const logger = deps.logger ?? console;

  app.post("/api/audit", async (req: Request, res: Response) => {
    try {
      const parsed = AuditRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        sendError(res, 400, "Invalid request body", parsed.error.errors);
        return;
      }

      const { url, company, ...options } = parsed.data;
      const auditOptions: AuditOptions = options;
      const result = await auditor.audit({ url, company }, auditOptions);
      await store.recordAudit(result);

      res.json(result);
    } catch (error) {
      logger.error(`[server] Audit request failed: ${errorMessage(error)}`);
      sendError(res, 500, errorMessage(error) || "An error occurred during the audit");
    }
  });

  app.post("/api/batch", async (req: Request, res: Response) => {
    try {
      const parsed = BatchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        sendError(res, 400, "Invalid request body", parsed.error.errors);
        return;
      }

      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) controller.abort();
      });

      const audited = parsed.data.resume ? await store.getAuditedDomains() : new Set<string>();
      const batch = await createBatch(parsed.data.concurrency).run(parsed.data.targets, {
        signal: controller.signal,
        skip: (target) => audited.has(targetDomain(target.url)),
      });

      for (const item of batch.items) {
        if (item.status === "failed" && item.failure.kind === "cancelled") continue;
        await store.recordAudit(item);
      }

      res.json(batch);
    } catch (error) {
      logger.error(`[server] Batch request failed: ${errorMessage(error)}`);
      sendError(res, 500, errorMessage(error) || "An error occurred during the batch");
    }
  });

  app.get("/api/prospects", async (_req: Request, res: Response) => {
    try {
      res.json(await store.getAll());
    } catch (error) {
      sendError(res, 500, errorMessage(error) || "Failed to fetch prospects");
    }
  });

  app.get("/api/prospects/summary", async (_req: Request, res: Response) => {
    try {
      res.json(await store.getSummary());
    } catch (error) {
      sendError(res, 500, errorMessage(error) || "Failed to fetch prospect summary");
    }
  });

  app.post("/api/export/markdown", (req: Request, res: Response) => {
    const parsed = AuditResultSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, 400, "Invalid audit result data");
      return;
    }

    res.setHeader("Content-Type", "text/markdown");
    res.setHeader("Content-Disposition", `attachment; filename="${attachmentName("audit-report", "md")}"`);
    res.send(generateMarkdownReport(parsed.data));
  });

  app.post("/api/export/csv", (req: Request, res: Response) => {
    const parsed = BatchResultSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, 400, "Invalid batch result data");
      return;
    }

    res.setHeader("Content-Type", "text/csv");
    res.setHeader("Content-Disposition", `attachment; filename="${attachmentName("batch-summary", "csv")}"`);
    res.send(generateBatchCsv(parsed.data));
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "cpa-prospect-audit" });
  });

  return httpServer;
}
