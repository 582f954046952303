import pLimit from "p-limit";
import { emptyTierCounts } from "@shared/audit-types";
import type { AuditLogger, AuditResult, AuditTarget, BatchResult, TierCounts } from "./types";
import type { AuditOptions } from "./auditor";
import { failedResult } from "./auditor";
import { errorMessage } from "./errors";
import { deepFreeze } from "./freeze";
import { normalizeTargetUrl } from "./url-utils";

export interface SiteAuditRunner {
  audit(target: AuditTarget, options?: AuditOptions): Promise<AuditResult>;
}

export interface BatchProgress {
  completed: number;
  total: number;
  countsByTier: TierCounts;
  latest: AuditResult;
}

export interface BatchRunOptions {
  onProgress?: (progress: BatchProgress) => void;
  /** Aborting stops new audits from starting; in-flight audits finish on their own timeouts. */
  signal?: AbortSignal;
  skip?: (target: AuditTarget) => boolean;
}

export interface BatchAuditorDeps {
  auditor: SiteAuditRunner;
  concurrency?: number;
  logger?: AuditLogger;
  now?: () => Date;
}

const DEFAULT_CONCURRENCY = 3;

export class BatchAuditor {
  private readonly auditor: SiteAuditRunner;
  private readonly concurrency: number;
  private readonly logger: AuditLogger;
  private readonly now: () => Date;

  constructor({ auditor, concurrency = DEFAULT_CONCURRENCY, logger = console, now = () => new Date() }: BatchAuditorDeps) {
    this.auditor = auditor;
    this.concurrency = Math.max(1, Math.floor(concurrency));
    this.logger = logger;
    this.now = now;
  }

  private failure(target: AuditTarget, kind: "cancelled" | "internal", message: string, startedAt: number): AuditResult {
    return deepFreeze(
      failedResult(
        {
          url: normalizeTargetUrl(target.url) ?? target.url,
          inputUrl: target.url,
          company: target.company ?? null,
          timestamp: this.now().toISOString(),
          durationMs: Date.now() - startedAt,
        },
        kind,
        message
      )
    );
  }

  private async auditIsolated(target: AuditTarget, signal: AbortSignal | undefined): Promise<AuditResult> {
    const startedAt = Date.now();
    if (signal?.aborted) {
      return this.failure(target, "cancelled", "Batch was cancelled before this site was audited", startedAt);
    }

    try {
      return await this.auditor.audit(target);
    } catch (e) {
      this.logger.error(`[batch] Audit of ${target.url} crashed: ${errorMessage(e)}`);
      return this.failure(target, "internal", `Audit crashed unexpectedly: ${errorMessage(e)}`, startedAt);
    }
  }

  /**
   * Audits every target with at most `concurrency` in flight. Items come back
   * in input order whatever order they finish in, and no single site's
   * failure escapes into the batch.
   */
  async run(inputs: Array<AuditTarget | string>, options: BatchRunOptions = {}): Promise<BatchResult> {
    const { onProgress, signal, skip } = options;
    const startedAt = this.now().toISOString();

    const targets = inputs.map((input) => (typeof input === "string" ? { url: input } : input));
    const queued = skip ? targets.filter((target) => !skip(target)) : targets;
    const skipped = targets.length - queued.length;
    if (skipped > 0) {
      this.logger.log(`[batch] Skipping ${skipped} already audited site(s)`);
    }

    const limit = pLimit(this.concurrency);
    const countsByTier = emptyTierCounts();
    let completed = 0;

    // Runs inside the concurrency slot, so tallies and progress land before the next site starts.
    const record = (result: AuditResult): AuditResult => {
      countsByTier[result.tier ?? "FAILED"] += 1;
      completed += 1;
      this.logger.log(`[batch] [${completed}/${queued.length}] ${result.url} -> ${result.tier ?? "FAILED"}`);

      if (onProgress) {
        try {
          onProgress({ completed, total: queued.length, countsByTier: { ...countsByTier }, latest: result });
        } catch (e) {
          this.logger.warn(`[batch] Progress listener threw: ${errorMessage(e)}`);
        }
      }
      return result;
    };

    const items = await Promise.all(
      queued.map((target) => limit(async () => record(await this.auditIsolated(target, signal))))
    );

    const cancelled = signal?.aborted ?? false;
    if (cancelled) {
      this.logger.warn(`[batch] Cancelled; ${countsByTier.FAILED} site(s) failed or were not started`);
    }

    return deepFreeze({
      items,
      startedAt,
      finishedAt: this.now().toISOString(),
      countsByTier: { ...countsByTier },
      cancelled,
      skipped,
    });
  }
}
