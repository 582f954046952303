import type { AuditConfig, AuditLogger, LoadedPage, PageLoader, VisionJudge } from "./types";
import { AuditConfigSchema } from "./types";
import type { StateChangeListener } from "./auditor";
import { SiteAuditor } from "./auditor";
import { BatchAuditor } from "./batch";
import { launchBrowserLoader } from "./browser-loader";
import { FetchPageLoader } from "./page-loader";
import { AnthropicVisionJudge } from "./vision-judge";

export interface RuntimeOptions {
  config?: Partial<AuditConfig>;
  apiKey?: string;
  executablePath?: string;
  logger?: AuditLogger;
  onStateChange?: StateChangeListener;
  onPageLoaded?: (page: LoadedPage) => Promise<void> | void;
}

export interface AuditRuntime {
  config: AuditConfig;
  auditor: SiteAuditor;
  createBatch(concurrency?: number): BatchAuditor;
  close(): Promise<void>;
}

/**
 * Wires the loader and judge the configuration asks for. The browser, when
 * used, is launched once here and shared by every audit until close().
 */
export async function createAuditRuntime(options: RuntimeOptions = {}): Promise<AuditRuntime> {
  const config = AuditConfigSchema.parse(options.config ?? {});
  const logger = options.logger ?? console;

  let loader: PageLoader;
  let close = async (): Promise<void> => {};

  if (config.renderer === "browser") {
    const handle = await launchBrowserLoader({
      userAgent: config.userAgent,
      executablePath: options.executablePath,
      logger,
    });
    loader = handle.loader;
    close = handle.close;
  } else {
    loader = new FetchPageLoader({ userAgent: config.userAgent });
  }

  let judge: VisionJudge | null = null;
  if (options.apiKey) {
    judge = new AnthropicVisionJudge({ apiKey: options.apiKey, model: config.model });
  } else {
    logger.warn("[audit] ANTHROPIC_API_KEY not set; design quality will be reported as unavailable");
  }

  const auditor = new SiteAuditor({
    loader,
    judge,
    config,
    logger,
    onStateChange: options.onStateChange,
    onPageLoaded: options.onPageLoaded,
  });

  return {
    config,
    auditor,
    createBatch: (concurrency = config.concurrency) => new BatchAuditor({ auditor, concurrency, logger }),
    close,
  };
}

export { SiteAuditor, AuditStateMachine, failedResult } from "./auditor";
export { BatchAuditor } from "./batch";
export { AuditConfigSchema } from "./types";
export type { AuditOptions } from "./auditor";
export type { BatchProgress, BatchRunOptions, SiteAuditRunner } from "./batch";
export type { AuditConfig, AuditResult, AuditTarget, BatchResult } from "./types";
