import { CATEGORY_KEYS } from "@shared/audit-types";
import type {
  AuditConfig,
  AuditFailureKind,
  AuditLogger,
  AuditResult,
  AuditState,
  AuditTarget,
  CategoryKey,
  CategoryResult,
  DegradedCheck,
  FailedAuditResult,
  JudgeOutcome,
  LoadedPage,
  PageLoader,
  ScoredAuditResult,
  SiteSignals,
  VisionJudge,
} from "./types";
import { AuditConfigSchema } from "./types";
import { aggregate } from "./aggregator";
import { IllegalTransitionError, errorMessage } from "./errors";
import { extractMarkupSignals, type MarkupSignals } from "./extractor";
import { deepFreeze } from "./freeze";
import { classifyLoadFailure } from "./page-loader";
import { scoreAll } from "./scorer";
import { absent, mapSignal, present } from "./signal";
import { TimeoutError, withTimeout } from "./timeout";
import { normalizeTargetUrl } from "./url-utils";
import { judgeDesign } from "./vision-judge";

/**
 * Extra time the orchestrator allows past the loader's own deadline, for
 * browser context setup and teardown that the deadline does not bound.
 */
export const LOAD_GRACE_MS = 5000;

const TRANSITIONS: Record<AuditState, readonly AuditState[]> = {
  PENDING: ["LOADING", "FAILED"],
  LOADING: ["EXTRACTING", "PARTIAL", "FAILED"],
  EXTRACTING: ["SCORING", "PARTIAL"],
  SCORING: ["DONE", "PARTIAL"],
  DONE: [],
  PARTIAL: [],
  FAILED: [],
};

export type StateChangeListener = (url: string, from: AuditState, to: AuditState) => void;

export class AuditStateMachine {
  private current: AuditState = "PENDING";

  constructor(
    private readonly url: string,
    private readonly onChange?: StateChangeListener
  ) {}

  get state(): AuditState {
    return this.current;
  }

  transition(next: AuditState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    const previous = this.current;
    this.current = next;
    this.onChange?.(this.url, previous, next);
  }
}

export interface FailureContext {
  url: string;
  inputUrl: string;
  company: string | null;
  timestamp: string;
  durationMs: number;
}

export function failedResult(context: FailureContext, kind: AuditFailureKind, message: string): FailedAuditResult {
  return {
    ...context,
    status: "failed",
    categories: null,
    totalScore: null,
    tier: null,
    grade: null,
    rankedOpportunities: [],
    degraded: [],
    error: message,
    failure: { kind, message },
  };
}

export function buildSiteSignals(page: LoadedPage, markup: MarkupSignals, judgment: JudgeOutcome): SiteSignals {
  return {
    url: page.url,
    finalUrl: page.finalUrl,
    title: markup.title,
    visual: {
      designJudgment: judgment.status === "judged" ? present(judgment.judgment) : absent(judgment.reason),
      mobileLayout: mapSignal(page.rendered, (facts) => facts.mobileLayout),
      pageStructure: markup.pageStructure,
    },
    conversion: markup.conversion,
    trust: markup.trust,
    seo: markup.seo,
    technical: {
      loadTime: present({ seconds: Math.round(page.loadTimeMs / 10) / 100 }),
      viewport: markup.viewport,
    },
  };
}

export function collectDegraded(categories: Record<CategoryKey, CategoryResult>): DegradedCheck[] {
  return CATEGORY_KEYS.flatMap((category) =>
    categories[category].findings
      .filter((finding) => finding.status === "unavailable")
      .map((finding) => ({ category, check: finding.check, reason: finding.message }))
  );
}

export interface SiteAuditorDeps {
  loader: PageLoader;
  judge?: VisionJudge | null;
  config?: Partial<AuditConfig>;
  logger?: AuditLogger;
  onStateChange?: StateChangeListener;
  /** Receives the loaded page (screenshots included) before extraction. */
  onPageLoaded?: (page: LoadedPage) => Promise<void> | void;
  now?: () => Date;
}

export interface AuditOptions {
  timeoutMs?: number;
  judgeTimeoutMs?: number;
}

/**
 * Runs one site through load, extraction, scoring and aggregation. Only a
 * page that cannot be loaded ends in FAILED; every other failure is scored
 * as an unavailable check and the result comes back PARTIAL.
 */
export class SiteAuditor {
  private readonly loader: PageLoader;
  private readonly judge: VisionJudge | null;
  private readonly config: AuditConfig;
  private readonly logger: AuditLogger;
  private readonly onStateChange?: StateChangeListener;
  private readonly onPageLoaded?: (page: LoadedPage) => Promise<void> | void;
  private readonly now: () => Date;

  constructor(deps: SiteAuditorDeps) {
    this.loader = deps.loader;
    this.judge = deps.judge ?? null;
    this.config = AuditConfigSchema.parse(deps.config ?? {});
    this.logger = deps.logger ?? console;
    this.onStateChange = deps.onStateChange;
    this.onPageLoaded = deps.onPageLoaded;
    this.now = deps.now ?? (() => new Date());
  }

  get settings(): AuditConfig {
    return this.config;
  }

  async audit(input: AuditTarget | string, options: AuditOptions = {}): Promise<AuditResult> {
    const target = typeof input === "string" ? { url: input } : input;
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const judgeTimeoutMs = options.judgeTimeoutMs ?? this.config.judgeTimeoutMs;
    const startedAt = Date.now();
    const timestamp = this.now().toISOString();
    const machine = new AuditStateMachine(target.url, this.onStateChange);

    const inputUrl = target.url.trim();
    const url = normalizeTargetUrl(inputUrl);
    const context = (): FailureContext => ({
      url: url ?? inputUrl,
      inputUrl,
      company: target.company ?? null,
      timestamp,
      durationMs: Date.now() - startedAt,
    });

    if (!url) {
      machine.transition("FAILED");
      this.logger.warn(`[audit] Rejected "${inputUrl}": not a valid website URL`);
      return deepFreeze(failedResult(context(), "invalid_url", `"${inputUrl}" is not a valid website URL`));
    }

    machine.transition("LOADING");
    let page: LoadedPage;
    try {
      page = await withTimeout("Page load", timeoutMs + LOAD_GRACE_MS, (signal) =>
        this.loader.load(url, { timeoutMs, signal })
      );
    } catch (e) {
      // Our own timer firing means the whole grace period went by too.
      const failure = classifyLoadFailure(e, e instanceof TimeoutError ? e.timeoutMs : timeoutMs);
      machine.transition("FAILED");
      this.logger.warn(`[audit] ${url} failed to load (${failure.kind}): ${failure.message}`);
      return deepFreeze(failedResult(context(), failure.kind, failure.message));
    }

    if (this.onPageLoaded) {
      try {
        await this.onPageLoaded(page);
      } catch (e) {
        this.logger.warn(`[audit] ${url}: page artifact hook failed: ${errorMessage(e)}`);
      }
    }

    machine.transition("EXTRACTING");
    const markup = extractMarkupSignals(page.html);
    const desktop = page.screenshots.desktop.status === "present" ? page.screenshots.desktop.value : null;
    const judgment = await judgeDesign(this.judge, desktop, url, judgeTimeoutMs);
    if (judgment.status === "errored") {
      this.logger.warn(`[audit] ${url}: ${judgment.reason}`);
    }
    const signals = deepFreeze(buildSiteSignals(page, markup, judgment));

    machine.transition("SCORING");
    const categories = scoreAll(signals);
    const summary = aggregate(categories);
    const degraded = collectDegraded(categories);

    const partial = degraded.length > 0;
    machine.transition(partial ? "PARTIAL" : "DONE");

    const result: ScoredAuditResult = {
      ...context(),
      url,
      status: partial ? "partial" : "done",
      title: signals.title,
      categories,
      ...summary,
      degraded,
      error: partial
        ? `Partial audit, ${degraded.length} check(s) could not be evaluated: ${degraded.map((d) => d.reason).join("; ")}`
        : null,
    };

    this.logger.log(`[audit] ${url} scored ${result.totalScore}/100 (${result.tier}, grade ${result.grade})`);
    return deepFreeze(result);
  }
}
