import { z } from "zod";

export const AuditConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(30000),
  judgeTimeoutMs: z.number().int().positive().default(60000),
  concurrency: z.number().int().positive().default(3),
  userAgent: z.string().default("cpa-prospect-audit/1.0"),
  renderer: z.enum(["browser", "fetch"]).default("browser"),
  model: z.string().default("claude-sonnet-4-5-20250929"),
  outputDir: z.string().default("."),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;

export type Signal<T> =
  | { status: "present"; value: T }
  | { status: "absent"; reason: string };

export interface AuditLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ─── Raw facts, one per sub-check ───────────────────────────────────────────

export interface DesignJudgment {
  /** Numeric (1-10) or categorical ("good", "outdated", ...) as the judge returned it. */
  rating: number | string;
  assessment: string;
  issues: string[];
  strengths: string[];
}

export interface MobileLayoutFacts {
  horizontalOverflow: boolean;
  viewportWidth: number;
  contentWidth: number;
}

export interface PageStructureFacts {
  hasHeader: boolean;
  hasNav: boolean;
  hasFooter: boolean;
}

export interface CtaFacts {
  ctaTexts: string[];
}

export interface ContactFormFacts {
  found: boolean;
  formCount: number;
}

export interface PhoneFacts {
  numbers: string[];
  clickable: boolean;
}

export interface TeamFacts {
  found: boolean;
}

export interface CredentialFacts {
  credentials: string[];
}

export interface MapsFacts {
  found: boolean;
}

export interface MetaDescriptionFacts {
  content: string | null;
}

export interface HeadingFacts {
  h1Count: number;
}

export interface FooterNapFacts {
  footerFound: boolean;
  phone: string | null;
  email: string | null;
  hasAddress: boolean;
}

export interface LoadTimeFacts {
  seconds: number;
}

export interface ViewportFacts {
  present: boolean;
}

// ─── Per-category signal groups ─────────────────────────────────────────────

export interface VisualSignals {
  designJudgment: Signal<DesignJudgment>;
  mobileLayout: Signal<MobileLayoutFacts>;
  pageStructure: Signal<PageStructureFacts>;
}

export interface ConversionSignals {
  cta: Signal<CtaFacts>;
  contactForm: Signal<ContactFormFacts>;
  phone: Signal<PhoneFacts>;
}

export interface TrustSignals {
  team: Signal<TeamFacts>;
  credentials: Signal<CredentialFacts>;
  googleMaps: Signal<MapsFacts>;
}

export interface SeoSignals {
  metaDescription: Signal<MetaDescriptionFacts>;
  headings: Signal<HeadingFacts>;
  footerNap: Signal<FooterNapFacts>;
}

export interface TechnicalSignals {
  loadTime: Signal<LoadTimeFacts>;
  viewport: Signal<ViewportFacts>;
}

export interface SiteSignals {
  url: string;
  finalUrl: string;
  title: string | null;
  visual: VisualSignals;
  conversion: ConversionSignals;
  trust: TrustSignals;
  seo: SeoSignals;
  technical: TechnicalSignals;
}

// ─── Collaborator contracts ─────────────────────────────────────────────────

export interface RenderedFacts {
  mobileLayout: MobileLayoutFacts;
}

export interface LoadedPage {
  url: string;
  finalUrl: string;
  statusCode: number;
  html: string;
  loadTimeMs: number;
  screenshots: {
    desktop: Signal<Buffer>;
    mobile: Signal<Buffer>;
  };
  rendered: Signal<RenderedFacts>;
}

export interface LoadOptions {
  timeoutMs: number;
  /** Aborted when the caller stops waiting; loaders release what they hold. */
  signal?: AbortSignal;
}

export interface PageLoader {
  load(url: string, options: LoadOptions): Promise<LoadedPage>;
}

export interface JudgeContext {
  url: string;
  signal: AbortSignal;
}

export interface VisionJudge {
  judge(screenshot: Buffer, context: JudgeContext): Promise<DesignJudgment>;
}

export type JudgeOutcome =
  | { status: "judged"; judgment: DesignJudgment }
  | { status: "unavailable"; reason: string }
  | { status: "errored"; reason: string };

export type AuditState = "PENDING" | "LOADING" | "EXTRACTING" | "SCORING" | "DONE" | "PARTIAL" | "FAILED";

export interface AuditTarget {
  url: string;
  company?: string;
  notes?: string;
}

export type {
  AuditFailureKind,
  AuditResult,
  AuditStatus,
  BatchResult,
  CategoryKey,
  CategoryResult,
  DegradedCheck,
  FailedAuditResult,
  Finding,
  FindingSeverity,
  FindingStatus,
  Grade,
  LoadFailureKind,
  Opportunity,
  OpportunityPriority,
  ScoredAuditResult,
  Tier,
  TierCounts,
} from "@shared/audit-types";
