import type {
  CategoryKey,
  CategoryResult,
  ConversionSignals,
  DesignJudgment,
  Finding,
  FindingSeverity,
  FindingStatus,
  Opportunity,
  OpportunityPriority,
  SeoSignals,
  Signal,
  SiteSignals,
  TechnicalSignals,
  TrustSignals,
  VisualSignals,
} from "./types";

export const CATEGORY_META: Record<CategoryKey, { name: string; max: number }> = {
  visual_design: { name: "Visual Design", max: 30 },
  conversion: { name: "Conversion Elements", max: 25 },
  trust: { name: "Trust Signals", max: 20 },
  seo: { name: "SEO Fundamentals", max: 15 },
  technical: { name: "Technical Performance", max: 10 },
};

interface CheckDefinition {
  check: string;
  label: string;
  maxPoints: number;
}

export const CHECKS = {
  designQuality: { check: "design_quality", label: "Design quality", maxPoints: 20 },
  mobileLayout: { check: "mobile_layout", label: "Mobile layout", maxPoints: 5 },
  pageStructure: { check: "page_structure", label: "Page structure", maxPoints: 5 },
  clearCta: { check: "clear_cta", label: "Clear call-to-action", maxPoints: 10 },
  contactForm: { check: "contact_form", label: "Contact form", maxPoints: 8 },
  phoneNumber: { check: "phone_number", label: "Phone number", maxPoints: 7 },
  teamInfo: { check: "team_info", label: "Team/about section", maxPoints: 7 },
  credentials: { check: "credentials", label: "Credentials", maxPoints: 6 },
  googleMaps: { check: "google_maps", label: "Google Maps", maxPoints: 7 },
  metaDescription: { check: "meta_description", label: "Meta description", maxPoints: 5 },
  h1Heading: { check: "h1_heading", label: "H1 heading", maxPoints: 5 },
  footerNap: { check: "footer_nap", label: "NAP in footer", maxPoints: 5 },
  loadTime: { check: "load_time", label: "Page load time", maxPoints: 5 },
  viewportMeta: { check: "viewport_meta", label: "Viewport meta tag", maxPoints: 5 },
} satisfies Record<string, CheckDefinition>;

const DESIGN_PASS_RATING = 7;
const FAST_LOAD_SECONDS = 3;
const ACCEPTABLE_LOAD_SECONDS = 5;

const CATEGORICAL_RATINGS: Array<[RegExp, number]> = [
  [/\b(?:excellent|outstanding|exceptional)\b/i, 9.5],
  [/\b(?:good|modern|professional)\b/i, 7.5],
  [/\b(?:fair|acceptable|average|adequate|mediocre)\b/i, 5],
  [/\b(?:poor|outdated|dated|bad|unprofessional)\b/i, 2],
];

interface CheckOutcome {
  status: FindingStatus;
  points: number;
  message: string;
  opportunity?: string;
}

interface EvaluatedCheck {
  definition: CheckDefinition;
  status: FindingStatus;
  points: number;
  message: string;
  opportunity?: string;
}

export function roundPoints(value: number): number {
  return Math.round(value * 10) / 10;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function budgetWeight(maxPoints: number): "high" | "med" | "low" {
  if (maxPoints >= 8) return "high";
  if (maxPoints >= 6) return "med";
  return "low";
}

function severityFor(status: FindingStatus, points: number, maxPoints: number): FindingSeverity {
  if (status === "pass") return "pass";
  if (status === "partial" && points * 2 >= maxPoints) return "low";
  return budgetWeight(maxPoints);
}

function priorityFor(maxPoints: number): OpportunityPriority {
  const weight = budgetWeight(maxPoints);
  return weight === "med" ? "medium" : weight;
}

/**
 * Applies a rule to a signal. Absence short-circuits to an unavailable
 * check worth 0 points; the rule only ever sees present values.
 */
function evaluate<T>(definition: CheckDefinition, signal: Signal<T>, rule: (value: T) => CheckOutcome): EvaluatedCheck {
  if (signal.status === "absent") {
    return {
      definition,
      status: "unavailable",
      points: 0,
      message: `${definition.label} could not be evaluated: ${signal.reason}`,
    };
  }

  const outcome = rule(signal.value);
  return { definition, ...outcome, points: roundPoints(clamp(outcome.points, 0, definition.maxPoints)) };
}

function binary(passMessage: string, failMessage: string, opportunity: string, passed: boolean, maxPoints: number): CheckOutcome {
  return passed
    ? { status: "pass", points: maxPoints, message: passMessage }
    : { status: "fail", points: 0, message: failMessage, opportunity };
}

function buildCategory(key: CategoryKey, checks: EvaluatedCheck[]): CategoryResult {
  const meta = CATEGORY_META[key];
  const findings: Finding[] = [];
  const opportunities: Opportunity[] = [];
  const seen = new Set<string>();

  for (const item of checks) {
    findings.push({
      check: item.definition.check,
      status: item.status,
      severity: severityFor(item.status, item.points, item.definition.maxPoints),
      message: item.message,
      points: item.points,
      maxPoints: item.definition.maxPoints,
    });

    if (item.opportunity && item.status !== "pass" && !seen.has(item.opportunity)) {
      seen.add(item.opportunity);
      opportunities.push({
        category: key,
        check: item.definition.check,
        priority: priorityFor(item.definition.maxPoints),
        message: item.opportunity,
        points: item.definition.maxPoints,
      });
    }
  }

  const score = roundPoints(findings.reduce((sum, f) => sum + f.points, 0));

  return {
    key,
    name: meta.name,
    score: clamp(score, 0, meta.max),
    max: meta.max,
    findings,
    opportunities,
  };
}

/**
 * Maps a judge rating onto the 0-10 scale. Numbers are clamped, numeric
 * strings ("7", "6.5/10") parsed, known words mapped; anything else is null.
 */
export function normalizeRating(rating: number | string): number | null {
  if (typeof rating === "number") {
    return Number.isFinite(rating) ? clamp(rating, 0, 10) : null;
  }

  const trimmed = rating.trim();
  const numeric = trimmed.match(/^(-?\d+(?:\.\d+)?)\s*(?:\/\s*10)?$/);
  if (numeric) {
    return clamp(parseFloat(numeric[1]), 0, 10);
  }

  for (const [pattern, value] of CATEGORICAL_RATINGS) {
    if (pattern.test(trimmed)) return value;
  }

  return null;
}

function formatNumber(value: number): string {
  return String(roundPoints(value));
}

function designQualityRule(judgment: DesignJudgment): CheckOutcome {
  const definition = CHECKS.designQuality;
  const rating = normalizeRating(judgment.rating);

  if (rating === null) {
    return {
      status: "unavailable",
      points: 0,
      message: `Visual design judgment unavailable: rating "${String(judgment.rating)}" could not be interpreted`,
    };
  }

  const points = (rating / 10) * definition.maxPoints;
  const summary = judgment.assessment ? ` ${judgment.assessment}` : "";

  if (rating >= DESIGN_PASS_RATING) {
    return { status: "pass", points, message: `Design quality rated ${formatNumber(rating)}/10.${summary}` };
  }

  return {
    status: rating === 0 ? "fail" : "partial",
    points,
    message: `Design quality rated ${formatNumber(rating)}/10 - appears outdated or unprofessional.${summary}`,
    opportunity: "Website redesign to modernize appearance",
  };
}

export function scoreVisualDesign(signals: VisualSignals): CategoryResult {
  const designQuality: EvaluatedCheck =
    signals.designJudgment.status === "absent"
      ? {
          definition: CHECKS.designQuality,
          status: "unavailable",
          points: 0,
          message: `Visual design judgment unavailable: ${signals.designJudgment.reason}`,
        }
      : evaluate(CHECKS.designQuality, signals.designJudgment, designQualityRule);

  return buildCategory("visual_design", [
    designQuality,
    evaluate(CHECKS.mobileLayout, signals.mobileLayout, (facts) =>
      binary(
        `Layout fits the ${facts.viewportWidth}px mobile viewport`,
        `Content overflows the ${facts.viewportWidth}px mobile viewport (${facts.contentWidth}px wide)`,
        "Fix the mobile layout so content fits small screens",
        !facts.horizontalOverflow,
        CHECKS.mobileLayout.maxPoints
      )
    ),
    evaluate(CHECKS.pageStructure, signals.pageStructure, (facts) => {
      const hasTop = facts.hasHeader || facts.hasNav;
      if (hasTop && facts.hasFooter) {
        return { status: "pass", points: 5, message: "Page has a clear header/navigation and footer" };
      }
      if (hasTop || facts.hasFooter) {
        return {
          status: "partial",
          points: 2,
          message: hasTop ? "Page has a header/navigation but no footer" : "Page has a footer but no header or navigation",
          opportunity: "Organize the page into clear header, content and footer sections",
        };
      }
      return {
        status: "fail",
        points: 0,
        message: "No header, navigation or footer landmarks found",
        opportunity: "Organize the page into clear header, content and footer sections",
      };
    }),
  ]);
}

export function scoreConversion(signals: ConversionSignals): CategoryResult {
  return buildCategory("conversion", [
    evaluate(CHECKS.clearCta, signals.cta, (facts) =>
      binary(
        `Found CTAs: ${facts.ctaTexts.slice(0, 3).join(", ")}`,
        "No clear call-to-action button found on homepage",
        "Add prominent CTA buttons for scheduling consultations",
        facts.ctaTexts.length > 0,
        CHECKS.clearCta.maxPoints
      )
    ),
    evaluate(CHECKS.contactForm, signals.contactForm, (facts) =>
      binary(
        "Contact form found on homepage",
        "No contact form found on homepage",
        "Add contact form for easy lead capture",
        facts.found,
        CHECKS.contactForm.maxPoints
      )
    ),
    evaluate(CHECKS.phoneNumber, signals.phone, (facts) => {
      if (facts.numbers.length === 0) {
        return {
          status: "fail",
          points: 0,
          message: "No phone number found on homepage",
          opportunity: "Add clickable phone number in header",
        };
      }
      if (!facts.clickable) {
        return {
          status: "partial",
          points: 5,
          message: `Phone number ${facts.numbers[0]} found but not clickable (no tel: link)`,
          opportunity: "Make the phone number clickable with a tel: link",
        };
      }
      return { status: "pass", points: 7, message: `Clickable phone number found: ${facts.numbers[0]}` };
    }),
  ]);
}

export function scoreTrust(signals: TrustSignals): CategoryResult {
  return buildCategory("trust", [
    evaluate(CHECKS.teamInfo, signals.team, (facts) =>
      binary(
        "Team/about section visible on homepage",
        "No team/about section visible on homepage",
        "Add team section showcasing credentials and experience",
        facts.found,
        CHECKS.teamInfo.maxPoints
      )
    ),
    evaluate(CHECKS.credentials, signals.credentials, (facts) =>
      binary(
        `Credentials mentioned: ${facts.credentials.join(", ")}`,
        "No professional credentials or licenses mentioned on homepage",
        "Highlight CPA licenses and certifications",
        facts.credentials.length > 0,
        CHECKS.credentials.maxPoints
      )
    ),
    evaluate(CHECKS.googleMaps, signals.googleMaps, (facts) =>
      binary(
        "Google Maps embed or link found",
        "No Google Maps embed found on homepage",
        "Embed Google Maps on homepage for SEO boost",
        facts.found,
        CHECKS.googleMaps.maxPoints
      )
    ),
  ]);
}

export function scoreSeo(signals: SeoSignals): CategoryResult {
  return buildCategory("seo", [
    evaluate(CHECKS.metaDescription, signals.metaDescription, (facts) =>
      binary(
        `Meta description present: "${(facts.content ?? "").slice(0, 100)}"`,
        "Missing meta description tag",
        "Add SEO-optimized meta descriptions",
        facts.content !== null,
        CHECKS.metaDescription.maxPoints
      )
    ),
    evaluate(CHECKS.h1Heading, signals.headings, (facts) => {
      if (facts.h1Count === 0) {
        return { status: "fail", points: 0, message: "No H1 tag found on page", opportunity: "Add proper heading structure" };
      }
      if (facts.h1Count > 1) {
        return {
          status: "partial",
          points: 3,
          message: `Multiple H1 tags found (${facts.h1Count}) - should have only one`,
          opportunity: "Use a single H1 heading per page",
        };
      }
      return { status: "pass", points: 5, message: "Single H1 heading present" };
    }),
    evaluate(CHECKS.footerNap, signals.footerNap, (facts) => {
      const opportunity = "Ensure consistent NAP in footer for local SEO";
      if (!facts.footerFound) {
        return { status: "fail", points: 0, message: "No footer element found", opportunity };
      }
      if (facts.phone && facts.hasAddress) {
        return { status: "pass", points: 5, message: "Footer shows address and phone number" };
      }
      const parts: string[] = [];
      if (facts.phone) parts.push("phone");
      if (facts.email) parts.push("email");
      if (facts.hasAddress) parts.push("address");
      if (parts.length > 0) {
        return {
          status: "partial",
          points: 3,
          message: `Footer NAP incomplete (found: ${parts.join(", ")})`,
          opportunity,
        };
      }
      return {
        status: "fail",
        points: 0,
        message: "NAP (Name, Address, Phone) not clearly visible in footer",
        opportunity,
      };
    }),
  ]);
}

export function scoreTechnical(signals: TechnicalSignals): CategoryResult {
  return buildCategory("technical", [
    evaluate(CHECKS.loadTime, signals.loadTime, (facts) => {
      const seconds = Math.round(facts.seconds * 100) / 100;
      if (seconds < FAST_LOAD_SECONDS) {
        return { status: "pass", points: 5, message: `Page loaded in ${seconds}s` };
      }
      if (seconds < ACCEPTABLE_LOAD_SECONDS) {
        return {
          status: "partial",
          points: 3,
          message: `Page load time is ${seconds}s (target: under 3s)`,
          opportunity: "Optimize page speed and performance",
        };
      }
      return {
        status: "fail",
        points: 0,
        message: `Slow page load time: ${seconds}s`,
        opportunity: "Significant performance optimization needed",
      };
    }),
    evaluate(CHECKS.viewportMeta, signals.viewport, (facts) =>
      binary(
        "Viewport meta tag present",
        "Missing viewport meta tag (mobile optimization)",
        "Add mobile-responsive design",
        facts.present,
        CHECKS.viewportMeta.maxPoints
      )
    ),
  ]);
}

export function scoreAll(signals: SiteSignals): Record<CategoryKey, CategoryResult> {
  return {
    visual_design: scoreVisualDesign(signals.visual),
    conversion: scoreConversion(signals.conversion),
    trust: scoreTrust(signals.trust),
    seo: scoreSeo(signals.seo),
    technical: scoreTechnical(signals.technical),
  };
}
