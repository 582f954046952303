import * as cheerio from "cheerio";
import type {
  CategoryKey,
  ContactFormFacts,
  ConversionSignals,
  CredentialFacts,
  CtaFacts,
  FooterNapFacts,
  HeadingFacts,
  MapsFacts,
  MetaDescriptionFacts,
  PageStructureFacts,
  PhoneFacts,
  SeoSignals,
  Signal,
  TeamFacts,
  TrustSignals,
  ViewportFacts,
} from "./types";
import { ExtractorError, errorMessage } from "./errors";
import { absent, present } from "./signal";

const CTA_KEYWORDS = [
  "schedule",
  "consult",
  "contact us",
  "get started",
  "book",
  "appointment",
  "free consultation",
];

const CTA_CLASS_PATTERN = /btn|button|cta/i;

const FORM_KEYWORDS = ["contact", "email", "message", "inquiry", "name"];

const TEAM_KEYWORDS = ["our team", "about us", "meet our", "our staff", "our professionals"];

const TEAM_CLASS_PATTERN = /team|about|staff/i;

const CREDENTIAL_PATTERNS: Array<[string, RegExp]> = [
  ["CPA", /\bcpas?\b/i],
  ["CERTIFIED PUBLIC ACCOUNTANT", /certified public accountant/i],
  ["LICENSED", /\blicensed\b/i],
  ["CREDENTIAL", /\bcredentials?\b/i],
  ["CERTIFICATION", /\bcertifications?\b/i],
  ["MBA", /\bmba\b/i],
  ["MASTERS", /\bmaster'?s\b/i],
  ["BACHELOR", /\bbachelor'?s?\b/i],
  ["UNIVERSITY", /\buniversity\b/i],
];

const MAPS_PATTERN = /maps\.google\.[a-z.]+|google\.[a-z.]+\/maps|maps\.app\.goo\.gl|goo\.gl\/maps/i;

const ADDRESS_KEYWORDS = ["street", "st.", "avenue", "ave.", "road", "rd.", "suite", "ste.", "blvd", "boulevard"];

const PHONE_PATTERN = /(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;

const MAX_REPORTED = 3;

export interface MarkupSignals {
  title: string | null;
  pageStructure: Signal<PageStructureFacts>;
  conversion: ConversionSignals;
  trust: TrustSignals;
  seo: SeoSignals;
  viewport: Signal<ViewportFacts>;
}

/**
 * Runs one sub-check. A throw becomes an absent signal carrying an
 * ExtractorError message so the other checks still run.
 */
function guard<T>(category: CategoryKey, check: string, fn: () => T): Signal<T> {
  try {
    return present(fn());
  } catch (e) {
    const error = new ExtractorError(category, check, `${check} could not be evaluated: ${errorMessage(e)}`);
    return absent(error.message);
  }
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function visibleText($: cheerio.CheerioAPI): string {
  const $body = $("body").clone();
  $body.find("script, style, noscript, template").remove();
  return collapse($body.text());
}

export function findPhoneNumbers(text: string): string[] {
  const matches = text.match(PHONE_PATTERN) || [];
  const unique: string[] = [];
  for (const match of matches) {
    const cleaned = match.trim();
    if (!unique.includes(cleaned)) unique.push(cleaned);
  }
  return unique;
}

function extractCta($: cheerio.CheerioAPI): CtaFacts {
  const ctaTexts: string[] = [];

  $("button, a, input[type='submit']").each((_, el) => {
    const $el = $(el);
    const isButton = $el.is("button") || $el.is("input");
    const classAttr = $el.attr("class") || "";
    if (!isButton && !CTA_CLASS_PATTERN.test(classAttr)) return;

    const text = collapse($el.is("input") ? $el.attr("value") || "" : $el.text());
    const lower = text.toLowerCase();
    if (text && CTA_KEYWORDS.some((keyword) => lower.includes(keyword)) && !ctaTexts.includes(text)) {
      ctaTexts.push(text);
    }
  });

  return { ctaTexts };
}

function extractContactForm($: cheerio.CheerioAPI): ContactFormFacts {
  const forms = $("form");
  let found = false;

  forms.each((_, el) => {
    const $form = $(el);
    const inputs = $form.find("input:not([type='hidden']), textarea");
    const attributeText = inputs
      .map((_, input) => [$(input).attr("name"), $(input).attr("placeholder"), $(input).attr("type")].join(" "))
      .get()
      .join(" ");
    const formText = `${$form.text()} ${attributeText}`.toLowerCase();

    if (inputs.length >= 2 && FORM_KEYWORDS.some((keyword) => formText.includes(keyword))) {
      found = true;
      return false;
    }
  });

  return { found, formCount: forms.length };
}

function extractPhone($: cheerio.CheerioAPI, text: string): PhoneFacts {
  const telLinks = $("a[href^='tel:']");
  const numbers = findPhoneNumbers(text);

  // Icon-only tel: links carry the number in the href alone.
  if (numbers.length === 0) {
    telLinks.each((_, el) => {
      const number = ($(el).attr("href") || "").replace(/^tel:/, "").trim();
      if (number && !numbers.includes(number)) numbers.push(number);
    });
  }

  return {
    numbers: numbers.slice(0, MAX_REPORTED),
    clickable: telLinks.length > 0,
  };
}

function extractTeam($: cheerio.CheerioAPI, lowerText: string): TeamFacts {
  const sectionFound = $("section, div").filter((_, el) => TEAM_CLASS_PATTERN.test($(el).attr("class") || "")).length > 0;
  return { found: sectionFound || TEAM_KEYWORDS.some((keyword) => lowerText.includes(keyword)) };
}

function extractCredentials(text: string): CredentialFacts {
  return {
    credentials: CREDENTIAL_PATTERNS.filter(([, pattern]) => pattern.test(text)).map(([label]) => label),
  };
}

function extractMaps(html: string): MapsFacts {
  return { found: MAPS_PATTERN.test(html) };
}

function extractMetaDescription($: cheerio.CheerioAPI): MetaDescriptionFacts {
  const content = collapse($('meta[name="description"]').attr("content") || "");
  return { content: content || null };
}

function extractHeadings($: cheerio.CheerioAPI): HeadingFacts {
  return { h1Count: $("h1").length };
}

function extractFooterNap($: cheerio.CheerioAPI): FooterNapFacts {
  const $footer = $("footer, [role='contentinfo']").first();
  if ($footer.length === 0) {
    return { footerFound: false, phone: null, email: null, hasAddress: false };
  }

  const footerText = collapse($footer.text());
  const lower = footerText.toLowerCase();
  const emailMatch = footerText.match(EMAIL_PATTERN);

  return {
    footerFound: true,
    phone: findPhoneNumbers(footerText)[0] ?? null,
    email: emailMatch ? emailMatch[0] : null,
    hasAddress: ADDRESS_KEYWORDS.some((keyword) => lower.includes(keyword)),
  };
}

function extractPageStructure($: cheerio.CheerioAPI): PageStructureFacts {
  return {
    hasHeader: $("header, [role='banner']").length > 0,
    hasNav: $("nav, [role='navigation']").length > 0,
    hasFooter: $("footer, [role='contentinfo']").length > 0,
  };
}

function extractViewport($: cheerio.CheerioAPI): ViewportFacts {
  return { present: $('meta[name="viewport"]').length > 0 };
}

function unavailableMarkup(reason: string): MarkupSignals {
  return {
    title: null,
    pageStructure: absent(reason),
    conversion: { cta: absent(reason), contactForm: absent(reason), phone: absent(reason) },
    trust: { team: absent(reason), credentials: absent(reason), googleMaps: absent(reason) },
    seo: { metaDescription: absent(reason), headings: absent(reason), footerNap: absent(reason) },
    viewport: absent(reason),
  };
}

export function extractMarkupSignals(html: string): MarkupSignals {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (e) {
    return unavailableMarkup(`Page markup could not be parsed: ${errorMessage(e)}`);
  }

  const text = visibleText($);
  const lowerText = text.toLowerCase();
  const title = collapse($("title").first().text()) || null;

  return {
    title,
    pageStructure: guard("visual_design", "page_structure", () => extractPageStructure($)),
    conversion: {
      cta: guard("conversion", "clear_cta", () => extractCta($)),
      contactForm: guard("conversion", "contact_form", () => extractContactForm($)),
      phone: guard("conversion", "phone_number", () => extractPhone($, text)),
    },
    trust: {
      team: guard("trust", "team_info", () => extractTeam($, lowerText)),
      credentials: guard("trust", "credentials", () => extractCredentials(text)),
      googleMaps: guard("trust", "google_maps", () => extractMaps(html)),
    },
    seo: {
      metaDescription: guard("seo", "meta_description", () => extractMetaDescription($)),
      headings: guard("seo", "h1_heading", () => extractHeadings($)),
      footerNap: guard("seo", "footer_nap", () => extractFooterNap($)),
    },
    viewport: guard("technical", "viewport_meta", () => extractViewport($)),
  };
}
