import type { AuditLogger, DesignJudgment, LoadedPage, PageLoader, SiteSignals, VisionJudge } from "./types";
import { LoadError } from "./errors";
import { absent, present } from "./signal";

export const silentLogger: AuditLogger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const goodJudgment: DesignJudgment = {
  rating: 8,
  assessment: "Clean, modern layout.",
  issues: [],
  strengths: ["Clear navigation"],
};

/** A site that passes every check: 26 + 25 + 20 + 15 + 10 = 96. */
export function passingSignals(): SiteSignals {
  return {
    url: "https://example-cpa.com/",
    finalUrl: "https://example-cpa.com/",
    title: "Example CPA",
    visual: {
      designJudgment: present(goodJudgment),
      mobileLayout: present({ horizontalOverflow: false, viewportWidth: 375, contentWidth: 375 }),
      pageStructure: present({ hasHeader: true, hasNav: true, hasFooter: true }),
    },
    conversion: {
      cta: present({ ctaTexts: ["Schedule a Consultation"] }),
      contactForm: present({ found: true, formCount: 1 }),
      phone: present({ numbers: ["(555) 123-4567"], clickable: true }),
    },
    trust: {
      team: present({ found: true }),
      credentials: present({ credentials: ["CPA"] }),
      googleMaps: present({ found: true }),
    },
    seo: {
      metaDescription: present({ content: "Tax and bookkeeping for small businesses" }),
      headings: present({ h1Count: 1 }),
      footerNap: present({ footerFound: true, phone: "(555) 123-4567", email: null, hasAddress: true }),
    },
    technical: {
      loadTime: present({ seconds: 1.2 }),
      viewport: present({ present: true }),
    },
  };
}

/** Markup that passes every markup-derived check. */
export const PASSING_HTML = `<!doctype html>
<html>
<head>
  <title>Example CPA</title>
  <meta name="description" content="Tax and bookkeeping for small businesses">
  <meta name="viewport" content="width=device-width, initial-scale=1">
</head>
<body>
  <header><nav><a href="/about">About</a></nav></header>
  <h1>Example CPA</h1>
  <a class="btn btn-primary" href="/book">Schedule a Consultation</a>
  <section class="team"><p>Our team of licensed CPAs</p></section>
  <form>
    <input name="name" type="text">
    <input name="email" type="email">
    <textarea name="message"></textarea>
  </form>
  <iframe src="https://maps.google.com/maps?q=example"></iframe>
  <footer>
    <p>100 Main Street, Suite 2</p>
    <p><a href="tel:5551234567">(555) 123-4567</a></p>
  </footer>
</body>
</html>`;

export function loadedPage(overrides: Partial<LoadedPage> = {}): LoadedPage {
  return {
    url: "https://example-cpa.com/",
    finalUrl: "https://example-cpa.com/",
    statusCode: 200,
    html: PASSING_HTML,
    loadTimeMs: 1200,
    screenshots: { desktop: present(Buffer.from("desktop")), mobile: present(Buffer.from("mobile")) },
    rendered: present({ mobileLayout: { horizontalOverflow: false, viewportWidth: 375, contentWidth: 375 } }),
    ...overrides,
  };
}

export class FakeLoader implements PageLoader {
  readonly calls: string[] = [];

  constructor(private readonly respond: (url: string) => Promise<LoadedPage> | LoadedPage = () => loadedPage()) {}

  async load(url: string): Promise<LoadedPage> {
    this.calls.push(url);
    return this.respond(url);
  }
}

export class FakeJudge implements VisionJudge {
  constructor(private readonly respond: () => Promise<DesignJudgment> | DesignJudgment = () => goodJudgment) {}

  async judge(): Promise<DesignJudgment> {
    return this.respond();
  }
}

export function unreachable(message = "Could not resolve or connect to the site (ENOTFOUND)"): never {
  throw new LoadError("connection", message);
}

export function withoutScreenshots(reason: string): Pick<LoadedPage, "screenshots" | "rendered"> {
  return { screenshots: { desktop: absent(reason), mobile: absent(reason) }, rendered: absent(reason) };
}
