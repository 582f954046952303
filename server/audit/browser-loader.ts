import { chromium } from "playwright-core";
import { z } from "zod";
import type { AuditLogger, LoadedPage, LoadOptions, PageLoader, RenderedFacts, Signal } from "./types";
import { LoadError, errorMessage } from "./errors";
import { classifyLoadFailure, loadErrorForStatus } from "./page-loader";
import { absent, present } from "./signal";
import { isSSRFSafe } from "./url-utils";

export const DESKTOP_VIEWPORT = { width: 1920, height: 1080 };
export const MOBILE_VIEWPORT = { width: 375, height: 812 };

const NETWORK_IDLE_GRACE_MS = 5000;

const MOBILE_METRICS_SCRIPT =
  "({ viewportWidth: window.innerWidth, contentWidth: document.documentElement.scrollWidth })";

const MobileMetricsSchema = z.object({
  viewportWidth: z.number(),
  contentWidth: z.number(),
});

/** The slice of playwright's Browser the loader drives. */
export interface RenderBrowser {
  newContext(options: {
    viewport: { width: number; height: number };
    userAgent: string;
    isMobile?: boolean;
    hasTouch?: boolean;
  }): Promise<RenderContext>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
  route(url: string, handler: (route: RenderRoute) => Promise<void>): Promise<void>;
  close(): Promise<void>;
}

export interface RenderRoute {
  request(): { url(): string };
  continue(): Promise<void>;
  abort(errorCode?: string): Promise<void>;
}

export interface RenderPage {
  goto(url: string, options: { waitUntil: "load"; timeout: number }): Promise<{ status(): number } | null>;
  waitForLoadState(state: "networkidle", options: { timeout: number }): Promise<void>;
  content(): Promise<string>;
  url(): string;
  screenshot(options: { fullPage: boolean; type: "png"; timeout: number }): Promise<Buffer>;
  evaluate(script: string): Promise<unknown>;
}

export interface BrowserPageLoaderOptions {
  userAgent: string;
  logger?: AuditLogger;
}

interface MobileCapture {
  screenshot: Signal<Buffer>;
  rendered: Signal<RenderedFacts>;
}

/** Milliseconds left before a fixed deadline, never negative. */
class Deadline {
  private readonly endsAt: number;

  constructor(budgetMs: number) {
    this.endsAt = Date.now() + budgetMs;
  }

  get remaining(): number {
    return Math.max(0, this.endsAt - Date.now());
  }
}

async function assertReachable(url: string): Promise<void> {
  const check = await isSSRFSafe(url);
  if (!check.safe) {
    throw new LoadError("blocked", `SSRF protection: ${check.reason}`);
  }
}

/**
 * Loads pages in a shared headless Chromium. Each load opens its own desktop
 * and mobile contexts and closes them before returning, so concurrent audits
 * never share cookies, storage or pages.
 *
 * Everything a load does, mobile render included, runs against one deadline
 * of `timeoutMs`. Only navigation failing is fatal; captures that run out of
 * time come back absent.
 */
export class BrowserPageLoader implements PageLoader {
  private readonly browser: RenderBrowser;
  private readonly userAgent: string;
  private readonly logger: AuditLogger;

  constructor(browser: RenderBrowser, { userAgent, logger = console }: BrowserPageLoaderOptions) {
    this.browser = browser;
    this.userAgent = userAgent;
    this.logger = logger;
  }

  /** Blocks redirects and subresources that point at private or local addresses. */
  private async guardRequests(context: RenderContext, url: string): Promise<void> {
    const verdicts = new Map<string, Promise<boolean>>();

    await context.route("**/*", async (route) => {
      const requestUrl = route.request().url();
      if (!/^https?:/i.test(requestUrl)) {
        await route.continue();
        return;
      }

      const host = new URL(requestUrl).host;
      let verdict = verdicts.get(host);
      if (!verdict) {
        verdict = isSSRFSafe(requestUrl).then((check) => check.safe);
        verdicts.set(host, verdict);
      }

      if (await verdict) {
        await route.continue();
      } else {
        this.logger.warn(`[browser] ${url}: blocked request to ${requestUrl}`);
        await route.abort("blockedbyclient");
      }
    });
  }

  private async openContext(
    url: string,
    signal: AbortSignal | undefined,
    options: Parameters<RenderBrowser["newContext"]>[0]
  ): Promise<{ context: RenderContext; release: () => Promise<void> }> {
    const context = await this.browser.newContext(options);
    await this.guardRequests(context, url);

    let closed: Promise<void> | null = null;
    const close = (): Promise<void> => {
      if (!closed) {
        closed = context.close().catch((e: unknown) => {
          this.logger.warn(`[browser] ${url}: closing context failed: ${errorMessage(e)}`);
        });
      }
      return closed;
    };
    // The orchestrator gave up on this load; stop navigating right away.
    const onAbort = () => {
      void close();
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    return {
      context,
      release: async () => {
        signal?.removeEventListener("abort", onAbort);
        await close();
      },
    };
  }

  private async settle(page: RenderPage, url: string, deadline: Deadline): Promise<void> {
    // Leave at least half of what is left for the screenshots.
    const timeout = Math.min(NETWORK_IDLE_GRACE_MS, Math.floor(deadline.remaining / 2));
    if (timeout <= 0) return;

    await page.waitForLoadState("networkidle", { timeout }).catch((e: unknown) => {
      this.logger.warn(`[browser] ${url} did not reach network idle: ${errorMessage(e)}`);
    });
  }

  async load(url: string, { timeoutMs, signal }: LoadOptions): Promise<LoadedPage> {
    const deadline = new Deadline(timeoutMs);
    await assertReachable(url);

    const { context, release } = await this.openContext(url, signal, {
      viewport: DESKTOP_VIEWPORT,
      userAgent: this.userAgent,
    });

    try {
      const page = await context.newPage();
      const startedAt = Date.now();

      let statusCode = 200;
      try {
        const response = await page.goto(url, { waitUntil: "load", timeout: Math.max(1, deadline.remaining) });
        statusCode = response?.status() ?? 200;
      } catch (e) {
        throw classifyLoadFailure(signal?.aborted ? signal.reason : e, timeoutMs);
      }
      const loadTimeMs = Date.now() - startedAt;

      const finalUrl = page.url();
      await assertReachable(finalUrl);

      const statusError = loadErrorForStatus(statusCode);
      if (statusError) throw statusError;

      await this.settle(page, url, deadline);
      const html = await page.content();

      let desktop: Signal<Buffer>;
      if (deadline.remaining <= 0) {
        desktop = absent("page load used the whole time budget before the desktop screenshot");
      } else {
        try {
          desktop = present(await page.screenshot({ fullPage: true, type: "png", timeout: Math.max(1, deadline.remaining) }));
        } catch (e) {
          desktop = absent(`desktop screenshot failed: ${errorMessage(e)}`);
        }
      }
      if (desktop.status === "absent") {
        this.logger.warn(`[browser] ${url}: ${desktop.reason}`);
      }

      const mobile = await this.captureMobile(url, deadline, signal);

      return {
        url,
        finalUrl,
        statusCode,
        html,
        loadTimeMs,
        screenshots: { desktop, mobile: mobile.screenshot },
        rendered: mobile.rendered,
      };
    } finally {
      await release();
    }
  }

  private async captureMobile(url: string, deadline: Deadline, signal: AbortSignal | undefined): Promise<MobileCapture> {
    if (deadline.remaining <= 0 || signal?.aborted) {
      const reason = "no time left for the mobile render";
      this.logger.warn(`[browser] ${url}: ${reason}`);
      return { screenshot: absent(reason), rendered: absent(reason) };
    }

    const { context, release } = await this.openContext(url, signal, {
      viewport: MOBILE_VIEWPORT,
      isMobile: true,
      hasTouch: true,
      userAgent: this.userAgent,
    });

    try {
      const page = await context.newPage();
      await page.goto(url, { waitUntil: "load", timeout: Math.max(1, deadline.remaining) });
      await this.settle(page, url, deadline);

      const screenshot = await page.screenshot({ fullPage: false, type: "png", timeout: Math.max(1, deadline.remaining) });
      const metrics = MobileMetricsSchema.parse(await page.evaluate(MOBILE_METRICS_SCRIPT));

      return {
        screenshot: present(screenshot),
        rendered: present({
          mobileLayout: {
            horizontalOverflow: metrics.contentWidth > metrics.viewportWidth,
            viewportWidth: metrics.viewportWidth,
            contentWidth: metrics.contentWidth,
          },
        }),
      };
    } catch (e) {
      const reason = `mobile rendering failed: ${errorMessage(e)}`;
      this.logger.warn(`[browser] ${url}: ${reason}`);
      return { screenshot: absent(reason), rendered: absent(reason) };
    } finally {
      await release();
    }
  }
}

export interface BrowserHandle {
  loader: BrowserPageLoader;
  close(): Promise<void>;
}

export async function launchBrowserLoader(options: BrowserPageLoaderOptions & { executablePath?: string }): Promise<BrowserHandle> {
  const browser = await chromium.launch({
    headless: true,
    executablePath: options.executablePath,
    args: ["--no-sandbox", "--disable-setuid-sandbox"],
  });

  return {
    loader: new BrowserPageLoader(browser, options),
    close: () => browser.close(),
  };
}
