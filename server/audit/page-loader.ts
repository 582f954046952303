import type { LoadedPage, LoadOptions, PageLoader } from "./types";
import { LoadError, errorMessage } from "./errors";
import { absent } from "./signal";
import { isSSRFSafe } from "./url-utils";

const MAX_REDIRECTS = 5;

const BLOCKED_STATUSES = new Set([401, 403, 429, 451]);

const CONNECTION_FAILURE_PATTERN =
  /ENOTFOUND|EAI_AGAIN|ECONNREFUSED|ECONNRESET|EHOSTUNREACH|ENETUNREACH|ERR_NAME_NOT_RESOLVED|ERR_CONNECTION|ERR_ADDRESS_UNREACHABLE|ERR_CERT|ERR_SSL|CERT_|certificate/i;

function causeCode(error: unknown): string | null {
  if (typeof error !== "object" || error === null) return null;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error) return causeCode(error.cause);
  return null;
}

export function loadErrorForStatus(statusCode: number): LoadError | null {
  if (BLOCKED_STATUSES.has(statusCode)) {
    return new LoadError("blocked", `Access to the site was blocked (HTTP ${statusCode})`, statusCode);
  }
  if (statusCode >= 400) {
    return new LoadError("http_error", `The site returned HTTP ${statusCode}`, statusCode);
  }
  return null;
}

/**
 * Translates whatever a loader threw into a LoadError whose message tells a
 * reader whether the site timed out, refused us, or could not be reached.
 */
export function classifyLoadFailure(error: unknown, timeoutMs: number): LoadError {
  if (error instanceof LoadError) return error;

  const name = error instanceof Error ? error.name : "";
  const message = errorMessage(error);
  const code = causeCode(error);

  if (name === "AbortError" || name === "TimeoutError" || /timeout|timed out/i.test(message)) {
    return new LoadError("timeout", `Page load timed out after ${Math.round(timeoutMs / 100) / 10}s`);
  }

  const detail = code ?? message;
  if (CONNECTION_FAILURE_PATTERN.test(detail) || CONNECTION_FAILURE_PATTERN.test(message)) {
    return new LoadError("connection", `Could not resolve or connect to the site (${detail})`);
  }

  return new LoadError("connection", `Page could not be loaded: ${message}`);
}

export interface FetchPageLoaderOptions {
  userAgent: string;
}

/**
 * Plain HTTP loader. It sees the served markup only: no screenshots and no
 * rendered-layout facts, so design checks that need them come back absent.
 */
export class FetchPageLoader implements PageLoader {
  private readonly userAgent: string;

  constructor({ userAgent }: FetchPageLoaderOptions) {
    this.userAgent = userAgent;
  }

  async load(url: string, { timeoutMs, signal }: LoadOptions): Promise<LoadedPage> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const startedAt = Date.now();

    try {
      let currentUrl = url;
      let redirectCount = 0;

      while (redirectCount <= MAX_REDIRECTS) {
        const ssrfCheck = await isSSRFSafe(currentUrl);
        if (!ssrfCheck.safe) {
          throw new LoadError("blocked", `SSRF protection: ${ssrfCheck.reason}`);
        }

        const response = await fetch(currentUrl, {
          signal: controller.signal,
          headers: {
            "User-Agent": this.userAgent,
            Accept: "text/html,application/xhtml+xml",
          },
          redirect: "manual",
        });

        if (response.status >= 300 && response.status < 400) {
          const location = response.headers.get("location");
          if (!location) {
            throw new LoadError("http_error", "Redirect without location header", response.status);
          }
          currentUrl = new URL(location, currentUrl).toString();
          redirectCount++;
          continue;
        }

        const statusError = loadErrorForStatus(response.status);
        if (statusError) throw statusError;

        const contentType = response.headers.get("content-type") || "";
        if (!contentType.includes("text/html") && !contentType.includes("application/xhtml")) {
          throw new LoadError("http_error", `Non-HTML content type: ${contentType || "unknown"}`, response.status);
        }

        const html = await response.text();
        const reason = "the fetch renderer does not render pages or capture screenshots";

        return {
          url,
          finalUrl: currentUrl,
          statusCode: response.status,
          html,
          loadTimeMs: Date.now() - startedAt,
          screenshots: { desktop: absent(reason), mobile: absent(reason) },
          rendered: absent(reason),
        };
      }

      throw new LoadError("http_error", "Too many redirects");
    } catch (e) {
      throw classifyLoadFailure(e, timeoutMs);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
