import { URL } from "url";
import * as dns from "dns";
import * as net from "net";

const PRIVATE_IP_RANGES = [
  /^127\./,
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[01])\./,
  /^192\.168\./,
  /^169\.254\./,
  /^0\./,
  /^::1$/,
  /^fe80:/i,
  /^fc00:/i,
  /^fd00:/i,
];

const BLOCKED_HOSTS = [
  "localhost",
  "127.0.0.1",
  "0.0.0.0",
  "::1",
  "[::1]",
];

const DEFAULT_SCHEME = "https://";

export function isPrivateIP(ip: string): boolean {
  return PRIVATE_IP_RANGES.some((regex) => regex.test(ip));
}

export function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase();
  return BLOCKED_HOSTS.includes(lower) || lower.endsWith(".local");
}

export async function resolveHostToIP(hostname: string): Promise<string[]> {
  return new Promise((resolve) => {
    dns.lookup(hostname, { all: true }, (err, addresses) => {
      if (err) {
        resolve([]);
      } else {
        resolve(addresses.map((a) => a.address));
      }
    });
  });
}

export async function isSSRFSafe(urlString: string): Promise<{ safe: boolean; reason?: string }> {
  try {
    const parsed = new URL(urlString);

    if (!["http:", "https:"].includes(parsed.protocol)) {
      return { safe: false, reason: `Blocked protocol: ${parsed.protocol}` };
    }

    if (isBlockedHost(parsed.hostname)) {
      return { safe: false, reason: `Blocked host: ${parsed.hostname}` };
    }

    if (net.isIP(parsed.hostname)) {
      if (isPrivateIP(parsed.hostname)) {
        return { safe: false, reason: `Private IP blocked: ${parsed.hostname}` };
      }
    } else {
      const ips = await resolveHostToIP(parsed.hostname);
      for (const ip of ips) {
        if (isPrivateIP(ip)) {
          return { safe: false, reason: `Hostname resolves to private IP: ${ip}` };
        }
      }
    }

    return { safe: true };
  } catch (e) {
    return { safe: false, reason: `Invalid URL: ${e}` };
  }
}

export function hasScheme(input: string): boolean {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(input);
}

/**
 * Trims the input, prepends https:// when no scheme is given and drops the
 * fragment. Returns null when the result still is not a usable http(s) URL.
 */
export function normalizeTargetUrl(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;

  const withScheme = hasScheme(trimmed) ? trimmed : `${DEFAULT_SCHEME}${trimmed}`;

  try {
    const url = new URL(withScheme);
    if (!["http:", "https:"].includes(url.protocol) || !url.hostname.includes(".")) {
      return null;
    }
    url.hash = "";
    return url.toString();
  } catch {
    return null;
  }
}

export function getDomainFromUrl(url: string): string {
  try {
    const hostname = new URL(url).hostname.toLowerCase().replace(/\.$/, "");
    return hostname.startsWith("www.") ? hostname.slice(4) : hostname;
  } catch {
    return url.toLowerCase().replace(/\.$/, "");
  }
}

/**
 * Filesystem-safe key for one page: the domain, plus its path and query when
 * it is not the homepage, so two pages of one site never share a file name.
 */
export function pageSlug(url: string): string {
  let rest = "";
  try {
    const parsed = new URL(url);
    rest = `${parsed.pathname}${parsed.search}`.replace(/\/+$/, "");
  } catch {
    rest = "";
  }
  return `${getDomainFromUrl(url)}${rest}`
    .replace(/[^A-Za-z0-9.-]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 150);
}

/** Domain of a target as typed by a user, scheme optional. */
export function targetDomain(input: string): string {
  return getDomainFromUrl(normalizeTargetUrl(input) ?? input.trim());
}
