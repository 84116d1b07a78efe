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
  /^::1?$/,
  /^::ffff:/i,
  /^fe[89ab][0-9a-f]:/i,
  /^f[cd][0-9a-f]{2}:/i,
];

const BLOCKED_HOSTNAMES = new Set(["localhost", "localhost.localdomain"]);

// IPv6 literals keep their brackets in URL.hostname.
function unbracket(hostname: string): string {
  return hostname.startsWith("[") && hostname.endsWith("]") ? hostname.slice(1, -1) : hostname;
}

export function isPrivateIP(ip: string): boolean {
  return PRIVATE_IP_RANGES.some((regex) => regex.test(ip));
}

export function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase().replace(/\.$/, "");
  return BLOCKED_HOSTNAMES.has(lower) || lower.endsWith(".localhost") || lower.endsWith(".local");
}

export function resolveHostToIP(hostname: string): Promise<string[]> {
  return dns.promises
    .lookup(hostname, { all: true })
    .then((addresses) => addresses.map((a) => a.address))
    .catch(() => []);
}

export async function isSSRFSafe(urlString: string): Promise<{ safe: boolean; reason?: string }> {
  let parsed: URL;
  try {
    parsed = new URL(urlString);
  } catch (e) {
    return { safe: false, reason: `Invalid URL: ${e}` };
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { safe: false, reason: `Blocked protocol: ${parsed.protocol}` };
  }

  const host = unbracket(parsed.hostname);
  if (isBlockedHost(host)) {
    return { safe: false, reason: `Blocked host: ${host}` };
  }

  if (net.isIP(host)) {
    return isPrivateIP(host) ? { safe: false, reason: `Private IP blocked: ${host}` } : { safe: true };
  }

  const privateIp = (await resolveHostToIP(host)).find(isPrivateIP);
  if (privateIp) {
    return { safe: false, reason: `Hostname resolves to private IP: ${privateIp}` };
  }
  return { safe: true };
}

/**
 * Resolves an href against the page URL. Returns the absolute URL and its host;
 * hrefs that cannot be resolved come back verbatim with an empty host.
 */
export function resolveHref(href: string, baseUrl: string): { url: string; host: string } {
  try {
    const resolved = new URL(href, baseUrl);
    return { url: resolved.toString(), host: resolved.host };
  } catch {
    return { url: href, host: "" };
  }
}

export function getHost(urlString: string): string {
  try {
    return new URL(urlString).host;
  } catch {
    return "";
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

// "https://www.example.com/path" -> "EXAMPLE"
export function getSiteName(url: string): string {
  const domain = getHost(url) || url;
  return domain.replace(/www\./g, "").split(".")[0].toUpperCase();
}

export function isSecureUrl(url: string): boolean {
  return url.startsWith("https");
}
