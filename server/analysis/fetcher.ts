import { FetchError } from "./types";
import type { FetchOutcome } from "./types";
import { isSSRFSafe } from "./url-utils";

const MAX_REDIRECTS = 5;

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  blockPrivateHosts?: boolean;
}

function isAbortError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "name" in e && (e.name === "AbortError" || e.name === "TimeoutError");
}

/**
 * Single GET of `url`. Anything but a final 200 is a failure; there are no
 * retries and no partial results.
 */
export async function fetchPage(url: string, options: FetchOptions): Promise<FetchOutcome> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  const start = performance.now();

  try {
    let currentUrl = url;
    let redirectCount = 0;

    while (redirectCount <= MAX_REDIRECTS) {
      if (options.blockPrivateHosts) {
        const ssrfCheck = await isSSRFSafe(currentUrl);
        if (!ssrfCheck.safe) {
          return { error: new FetchError("blocked", `SSRF protection: ${ssrfCheck.reason}`) };
        }
      }

      const response = await fetch(currentUrl, {
        signal: controller.signal,
        headers: {
          "User-Agent": options.userAgent,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        },
        redirect: "manual",
      });

      if (response.status >= 300 && response.status < 400) {
        await response.body?.cancel();
        const location = response.headers.get("location");
        if (!location) {
          return { error: new FetchError("status", "Redirect without location header", response.status) };
        }

        currentUrl = new URL(location, currentUrl).toString();
        redirectCount++;
        continue;
      }

      if (response.status !== 200) {
        return {
          error: new FetchError("status", `Unexpected HTTP status ${response.status}`, response.status),
        };
      }

      const html = await response.text();
      const loadTimeSeconds = (performance.now() - start) / 1000;
      return { page: { html, statusCode: response.status, loadTimeSeconds } };
    }

    return { error: new FetchError("network", "Too many redirects") };
  } catch (e) {
    if (isAbortError(e)) {
      return { error: new FetchError("timeout", `Request timeout after ${options.timeoutMs}ms`) };
    }
    return { error: new FetchError("network", e instanceof Error ? e.message : "Unknown fetch error") };
  } finally {
    clearTimeout(timeoutId);
  }
}
