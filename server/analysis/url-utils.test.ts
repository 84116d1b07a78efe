import { describe, expect, it } from "vitest";
import {
  getDomainFromUrl,
  getHost,
  getSiteName,
  isBlockedHost,
  isPrivateIP,
  isSSRFSafe,
  isSecureUrl,
  resolveHref,
} from "./url-utils";

describe("resolveHref", () => {
  it("resolves path, scheme-relative and absolute references", () => {
    expect(resolveHref("/about", "https://example.com/")).toEqual({
      url: "https://example.com/about",
      host: "example.com",
    });
    expect(resolveHref("//cdn.example.com/a.js", "https://example.com/")).toEqual({
      url: "https://cdn.example.com/a.js",
      host: "cdn.example.com",
    });
    expect(resolveHref("https://other.com/x", "https://example.com/")).toEqual({
      url: "https://other.com/x",
      host: "other.com",
    });
  });

  it("gives host-less schemes an empty host", () => {
    expect(resolveHref("javascript:void(0)", "https://example.com/")).toEqual({
      url: "javascript:void(0)",
      host: "",
    });
  });

  it("returns unresolvable hrefs verbatim", () => {
    expect(resolveHref("http://[bad", "https://example.com/")).toEqual({ url: "http://[bad", host: "" });
  });
});

describe("site naming", () => {
  it("derives an upper-case site name", () => {
    expect(getSiteName("https://www.example.com/path")).toBe("EXAMPLE");
    expect(getSiteName("example.org")).toBe("EXAMPLE");
  });

  it("normalizes the domain used for history", () => {
    expect(getDomainFromUrl("https://WWW.Example.com./page")).toBe("example.com");
    expect(getHost("not a url")).toBe("");
  });

  it("checks the https prefix", () => {
    expect(isSecureUrl("https://example.com")).toBe(true);
    expect(isSecureUrl("http://example.com")).toBe(false);
  });
});

describe("SSRF guard", () => {
  it("recognises private ranges and blocked hosts", () => {
    expect(isPrivateIP("10.1.2.3")).toBe(true);
    expect(isPrivateIP("172.20.0.1")).toBe(true);
    expect(isPrivateIP("8.8.8.8")).toBe(false);
    expect(isBlockedHost("LOCALHOST")).toBe(true);
    expect(isBlockedHost("printer.local")).toBe(true);
    expect(isBlockedHost("example.com")).toBe(false);
    expect(isBlockedHost("api.localhost")).toBe(true);
    expect(isPrivateIP("::1")).toBe(true);
    expect(isPrivateIP("fd12:3456::1")).toBe(true);
    expect(isPrivateIP("2606:4700::1111")).toBe(false);
  });

  it("checks bracketed IPv6 literals against the private ranges", async () => {
    expect(await isSSRFSafe("http://[::1]:8080/")).toEqual({ safe: false, reason: "Private IP blocked: ::1" });
    expect(await isSSRFSafe("http://[fe80::1]/")).toEqual({ safe: false, reason: "Private IP blocked: fe80::1" });
    expect(await isSSRFSafe("http://[::ffff:127.0.0.1]/")).toEqual({
      safe: false,
      reason: "Private IP blocked: ::ffff:7f00:1",
    });
    expect(await isSSRFSafe("https://[2606:4700::1111]/")).toEqual({ safe: true });
  });

  it("rejects unsupported protocols, blocked hosts and private IPs", async () => {
    expect(await isSSRFSafe("ftp://example.com/")).toEqual({ safe: false, reason: "Blocked protocol: ftp:" });
    expect(await isSSRFSafe("http://localhost:3000/")).toEqual({ safe: false, reason: "Blocked host: localhost" });
    expect(await isSSRFSafe("http://192.168.1.10/")).toEqual({
      safe: false,
      reason: "Private IP blocked: 192.168.1.10",
    });
    expect((await isSSRFSafe("not a url")).safe).toBe(false);
  });

  it("accepts public IP literals without a DNS lookup", async () => {
    expect(await isSSRFSafe("https://93.184.216.34/")).toEqual({ safe: true });
  });
});
