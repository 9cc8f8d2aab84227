import { describe, expect, it } from "vitest";
import { isLoopbackHost, isOfflineSafeUrl } from "./offline-policy";

describe("isLoopbackHost", () => {
  it("accepts loopback names and the whole 127/8 range", () => {
    expect(isLoopbackHost("localhost")).toBe(true);
    expect(isLoopbackHost("LOCALHOST.")).toBe(true);
    expect(isLoopbackHost("127.4.5.6")).toBe(true);
    expect(isLoopbackHost("[::1]")).toBe(true);
    expect(isLoopbackHost("128.0.0.1")).toBe(false);
    expect(isLoopbackHost("localhost.example.com")).toBe(false);
  });
});

describe("isOfflineSafeUrl", () => {
  it("allows local files and loopback http only", () => {
    expect(isOfflineSafeUrl("http://127.0.0.1:11434/api/generate")).toBe(true);
    expect(isOfflineSafeUrl("https://[::1]:8443/")).toBe(true);
    expect(isOfflineSafeUrl("file:///tmp/report.pdf")).toBe(true);
    expect(isOfflineSafeUrl("https://www.google.com/search?q=cats")).toBe(false);
    expect(isOfflineSafeUrl("ftp://localhost/file")).toBe(false);
    expect(isOfflineSafeUrl("not a url")).toBe(false);
  });
});
