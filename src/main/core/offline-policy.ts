const LOOPBACK_NAMES = new Set(["localhost", "ip6-localhost", "::1", "[::1]"]);

const IPV4_LOOPBACK = /^127(?:\.\d{1,3}){3}$/;

/** Names that reach this machine without a DNS lookup. */
export const isLoopbackHost = (hostname: string): boolean => {
  const host = hostname.trim().toLowerCase().replace(/\.$/, "");
  return LOOPBACK_NAMES.has(host) || IPV4_LOOPBACK.test(host);
};

/**
 * Under strict offline a URL may only be opened when it cannot leave the machine:
 * local files, or http(s) on a loopback host.
 */
export const isOfflineSafeUrl = (rawUrl: string): boolean => {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return false;
  }

  switch (parsed.protocol) {
    case "file:":
      return true;
    case "http:":
    case "https:":
      return isLoopbackHost(parsed.hostname);
    default:
      return false;
  }
};
