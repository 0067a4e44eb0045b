const protocolPattern = /^https?:\/\//;

/**
 * Turns the `target` query value into the URL the recorder forwards to.
 * Targets without a scheme default to https. Query strings are re-encoded
 * with sorted keys, since the value arrives already decoded.
 */
export const resolveTargetUrl = (target: string): URL => {
  const url = new URL(protocolPattern.test(target) ? target : `https://${target}`);
  if (url.search.length > 0) {
    url.searchParams.sort();
  }
  return url;
};

/** Directory a target's recordings live in: its host with separators as `_`. */
export const serviceDirectoryName = (target: string): string => {
  const host = target.replace(protocolPattern, "").split("/")[0];
  if (host.length === 0) {
    return "unknown";
  }
  return host.replace(/[^A-Za-z0-9_-]/g, "_");
};
