import type { HeaderMap } from "./types.js";

export const REDACTION_TOKEN = "[REDACTED]";

const sensitiveHeaderPatterns = [
  /authorization/i,
  /cookie/i,
  /token/i,
  /api[-_]?key/i,
  /secret/i,
];

export const isSensitiveHeader = (name: string): boolean =>
  sensitiveHeaderPatterns.some((pattern) => pattern.test(name));

export const redactHeaders = (headers: HeaderMap): HeaderMap => {
  const result: HeaderMap = {};

  for (const [key, values] of Object.entries(headers)) {
    result[key] = isSensitiveHeader(key) ? values.map(() => REDACTION_TOKEN) : [...values];
  }

  return result;
};
