import { createHash } from "node:crypto";
import type {
  HeaderMap,
  InboundRequest,
  Interaction,
  RecordedRequest,
  StoredInteraction,
} from "./types.js";

export const hopByHopHeaders = new Set([
  "connection",
  "content-length",
  "host",
  "keep-alive",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

/**
 * Playback lookup key: SHA-256 over method, url and body, hex encoded.
 * Headers are left out so recordings survive a change of HTTP client.
 */
export const fingerprint = (
  request: Pick<RecordedRequest, "method" | "url" | "body">
): string => {
  const hash = createHash("sha256");
  hash.update(request.method);
  hash.update(request.url);
  if (request.body) {
    hash.update(request.body);
  }
  return hash.digest("hex");
};

/** Canonical snapshot of an inbound request, shared by recorder and player. */
export const toRecordedRequest = (inbound: InboundRequest): RecordedRequest => {
  const headers: HeaderMap = {};
  for (const [key, values] of Object.entries(inbound.headers)) {
    if (key.toLowerCase() !== "host") {
      headers[key] = [...values];
    }
  }

  return {
    method: inbound.method.toUpperCase(),
    url: inbound.target,
    headers,
    body: inbound.body && inbound.body.length > 0 ? inbound.body : undefined,
  };
};

export const headersFromIncoming = (
  headers: Record<string, string | string[] | undefined>
): HeaderMap => {
  const result: HeaderMap = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      result[key] = [value];
    } else if (Array.isArray(value) && value.length > 0) {
      result[key] = [...value];
    }
  }
  return result;
};

export const headersFromFetch = (headers: Headers): HeaderMap => {
  const result: HeaderMap = {};
  headers.forEach((value, key) => {
    const existing = result[key];
    if (existing) {
      existing.push(value);
    } else {
      result[key] = [value];
    }
  });

  // fetch hands back decoded bodies, so the encoding headers no longer apply.
  if (result["content-encoding"]) {
    delete result["content-encoding"];
    delete result["content-length"];
  }
  return result;
};

export const toOutboundHeaders = (headers: HeaderMap): Array<[string, string]> => {
  const result: Array<[string, string]> = [];
  for (const [key, values] of Object.entries(headers)) {
    if (hopByHopHeaders.has(key.toLowerCase())) {
      continue;
    }
    for (const value of values) {
      result.push([key, value]);
    }
  }
  return result;
};

const encodeBody = (body: Buffer | undefined): string | undefined =>
  body && body.length > 0 ? body.toString("base64") : undefined;

const decodeBody = (body: string | undefined): Buffer | undefined =>
  body && body.length > 0 ? Buffer.from(body, "base64") : undefined;

export const serializeInteraction = (interaction: Interaction): StoredInteraction => ({
  id: interaction.id,
  timestamp: interaction.timestamp,
  request: {
    method: interaction.request.method,
    url: interaction.request.url,
    headers: interaction.request.headers,
    body: encodeBody(interaction.request.body),
  },
  response: {
    status_code: interaction.response.statusCode,
    headers: interaction.response.headers,
    body: encodeBody(interaction.response.body),
  },
  metadata: {
    target: interaction.metadata.target,
    duration_ms: interaction.metadata.durationMs,
  },
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (source: Record<string, unknown>, key: string, path: string): string => {
  const value = source[key];
  if (typeof value !== "string") {
    throw new TypeError(`${path}.${key} must be a string`);
  }
  return value;
};

const readNumber = (source: Record<string, unknown>, key: string, path: string): number => {
  const value = source[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`${path}.${key} must be a number`);
  }
  return value;
};

const readOptionalString = (
  source: Record<string, unknown>,
  key: string,
  path: string
): string | undefined => {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new TypeError(`${path}.${key} must be a string`);
  }
  return value;
};

const readObject = (
  source: Record<string, unknown>,
  key: string,
  path: string
): Record<string, unknown> => {
  const value = source[key];
  if (!isRecord(value)) {
    throw new TypeError(`${path}.${key} must be an object`);
  }
  return value;
};

const readHeaders = (source: Record<string, unknown>, path: string): HeaderMap => {
  const value = source.headers;
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new TypeError(`${path}.headers must be an object`);
  }

  const headers: HeaderMap = {};
  for (const [key, values] of Object.entries(value)) {
    if (!Array.isArray(values) || !values.every((item) => typeof item === "string")) {
      throw new TypeError(`${path}.headers.${key} must be a list of strings`);
    }
    headers[key] = values.filter((item): item is string => typeof item === "string");
  }
  return headers;
};

/** Reads the stored JSON form back into an Interaction, checking its shape. */
export const parseInteraction = (value: unknown): Interaction => {
  if (!isRecord(value)) {
    throw new TypeError("interaction must be an object");
  }

  const request = readObject(value, "request", "interaction");
  const response = readObject(value, "response", "interaction");
  const metadata = readObject(value, "metadata", "interaction");

  return {
    id: readString(value, "id", "interaction"),
    timestamp: readString(value, "timestamp", "interaction"),
    request: {
      method: readString(request, "method", "request"),
      url: readString(request, "url", "request"),
      headers: readHeaders(request, "request"),
      body: decodeBody(readOptionalString(request, "body", "request")),
    },
    response: {
      statusCode: readNumber(response, "status_code", "response"),
      headers: readHeaders(response, "response"),
      body: decodeBody(readOptionalString(response, "body", "response")),
    },
    metadata: {
      target: readString(metadata, "target", "metadata"),
      durationMs: readNumber(metadata, "duration_ms", "metadata"),
    },
  };
};
