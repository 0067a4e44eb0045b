import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse } from "yaml";
import { ConfigError, errorMessage } from "./errors.js";
import { isProxyMode } from "./modeController.js";
import type { ProxyMode } from "./types.js";

export interface ProxyConfig {
  server: {
    host: string;
    port: number;
    bodyLimit: number;
  };
  storage: {
    path: string;
    redactRequestHeaders: boolean;
  };
  mode: {
    default: ProxyMode;
  };
  upstream: {
    timeoutMs: number;
  };
  logLevel: string;
}

const CONFIG_FILE_NAMES = [
  "proxy.yaml",
  "proxy.yml",
  "proxy.json",
  "config.yaml",
  "config.json",
];

export const defaultConfig = (): ProxyConfig => ({
  server: { host: "0.0.0.0", port: 8099, bodyLimit: 10 * 1024 * 1024 },
  storage: { path: "./recordings", redactRequestHeaders: false },
  mode: { default: "playback" },
  upstream: { timeoutMs: 30_000 },
  logLevel: "info",
});

type Section = Record<string, unknown>;

const isSection = (value: unknown): value is Section =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const section = (source: Section, key: string, origin: string): Section => {
  const value = source[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isSection(value)) {
    throw new ConfigError(`${origin}: "${key}" must be a mapping`);
  }
  return value;
};

const toInteger = (
  value: unknown,
  name: string,
  origin: string,
  min: number,
  max: number
): number => {
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`${origin}: ${name} must be an integer between ${min} and ${max}`);
  }
  return parsed;
};

const toBoolean = (value: unknown, name: string, origin: string): boolean => {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true" || value === "false") {
    return value === "true";
  }
  throw new ConfigError(`${origin}: ${name} must be true or false`);
};

const toText = (value: unknown, name: string, origin: string): string => {
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${origin}: ${name} must be a non-empty string`);
  }
  return value;
};

const toMode = (value: unknown, name: string, origin: string): ProxyMode => {
  if (!isProxyMode(value)) {
    throw new ConfigError(
      `${origin}: ${name} must be 'record' or 'playback', got ${JSON.stringify(value)}`
    );
  }
  return value;
};

const readConfigFile = (cwd: string): { origin: string; document: Section } | undefined => {
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = join(cwd, fileName);
    if (!existsSync(filePath)) {
      continue;
    }

    let document: unknown;
    try {
      document = parse(readFileSync(filePath, "utf8"));
    } catch (error) {
      throw new ConfigError(`Failed to parse ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (document === null || document === undefined) {
      return { origin: filePath, document: {} };
    }
    if (!isSection(document)) {
      throw new ConfigError(`${filePath}: top level must be a mapping`);
    }
    return { origin: filePath, document };
  }
  return undefined;
};

const applyFile = (config: ProxyConfig, origin: string, document: Section): void => {
  const server = section(document, "server", origin);
  const storage = section(document, "storage", origin);
  const mode = section(document, "mode", origin);
  const upstream = section(document, "upstream", origin);

  if (server.host !== undefined) {
    config.server.host = toText(server.host, "server.host", origin);
  }
  if (server.port !== undefined) {
    config.server.port = toInteger(server.port, "server.port", origin, 0, 65535);
  }
  if (server.body_limit !== undefined) {
    config.server.bodyLimit = toInteger(
      server.body_limit,
      "server.body_limit",
      origin,
      1,
      Number.MAX_SAFE_INTEGER
    );
  }
  if (storage.path !== undefined) {
    config.storage.path = toText(storage.path, "storage.path", origin);
  }
  if (storage.redact_request_headers !== undefined) {
    config.storage.redactRequestHeaders = toBoolean(
      storage.redact_request_headers,
      "storage.redact_request_headers",
      origin
    );
  }
  if (mode.default !== undefined) {
    config.mode.default = toMode(mode.default, "mode.default", origin);
  }
  if (upstream.timeout_ms !== undefined) {
    config.upstream.timeoutMs = toInteger(
      upstream.timeout_ms,
      "upstream.timeout_ms",
      origin,
      1,
      Number.MAX_SAFE_INTEGER
    );
  }
  if (document.log_level !== undefined) {
    config.logLevel = toText(document.log_level, "log_level", origin);
  }
};

const applyEnv = (config: ProxyConfig, env: NodeJS.ProcessEnv): void => {
  const origin = "environment";

  if (env.PROXY_HOST) {
    config.server.host = env.PROXY_HOST;
  }
  if (env.PROXY_PORT) {
    config.server.port = toInteger(env.PROXY_PORT, "PROXY_PORT", origin, 0, 65535);
  }
  if (env.PROXY_BODY_LIMIT) {
    config.server.bodyLimit = toInteger(
      env.PROXY_BODY_LIMIT,
      "PROXY_BODY_LIMIT",
      origin,
      1,
      Number.MAX_SAFE_INTEGER
    );
  }
  if (env.PROXY_RECORDINGS_DIR) {
    config.storage.path = env.PROXY_RECORDINGS_DIR;
  }
  if (env.PROXY_REDACT_REQUEST_HEADERS) {
    config.storage.redactRequestHeaders = toBoolean(
      env.PROXY_REDACT_REQUEST_HEADERS,
      "PROXY_REDACT_REQUEST_HEADERS",
      origin
    );
  }
  if (env.PROXY_MODE) {
    config.mode.default = toMode(env.PROXY_MODE, "PROXY_MODE", origin);
  }
  if (env.PROXY_UPSTREAM_TIMEOUT_MS) {
    config.upstream.timeoutMs = toInteger(
      env.PROXY_UPSTREAM_TIMEOUT_MS,
      "PROXY_UPSTREAM_TIMEOUT_MS",
      origin,
      1,
      Number.MAX_SAFE_INTEGER
    );
  }
  if (env.PROXY_LOG_LEVEL) {
    config.logLevel = env.PROXY_LOG_LEVEL;
  }
};

/** Defaults, then the first config file found in `cwd`, then environment. */
export const loadConfig = (
  options: { env?: NodeJS.ProcessEnv; cwd?: string } = {}
): ProxyConfig => {
  const config = defaultConfig();
  const file = readConfigFile(options.cwd ?? process.cwd());
  if (file) {
    applyFile(config, file.origin, file.document);
  }
  applyEnv(config, options.env ?? process.env);
  return config;
};
