export class InteractionNotFoundError extends Error {
  name = "InteractionNotFoundError";
  readonly key: string;

  constructor(key: string) {
    super(`interaction not found for hash: ${key}`);
    this.key = key;
  }
}

export class RecordingNotFoundError extends Error {
  name = "RecordingNotFoundError";
  readonly method: string;
  readonly url: string;
  readonly fingerprint: string;

  constructor(method: string, url: string, fingerprint: string) {
    super(`no recording found for ${method} ${url} (hash: ${fingerprint})`);
    this.method = method;
    this.url = url;
    this.fingerprint = fingerprint;
  }
}

export class UpstreamForwardError extends Error {
  name = "UpstreamForwardError";
}

export class StorageError extends Error {
  name = "StorageError";
}

export class InvalidModeError extends Error {
  name = "InvalidModeError";
  readonly value: string;

  constructor(value: string) {
    super(`invalid mode: ${value} (must be 'record' or 'playback')`);
    this.value = value;
  }
}

export class ConfigError extends Error {
  name = "ConfigError";
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
