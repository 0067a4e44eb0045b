import { InvalidModeError } from "./errors.js";
import type { ProxyMode } from "./types.js";

export const isProxyMode = (value: unknown): value is ProxyMode =>
  value === "record" || value === "playback";

export class ModeController {
  private current: ProxyMode;

  constructor(initial: string = "playback") {
    if (!isProxyMode(initial)) {
      throw new InvalidModeError(initial);
    }
    this.current = initial;
  }

  getMode(): ProxyMode {
    return this.current;
  }

  /** Throws InvalidModeError and keeps the current mode for anything else. */
  setMode(value: string): ProxyMode {
    if (!isProxyMode(value)) {
      throw new InvalidModeError(value);
    }
    this.current = value;
    return this.current;
  }
}
