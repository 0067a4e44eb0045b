import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defaultConfig, type ProxyConfig } from "../src/config.js";
import type { Interaction } from "../src/types.js";

export const makeInteraction = (overrides: Partial<Interaction> = {}): Interaction => ({
  id: "3f0c8d4e-0000-4000-8000-000000000001",
  timestamp: "2026-02-01T00:00:00.000Z",
  request: {
    method: "POST",
    url: "api.example.com/users",
    headers: { "content-type": ["application/json"] },
    body: Buffer.from('{"name":"Alice"}'),
  },
  response: {
    statusCode: 201,
    headers: { "content-type": ["application/json"] },
    body: Buffer.from('{"id":7,"name":"Alice"}'),
  },
  metadata: {
    target: "api.example.com/users",
    durationMs: 12,
  },
  ...overrides,
});

export const testConfig = (overrides: Partial<ProxyConfig> = {}): ProxyConfig => ({
  ...defaultConfig(),
  logLevel: "silent",
  ...overrides,
});

export const tempDirs = () => {
  const dirs: string[] = [];
  return {
    create(prefix = "replay-proxy-"): string {
      const dir = mkdtempSync(join(tmpdir(), prefix));
      dirs.push(dir);
      return dir;
    },
    cleanup(): void {
      for (const dir of dirs.splice(0)) {
        rmSync(dir, { recursive: true, force: true });
      }
    },
  };
};
