import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { InteractionNotFoundError, StorageError } from "../src/errors.js";
import { fingerprint } from "../src/interaction.js";
import {
  FileInteractionRepository,
  InMemoryInteractionRepository,
} from "../src/interactionRepository.js";
import { makeInteraction, tempDirs } from "./helpers.js";

const dirs = tempDirs();

afterEach(() => {
  dirs.cleanup();
});

const getUser = (id: number, timestamp: string) =>
  makeInteraction({
    id: `interaction-${id}`,
    timestamp,
    request: {
      method: "GET",
      url: `api.example.com/users/${id}`,
      headers: {},
    },
    response: {
      statusCode: 200,
      headers: { "content-type": ["application/json"] },
      body: Buffer.from(`{"id":${id}}`),
    },
    metadata: { target: `api.example.com/users/${id}`, durationMs: 5 },
  });

describe("FileInteractionRepository", () => {
  it("stores one file per fingerprint under the target host directory", () => {
    const dir = dirs.create();
    const repository = new FileInteractionRepository(dir);
    const interaction = makeInteraction();

    repository.store(interaction);

    const key = fingerprint(interaction.request);
    const filePath = join(dir, "api_example_com", `${key}.json`);
    expect(existsSync(filePath)).toBe(true);

    const stored = JSON.parse(readFileSync(filePath, "utf8")) as {
      response: { status_code: number };
      metadata: { duration_ms: number };
      request: { body: string };
    };
    expect(stored.response.status_code).toBe(201);
    expect(stored.metadata.duration_ms).toBe(12);
    expect(Buffer.from(stored.request.body, "base64").toString("utf8")).toBe('{"name":"Alice"}');
  });

  it("finds interactions by fingerprint and by id", () => {
    const repository = new FileInteractionRepository(dirs.create());
    const interaction = makeInteraction();
    repository.store(interaction);

    expect(repository.find(fingerprint(interaction.request))).toEqual(interaction);
    expect(repository.find(interaction.id)).toEqual(interaction);
  });

  it("throws InteractionNotFoundError for unknown keys", () => {
    const repository = new FileInteractionRepository(dirs.create());

    expect(() => repository.find("missing")).toThrow(InteractionNotFoundError);
    expect(() => repository.find("../outside")).toThrow(InteractionNotFoundError);
  });

  it("replaces an earlier recording of the same request", () => {
    const repository = new FileInteractionRepository(dirs.create());
    const first = makeInteraction({ id: "first" });
    const second = makeInteraction({
      id: "second",
      response: { statusCode: 200, headers: {}, body: Buffer.from("updated") },
    });

    repository.store(first);
    repository.store(second);

    expect(repository.count()).toBe(1);
    expect(repository.find(fingerprint(first.request)).id).toBe("second");
  });

  it("lists every interaction across hosts, newest first", () => {
    const repository = new FileInteractionRepository(dirs.create());
    repository.store(getUser(1, "2026-02-01T00:00:00.000Z"));
    repository.store(getUser(2, "2026-02-03T00:00:00.000Z"));
    repository.store(
      makeInteraction({
        id: "people",
        timestamp: "2026-02-02T00:00:00.000Z",
        metadata: { target: "people.example.org/people", durationMs: 1 },
      })
    );

    expect(repository.findAll().map((interaction) => interaction.id)).toEqual([
      "interaction-2",
      "people",
      "interaction-1",
    ]);
    expect(repository.count()).toBe(3);
  });

  it("clears every recording and stays usable", () => {
    const dir = dirs.create();
    const repository = new FileInteractionRepository(dir);
    const interaction = getUser(1, "2026-02-01T00:00:00.000Z");
    repository.store(interaction);
    repository.store(getUser(2, "2026-02-01T00:00:01.000Z"));

    repository.clear();

    expect(repository.count()).toBe(0);
    expect(readdirSync(dir)).toEqual([]);
    expect(() => repository.find(fingerprint(interaction.request))).toThrow(
      InteractionNotFoundError
    );

    repository.clear();
    expect(repository.count()).toBe(0);
  });

  it("recreates the base directory when clearing after it was removed", () => {
    const dir = join(dirs.create(), "recordings");
    const repository = new FileInteractionRepository(dir);
    rmSync(dir, { recursive: true, force: true });

    repository.clear();

    expect(existsSync(dir)).toBe(true);
    expect(repository.count()).toBe(0);
  });

  it("reports write failures as StorageError and keeps nothing", () => {
    const dir = dirs.create();
    const repository = new FileInteractionRepository(dir);
    writeFileSync(join(dir, "api_example_com"), "not a directory");

    expect(() => repository.store(makeInteraction())).toThrow(StorageError);
    expect(repository.count()).toBe(0);
  });

  it("reports unreadable files as StorageError", () => {
    const dir = dirs.create();
    mkdirSync(join(dir, "api_example_com"));
    writeFileSync(join(dir, "api_example_com", "broken.json"), "{ not json");
    const repository = new FileInteractionRepository(dir);

    expect(() => repository.findAll()).toThrow(StorageError);
  });

  it("reads recordings written by another tool", () => {
    const dir = dirs.create();
    const request = { method: "GET", url: "people.example.org/people/1" };
    const key = fingerprint(request);
    mkdirSync(join(dir, "people_example_org"));
    writeFileSync(
      join(dir, "people_example_org", `${key}.json`),
      JSON.stringify({
        id: "external",
        timestamp: "2026-01-15T08:30:00.123456789Z",
        request: { ...request, headers: null },
        response: {
          status_code: 200,
          headers: { "Content-Type": ["application/json"] },
          body: Buffer.from('{"name":"Ada"}').toString("base64"),
        },
        metadata: { target: "people.example.org/people/1", duration_ms: 42 },
      })
    );
    const repository = new FileInteractionRepository(dir);

    const found = repository.find(key);

    expect(found.id).toBe("external");
    expect(found.request.headers).toEqual({});
    expect(found.response.body?.toString("utf8")).toBe('{"name":"Ada"}');
  });
});

describe("InMemoryInteractionRepository", () => {
  it("stores, finds and clears interactions", () => {
    const repository = new InMemoryInteractionRepository();
    const interaction = makeInteraction();

    repository.store(interaction);

    expect(repository.count()).toBe(1);
    expect(repository.find(fingerprint(interaction.request))).toBe(interaction);
    expect(repository.find(interaction.id)).toBe(interaction);

    repository.clear();
    expect(repository.count()).toBe(0);
    expect(() => repository.find(interaction.id)).toThrow(InteractionNotFoundError);
  });

  it("lists newest first", () => {
    const repository = new InMemoryInteractionRepository();
    repository.store(getUser(1, "2026-02-01T00:00:00.000Z"));
    repository.store(getUser(2, "2026-02-02T00:00:00.000Z"));

    expect(repository.findAll().map((interaction) => interaction.id)).toEqual([
      "interaction-2",
      "interaction-1",
    ]);
  });
});
