import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { errorMessage, InteractionNotFoundError, StorageError } from "./errors.js";
import { fingerprint, parseInteraction, serializeInteraction } from "./interaction.js";
import { serviceDirectoryName } from "./target.js";
import type { Interaction } from "./types.js";

/**
 * Persistence for recorded interactions, keyed by request fingerprint.
 *
 * Implementations are synchronous, so every call completes within one turn
 * of the event loop and admin reads never observe a half-applied write.
 */
export interface InteractionRepository {
  /** Saves the interaction, replacing any earlier one with the same fingerprint. */
  store(interaction: Interaction): Interaction;
  /** Looks up by fingerprint first, then by interaction id. */
  find(key: string): Interaction;
  findAll(): Interaction[];
  count(): number;
  clear(): void;
}

const newestFirst = (left: Interaction, right: Interaction): number =>
  Date.parse(right.timestamp) - Date.parse(left.timestamp);

export class InMemoryInteractionRepository implements InteractionRepository {
  protected readonly byFingerprint = new Map<string, Interaction>();

  store(interaction: Interaction): Interaction {
    this.byFingerprint.set(fingerprint(interaction.request), interaction);
    return interaction;
  }

  find(key: string): Interaction {
    const direct = this.byFingerprint.get(key);
    if (direct) {
      return direct;
    }
    for (const interaction of this.byFingerprint.values()) {
      if (interaction.id === key) {
        return interaction;
      }
    }
    throw new InteractionNotFoundError(key);
  }

  findAll(): Interaction[] {
    return [...this.byFingerprint.values()].sort(newestFirst);
  }

  count(): number {
    return this.byFingerprint.size;
  }

  clear(): void {
    this.byFingerprint.clear();
  }
}

const fileKeyPattern = /^[A-Za-z0-9_-]+$/;

/**
 * One directory per target host, one `<fingerprint>.json` file per
 * interaction inside it.
 */
export class FileInteractionRepository implements InteractionRepository {
  private readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
    try {
      mkdirSync(basePath, { recursive: true });
    } catch (error) {
      throw new StorageError(`failed to create base directory: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  store(interaction: Interaction): Interaction {
    const serviceDir = join(this.basePath, serviceDirectoryName(interaction.metadata.target));
    const filePath = join(serviceDir, `${fingerprint(interaction.request)}.json`);
    const tempPath = `${filePath}.tmp`;

    try {
      mkdirSync(serviceDir, { recursive: true });
      writeFileSync(tempPath, JSON.stringify(serializeInteraction(interaction), null, 2), "utf8");
      renameSync(tempPath, filePath);
    } catch (error) {
      if (existsSync(tempPath)) {
        rmSync(tempPath, { force: true });
      }
      throw new StorageError(`failed to write interaction file: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return interaction;
  }

  find(key: string): Interaction {
    if (fileKeyPattern.test(key)) {
      for (const serviceDir of this.serviceDirectories()) {
        const filePath = join(serviceDir, `${key}.json`);
        if (existsSync(filePath)) {
          return this.readInteraction(filePath);
        }
      }
    }

    for (const filePath of this.interactionFiles()) {
      const interaction = this.readInteraction(filePath);
      if (interaction.id === key) {
        return interaction;
      }
    }

    throw new InteractionNotFoundError(key);
  }

  findAll(): Interaction[] {
    return this.interactionFiles()
      .map((filePath) => this.readInteraction(filePath))
      .sort(newestFirst);
  }

  count(): number {
    return this.interactionFiles().length;
  }

  clear(): void {
    if (!existsSync(this.basePath)) {
      mkdirSync(this.basePath, { recursive: true });
      return;
    }

    for (const path of this.baseEntries()) {
      try {
        rmSync(path, { recursive: true, force: true });
      } catch (error) {
        throw new StorageError(`failed to remove ${path}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }
  }

  private baseEntries(): string[] {
    try {
      return readdirSync(this.basePath).map((entry) => join(this.basePath, entry));
    } catch (error) {
      throw new StorageError(`failed to read directory entries: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private serviceDirectories(): string[] {
    if (!existsSync(this.basePath)) {
      return [];
    }

    try {
      return readdirSync(this.basePath, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => join(this.basePath, entry.name));
    } catch (error) {
      throw new StorageError(`failed to read directory entries: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private interactionFiles(): string[] {
    const files: string[] = [];
    for (const serviceDir of this.serviceDirectories()) {
      try {
        for (const entry of readdirSync(serviceDir, { withFileTypes: true })) {
          if (entry.isFile() && entry.name.endsWith(".json")) {
            files.push(join(serviceDir, entry.name));
          }
        }
      } catch (error) {
        throw new StorageError(`failed to read ${serviceDir}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }
    return files;
  }

  private readInteraction(filePath: string): Interaction {
    try {
      return parseInteraction(JSON.parse(readFileSync(filePath, "utf8")));
    } catch (error) {
      throw new StorageError(`failed to read interaction file ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
