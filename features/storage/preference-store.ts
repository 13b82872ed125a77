import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "@/features/logging";

const PREFERENCES_FILE = "preferences.json";

/** Opaque key/value preferences. Values must be JSON-serializable. */
export interface PreferenceStore {
  getItem(key: string): unknown;
  setItem(key: string, value: unknown): void;
  removeItem(key: string): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Preferences kept in a single JSON file under `dataDir`, cached in memory
 * after the first read. Every write replaces the file.
 */
export class JsonFilePreferenceStore implements PreferenceStore {
  readonly filePath: string;
  private cache: Record<string, unknown> | null = null;

  constructor(
    private readonly dataDir: string,
    private readonly log?: Logger,
  ) {
    this.filePath = join(dataDir, PREFERENCES_FILE);
  }

  getItem(key: string): unknown {
    return this.read()[key];
  }

  setItem(key: string, value: unknown): void {
    this.write({ ...this.read(), [key]: value });
  }

  removeItem(key: string): void {
    const current = this.read();
    if (!(key in current)) return;
    const next = { ...current };
    delete next[key];
    this.write(next);
  }

  private read(): Record<string, unknown> {
    if (this.cache !== null) return this.cache;
    try {
      if (existsSync(this.filePath)) {
        const parsed: unknown = JSON.parse(readFileSync(this.filePath, "utf8"));
        this.cache = isRecord(parsed) ? parsed : {};
      } else {
        this.cache = {};
      }
    } catch (e) {
      this.log?.warn(`Ignoring unreadable preferences: ${e instanceof Error ? e.message : String(e)}`);
      this.cache = {};
    }
    return this.cache;
  }

  private write(entries: Record<string, unknown>): void {
    if (!existsSync(this.dataDir)) {
      mkdirSync(this.dataDir, { recursive: true });
    }
    const tmp = `${this.filePath}.tmp`;
    writeFileSync(tmp, JSON.stringify(entries, null, 2));
    renameSync(tmp, this.filePath);
    this.cache = entries;
  }
}

export class MemoryPreferenceStore implements PreferenceStore {
  private entries = new Map<string, unknown>();

  getItem(key: string): unknown {
    return this.entries.get(key);
  }

  setItem(key: string, value: unknown): void {
    // Same shape a file round trip would give back.
    this.entries.set(key, JSON.parse(JSON.stringify(value)));
  }

  removeItem(key: string): void {
    this.entries.delete(key);
  }
}
