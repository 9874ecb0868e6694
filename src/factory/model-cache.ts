/**
 * Model Cache
 *
 * Holds built LlmModel instances by model name for the lifetime of a factory.
 */

import { LlmModel } from '../models';

/**
 * Cache entry with the built model and when it was stored
 */
export interface CacheEntry {
  modelName: string;
  instance: LlmModel;
  loadedAt: Date;
}

export interface ModelCache {
  get(modelName: string): CacheEntry | undefined;
  /** Store an entry, replacing any entry of the same name */
  set(entry: CacheEntry): void;
  delete(modelName: string): boolean;
  clear(): void;
  keys(): string[];
  readonly size: number;
}

export class InMemoryModelCache implements ModelCache {
  private readonly entries: Map<string, CacheEntry> = new Map();

  get(modelName: string): CacheEntry | undefined {
    return this.entries.get(modelName);
  }

  set(entry: CacheEntry): void {
    this.entries.set(entry.modelName, entry);
  }

  delete(modelName: string): boolean {
    return this.entries.delete(modelName);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}
