/**
 * InMemoryFlagStore - An in-memory implementation of FlagStore for testing.
 */

import type { FlagStore } from "@contactshare/core";

export class InMemoryFlagStore implements FlagStore {
  private flags: Map<string, boolean>;

  constructor(initial: { [key: string]: boolean } = {}) {
    this.flags = new Map(Object.entries(initial));
  }

  /**
   * Read a flag; unset flags read as false.
   */
  async get(key: string): Promise<boolean> {
    return this.flags.get(key) ?? false;
  }

  async set(key: string, value: boolean): Promise<void> {
    this.flags.set(key, value);
  }

  // --- Helper methods for testing/debugging ---

  getAll(): { [key: string]: boolean } {
    return Object.fromEntries(this.flags);
  }

  clear(): void {
    this.flags.clear();
  }
}
