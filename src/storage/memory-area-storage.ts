import type { AreaRecord, AreaStorage } from "../types/index.js";

/**
 * In-process storage. Holds a deep copy of the last saved mapping so callers
 * cannot mutate stored state through references they still hold.
 */
export class MemoryAreaStorage implements AreaStorage {
  private records: Record<string, unknown>;

  constructor(initial: Record<string, unknown> = {}) {
    this.records = structuredClone(initial);
  }

  async load(): Promise<Record<string, unknown>> {
    return structuredClone(this.records);
  }

  async save(records: Record<string, AreaRecord>): Promise<void> {
    this.records = structuredClone(records);
  }

  /** Last saved mapping, for inspection. */
  snapshot(): Record<string, unknown> {
    return structuredClone(this.records);
  }
}
