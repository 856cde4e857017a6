import { StoreFilter, StoreHandle, StoreRecord } from "./store";

/**
 * In-process store keyed by `_id`, for tests and local runs.
 * Matching is strict equality on every filter key.
 */
export class InMemoryStoreHandle implements StoreHandle {
  private collections: Map<string, Map<unknown, StoreRecord>> = new Map();

  async insertOne(collection: string, record: StoreRecord): Promise<void> {
    await this.insertMany(collection, [record]);
  }

  async insertMany(collection: string, records: StoreRecord[]): Promise<void> {
    const store = this.getCollection(collection);
    const incoming = new Set<unknown>();

    // Reject the whole batch before writing anything
    for (const record of records) {
      const key = record._id;
      if (store.has(key) || incoming.has(key)) {
        throw new Error(
          `Duplicate key in "${collection}": _id ${String(key)}`,
        );
      }
      incoming.add(key);
    }

    for (const record of records) {
      store.set(record._id, structuredClone(record));
    }
  }

  async findOne(
    collection: string,
    filter: StoreFilter,
  ): Promise<StoreRecord | null> {
    const [first] = await this.findMany(collection, filter);
    return first ?? null;
  }

  async findMany(
    collection: string,
    filter: StoreFilter,
  ): Promise<StoreRecord[]> {
    return Array.from(this.getCollection(collection).values())
      .filter((record) => this.matchesFilter(record, filter))
      .map((record) => structuredClone(record));
  }

  /**
   * Number of records in a collection
   */
  count(collection: string): number {
    return this.collections.get(collection)?.size ?? 0;
  }

  clear(): void {
    this.collections.clear();
  }

  private getCollection(name: string): Map<unknown, StoreRecord> {
    let store = this.collections.get(name);
    if (!store) {
      store = new Map();
      this.collections.set(name, store);
    }
    return store;
  }

  private matchesFilter(record: StoreRecord, filter: StoreFilter): boolean {
    for (const [key, value] of Object.entries(filter)) {
      if (record[key] !== value) {
        return false;
      }
    }
    return true;
  }
}
