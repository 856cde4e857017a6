/** A schemaless store record: field name to value. */
export type StoreRecord = Record<string, unknown>;

/** Equality-only filter in store field names. */
export type StoreFilter = Record<string, unknown>;

/**
 * Per-collection primitives of an established store connection.
 * Implementations reject on store failure; the Document layer decides
 * whether that failure surfaces.
 */
export interface StoreHandle {
  insertOne(collection: string, record: StoreRecord): Promise<void>;
  insertMany(collection: string, records: StoreRecord[]): Promise<void>;
  findOne(collection: string, filter: StoreFilter): Promise<StoreRecord | null>;
  findMany(collection: string, filter: StoreFilter): Promise<StoreRecord[]>;
}
