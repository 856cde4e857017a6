import {
  UUID,
  generateIdentity,
  identityToString,
  isIdentity,
  parseIdentity,
} from "../lib/identity";
import { StoreFilter, StoreHandle, StoreRecord } from "../lib/store";
import {
  CollectionConfig,
  DocumentFilter,
  DocumentInit,
  DocumentStatics,
  FieldDefinition,
  ToStoreOptions,
} from "../types/document";
import {
  EmptyRecordError,
  MissingCollectionConfigError,
  MissingCollectionNameError,
  ReservedFieldError,
  StoreQueryError,
  StoreWriteError,
} from "../utils/error";

/** Store-native name of the identity field. */
export const STORE_ID_FIELD = "_id";

/**
 * Field values read back from a store record, ready to hydrate an entity.
 * Built by `Document.fromStore`.
 */
export class StoredFields {
  constructor(
    readonly id: UUID,
    readonly values: ReadonlyMap<string, unknown>,
  ) {}
}

export interface DocumentClass<T extends Document<F>, F extends object>
  extends DocumentStatics {
  new (init: DocumentInit<F> | StoredFields): T;
}

/**
 * Base class for persisted entities.
 *
 * Subclasses declare their data fields with `declare` (so no class field
 * initializer replaces the accessors installed here), a static `fields`
 * table and a static `collection` config:
 *
 * ```ts
 * interface UserFields { name: string; email: string }
 *
 * class User extends Document<UserFields> {
 *   static collection = { name: "users" };
 *   static fields: FieldTable<UserFields> = {
 *     name: {},
 *     email: { alias: "emailAddress" },
 *   };
 *   declare name: string;
 *   declare email: string;
 * }
 * ```
 *
 * `id` and the names of `Document` methods cannot be field names.
 * Instances are equal when they share a class and an id.
 */
export abstract class Document<F extends object = object> {
  static collection?: Partial<CollectionConfig>;
  static readonly fields: DocumentStatics["fields"] = {};

  readonly id: UUID;

  readonly #model: DocumentStatics;
  readonly #values = new Map<string, unknown>();
  readonly #fieldsSet = new Set<string>();

  constructor(init: DocumentInit<F> | StoredFields) {
    this.#model = new.target;

    let source: ReadonlyMap<string, unknown>;
    if (init instanceof StoredFields) {
      this.id = init.id;
      source = init.values;
    } else {
      this.id = toIdentity(init.id);
      source = new Map(Object.entries(init));
    }

    for (const [key, definition] of fieldEntries(this.#model)) {
      if (RESERVED_FIELDS.has(key)) {
        throw new ReservedFieldError(this.#model.name, key);
      }
      const value = source.get(key);
      if (value !== undefined) {
        this.#values.set(key, value);
        this.#fieldsSet.add(key);
      } else if (definition.default) {
        this.#values.set(key, definition.default());
      }
      this.#defineField(key);
    }
  }

  /**
   * Resolve the collection this entity type is stored in. Checked on every
   * store call; a misconfigured type always throws.
   */
  static collectionName(this: DocumentStatics): string {
    return resolveCollectionName(this);
  }

  static fromStore<T extends Document<F>, F extends object>(
    this: DocumentClass<T, F>,
    record: StoreRecord | null | undefined,
  ): T {
    return hydrate(this, record);
  }

  /**
   * Return the record matching `fields`, or construct one from `fields` and
   * insert it. Store failures reject. Two concurrent calls with the same
   * fields can both create.
   */
  static async getOrCreate<T extends Document<F>, F extends object>(
    this: DocumentClass<T, F>,
    store: StoreHandle,
    fields: DocumentInit<F>,
  ): Promise<T> {
    const collection = resolveCollectionName(this);
    const filter = toStoreFilter(this, fields);

    let record: StoreRecord | null;
    try {
      record = await store.findOne(collection, filter);
    } catch (error) {
      throw new StoreQueryError(collection, error);
    }

    if (record) {
      return hydrate(this, record);
    }

    const created = new this(fields);
    try {
      await store.insertOne(collection, created.toStore());
    } catch (error) {
      throw new StoreWriteError(collection, error);
    }
    return created;
  }

  /**
   * Insert all documents in one batch. Resolves false if the store rejects
   * any part of it.
   */
  static async bulkInsert<T extends Document<F>, F extends object>(
    this: DocumentClass<T, F>,
    store: StoreHandle,
    documents: readonly T[],
  ): Promise<boolean> {
    const collection = resolveCollectionName(this);
    if (documents.length === 0) {
      return true;
    }

    try {
      await store.insertMany(
        collection,
        documents.map((document) => document.toStore()),
      );
      return true;
    } catch (error) {
      console.error(
        `Bulk insert of ${documents.length} ${this.name} failed:`,
        new StoreWriteError(collection, error),
      );
      return false;
    }
  }

  static async find<T extends Document<F>, F extends object>(
    this: DocumentClass<T, F>,
    store: StoreHandle,
    filter: DocumentFilter<F>,
  ): Promise<T | null> {
    const collection = resolveCollectionName(this);
    const storeFilter = toStoreFilter(this, filter);

    let record: StoreRecord | null;
    try {
      record = await store.findOne(collection, storeFilter);
    } catch (error) {
      console.error(
        `Find ${this.name} failed:`,
        new StoreQueryError(collection, error),
      );
      return null;
    }

    return record ? hydrate(this, record) : null;
  }

  /**
   * All records matching `filter`. Records that cannot be deserialized are
   * skipped.
   */
  static async bulkFind<T extends Document<F>, F extends object>(
    this: DocumentClass<T, F>,
    store: StoreHandle,
    filter: DocumentFilter<F>,
  ): Promise<T[]> {
    const collection = resolveCollectionName(this);
    const storeFilter = toStoreFilter(this, filter);

    let records: StoreRecord[];
    try {
      records = await store.findMany(collection, storeFilter);
    } catch (error) {
      console.error(
        `Bulk find ${this.name} failed:`,
        new StoreQueryError(collection, error),
      );
      return [];
    }

    const documents: T[] = [];
    for (const record of records) {
      try {
        documents.push(hydrate(this, record));
      } catch (error) {
        console.warn(`Skipping unreadable ${this.name} record:`, error);
      }
    }
    return documents;
  }

  /**
   * Insert this document. A failed write is logged and resolves null.
   */
  async save(store: StoreHandle): Promise<this | null> {
    const collection = resolveCollectionName(this.#model);
    try {
      await store.insertOne(collection, this.toStore());
      return this;
    } catch (error) {
      console.error(
        `Saving ${this.#model.name} ${identityToString(this.id)} failed:`,
        new StoreWriteError(collection, error),
      );
      return null;
    }
  }

  toStore(options: ToStoreOptions = {}): StoreRecord {
    const { excludeUnset = false, useFieldAliases = true } = options;
    const record: StoreRecord = { [STORE_ID_FIELD]: identityToString(this.id) };

    for (const [key, definition] of fieldEntries(this.#model)) {
      if (excludeUnset && !this.#fieldsSet.has(key)) {
        continue;
      }
      const value = this.#values.get(key);
      if (value === undefined) {
        continue;
      }
      const name = useFieldAliases ? (definition.alias ?? key) : key;
      record[name] = toStoreValue(definition, value);
    }

    return record;
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = { id: identityToString(this.id) };
    for (const [key, value] of this.#values) {
      if (value !== undefined) {
        json[key] = isIdentity(value) ? identityToString(value) : value;
      }
    }
    return json;
  }

  /** Whether the field was given to the constructor or assigned since. */
  isSet(field: keyof F & string): boolean {
    return this.#fieldsSet.has(field);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Document &&
      other.constructor === this.constructor &&
      this.id.equals(other.id)
    );
  }

  #defineField(key: string): void {
    Object.defineProperty(this, key, {
      enumerable: true,
      configurable: false,
      get: () => this.#values.get(key),
      set: (value: unknown) => {
        this.#values.set(key, value);
        this.#fieldsSet.add(key);
      },
    });
  }
}

// A field accessor would shadow these on every instance
const RESERVED_FIELDS: ReadonlySet<string> = new Set([
  "id",
  ...Object.getOwnPropertyNames(Document.prototype),
]);

/**
 * Field table entry for a UUID-valued field, parsed back from its string
 * form on read.
 */
export function uuidField(
  options: Omit<FieldDefinition<UUID>, "fromStore"> = {},
): FieldDefinition<UUID> {
  return { ...options, fromStore: parseIdentity };
}

export function resolveCollectionName(type: DocumentStatics): string {
  const config = type.collection;
  if (!config) {
    throw new MissingCollectionConfigError(type.name);
  }
  if (typeof config.name !== "string" || config.name.length === 0) {
    throw new MissingCollectionNameError(type.name);
  }
  return config.name;
}

function hydrate<T extends Document<F>, F extends object>(
  type: DocumentClass<T, F>,
  record: StoreRecord | null | undefined,
): T {
  if (!record || Object.keys(record).length === 0) {
    throw new EmptyRecordError(type.name);
  }

  const id = parseIdentity(record[STORE_ID_FIELD]);
  const values = new Map<string, unknown>();

  for (const [key, definition] of fieldEntries(type)) {
    // Records written without aliases carry the domain name
    const raw =
      definition.alias !== undefined && Object.hasOwn(record, definition.alias)
        ? record[definition.alias]
        : record[key];
    if (raw === undefined) {
      continue;
    }
    values.set(key, definition.fromStore ? definition.fromStore(raw) : raw);
  }

  return new type(new StoredFields(id, values));
}

function toStoreFilter(type: DocumentStatics, filter: object): StoreFilter {
  const storeFilter: StoreFilter = {};

  for (const [key, value] of Object.entries(filter)) {
    if (value === undefined) {
      continue;
    }
    if (key === "id") {
      storeFilter[STORE_ID_FIELD] = identityToString(
        isIdentity(value) ? value : parseIdentity(value),
      );
      continue;
    }

    const definition = Object.hasOwn(type.fields, key)
      ? type.fields[key]
      : undefined;
    if (definition) {
      storeFilter[definition.alias ?? key] = toStoreValue(definition, value);
    } else {
      storeFilter[key] = isIdentity(value) ? identityToString(value) : value;
    }
  }

  return storeFilter;
}

function toStoreValue(definition: FieldDefinition, value: unknown): unknown {
  const coerced = definition.toStore ? definition.toStore(value) : value;
  return isIdentity(coerced) ? identityToString(coerced) : coerced;
}

function toIdentity(value: UUID | string | undefined): UUID {
  if (value === undefined) {
    return generateIdentity();
  }
  return isIdentity(value) ? value : parseIdentity(value);
}

function fieldEntries(type: DocumentStatics): [string, FieldDefinition][] {
  return Object.entries(type.fields);
}
