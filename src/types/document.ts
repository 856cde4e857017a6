/**
 * Type definitions for Document entities
 *
 * An entity class declares its data fields with `declare`, a static field
 * table describing how each one maps to the store, and a static collection
 * config naming where its records live.
 */

import type { UUID } from "../lib/identity";

export interface CollectionConfig {
  /** Name of the store collection holding this entity's records */
  name: string;
}

export interface FieldDefinition<V = unknown> {
  /** Store-side field name; the domain name is used when absent */
  alias?: string;

  /** Produces the value when the constructor is not given one. Defaults do not count as set. */
  default?: () => V;

  toStore?(value: V): unknown;

  fromStore?(raw: unknown): V;
}

/** One entry per declared field of `F`. */
export type FieldTable<F> = { [K in keyof F]-?: FieldDefinition<F[K]> };

export type AnyFieldTable = Readonly<Record<string, FieldDefinition>>;

/** Constructor input: the entity's fields plus an optional identity. */
export type DocumentInit<F> = F & { id?: UUID | string };

/** Equality filter in domain field names. */
export type DocumentFilter<F> = Partial<F> & { id?: UUID | string };

export interface ToStoreOptions {
  /** Omit fields never assigned (default false) */
  excludeUnset?: boolean;

  /** Emit field aliases instead of domain names (default true) */
  useFieldAliases?: boolean;
}

/** Static side every entity class carries. */
export interface DocumentStatics {
  readonly name: string;
  readonly collection?: Partial<CollectionConfig>;
  readonly fields: AnyFieldTable;
}
