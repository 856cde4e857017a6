/**
 * Entity types and test data shared across tests
 */

import { vi } from "vitest";
import { Document, uuidField } from "../../src/models/document";
import { FieldTable } from "../../src/types/document";
import { StoreHandle } from "../../src/lib/store";
import { UUID } from "../../src/lib/identity";

export interface UserFields {
  name: string;
  email: string;
  age?: number;
  tags?: string[];
}

export class User extends Document<UserFields> {
  static collection = { name: "users" };
  static fields: FieldTable<UserFields> = {
    name: {},
    email: { alias: "emailAddress" },
    age: {},
    tags: {},
  };

  declare name: string;
  declare email: string;
  declare age?: number;
  declare tags?: string[];
}

/** Same shape and collection as User, but a distinct type. */
export class Customer extends Document<UserFields> {
  static collection = { name: "users" };
  static fields: FieldTable<UserFields> = User.fields;

  declare name: string;
  declare email: string;
  declare age?: number;
  declare tags?: string[];
}

export interface OrderFields {
  userId: UUID;
  sku: string;
  quantity: number;
  status?: "open" | "shipped";
  placedAt?: Date;
}

export class Order extends Document<OrderFields> {
  static collection = { name: "orders" };
  static fields: FieldTable<OrderFields> = {
    userId: uuidField({ alias: "user_id" }),
    sku: {},
    quantity: {},
    status: { default: () => "open" },
    placedAt: {
      alias: "placed_at",
      toStore: (value) => value?.toISOString(),
      fromStore: (raw) => (typeof raw === "string" ? new Date(raw) : undefined),
    },
  };

  declare userId: UUID;
  declare sku: string;
  declare quantity: number;
  declare status?: "open" | "shipped";
  declare placedAt?: Date;
}

interface MeasurementFields {
  values: number[];
  unit: string;
}

/** Field names that overlap the base class's internal state. */
export class Measurement extends Document<MeasurementFields> {
  static collection = { name: "measurements" };
  static fields: FieldTable<MeasurementFields> = {
    values: {},
    unit: {},
  };

  declare values: number[];
  declare unit: string;
}

interface NoteFields {
  text: string;
}

/** Declares no collection config at all. */
export class Unconfigured extends Document<NoteFields> {
  static fields: FieldTable<NoteFields> = { text: {} };

  declare text: string;
}

/** Declares a collection config without a name. */
export class Unnamed extends Document<NoteFields> {
  static collection = {};
  static fields: FieldTable<NoteFields> = { text: {} };

  declare text: string;
}

export const TEST_USERS = {
  michael: { name: "Michael", email: "michael@example.com" },
  ann: { name: "Ann", email: "ann@example.com" },
  annSecond: { name: "Ann", email: "ann.two@example.com" },
  bob: { name: "Bob", email: "bob@example.com", age: 41 },
};

export const FIXED_ID = "3b241101-e2bb-4255-8caf-4136c566a962";

/**
 * Store whose every call rejects, as an unreachable server would
 */
export function createUnavailableStore(): StoreHandle {
  const failure = () => Promise.reject(new Error("connection reset"));
  return {
    insertOne: vi.fn(failure),
    insertMany: vi.fn(failure),
    findOne: vi.fn(failure),
    findMany: vi.fn(failure),
  };
}
