export {
  Document,
  type DocumentClass,
  STORE_ID_FIELD,
  StoredFields,
  resolveCollectionName,
  uuidField,
} from "./models/document";
export type {
  AnyFieldTable,
  CollectionConfig,
  DocumentFilter,
  DocumentInit,
  DocumentStatics,
  FieldDefinition,
  FieldTable,
  ToStoreOptions,
} from "./types/document";
export type { StoreFilter, StoreHandle, StoreRecord } from "./lib/store";
export { InMemoryStoreHandle } from "./lib/memory-store";
export {
  MongoStoreHandle,
  connectToDatabase,
  disconnectFromDatabase,
} from "./lib/mongo";
export { type DatabaseConfig, loadDatabaseConfig } from "./lib/config";
export {
  UUID,
  generateIdentity,
  identityToString,
  isIdentity,
  parseIdentity,
} from "./lib/identity";
export * from "./utils/error";
