export class OdmError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised when a store record to deserialize is null, undefined or empty. */
export class EmptyRecordError extends OdmError {
  constructor(typeName: string) {
    super(`Cannot build ${typeName} from an empty record`);
  }
}

export class MalformedIdentityError extends OdmError {
  constructor(public readonly value: unknown) {
    super(`Identity "${String(value)}" is not a valid UUID`);
  }
}

export class MissingCollectionConfigError extends OdmError {
  constructor(public readonly typeName: string) {
    super(`${typeName} does not declare a collection config`);
  }
}

export class MissingCollectionNameError extends OdmError {
  constructor(public readonly typeName: string) {
    super(`${typeName} collection config has no name`);
  }
}

export class StoreWriteError extends OdmError {
  constructor(
    public readonly collection: string,
    cause: unknown,
  ) {
    super(`Write to "${collection}" failed`, { cause });
  }
}

export class StoreQueryError extends OdmError {
  constructor(
    public readonly collection: string,
    cause: unknown,
  ) {
    super(`Query on "${collection}" failed`, { cause });
  }
}

export class ConfigurationError extends OdmError {}

/** Raised when a field table uses a name the base class owns. */
export class ReservedFieldError extends OdmError {
  constructor(
    public readonly typeName: string,
    public readonly field: string,
  ) {
    super(`${typeName} cannot declare a field named "${field}"`);
  }
}
