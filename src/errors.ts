export type FieldKind = 'name' | 'phone' | 'birthday';

/**
 * Thrown when a field rejects a value.
 * The message is the reason; `field` says which kind of field refused it.
 */
export class ValidationError extends Error {
  readonly field: FieldKind;

  constructor(field: FieldKind, reason: string) {
    super(reason);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Thrown when a snapshot file exists but cannot be read back.
 */
export class StorageError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, { cause });
    Object.setPrototypeOf(this, StorageError.prototype);
    this.name = 'StorageError';
    this.filePath = filePath;
  }
}
