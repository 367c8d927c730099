import { FieldKind, ValidationError } from './errors';

/**
 * How one kind of field turns raw input into a stored value.
 * `parse` throws `ValidationError` when the input is not acceptable.
 */
export interface FieldRule<T> {
  kind: FieldKind;
  parse: (input: string) => T;
  format: (value: T) => string;
}

/**
 * A value holder whose every write goes through its rule.
 * A rejected write leaves the previous value in place.
 */
export class Field<T> {
  protected current: T | undefined;

  constructor(protected readonly rule: FieldRule<T>, input?: string) {
    if (input !== undefined) {
      this.current = rule.parse(input);
    }
  }

  get kind(): FieldKind {
    return this.rule.kind;
  }

  get value(): T | undefined {
    return this.current;
  }

  update(input: string): void {
    const next = this.rule.parse(input);
    this.current = next;
  }

  toString(): string {
    return this.current === undefined ? '' : this.rule.format(this.current);
  }

  protected required(): T {
    if (this.current === undefined) {
      throw new Error(`${this.rule.kind} field has no value`);
    }
    return this.current;
  }
}

export const nameRule: FieldRule<string> = {
  kind: 'name',
  parse: (input) => {
    if (input.trim().length === 0) {
      throw new ValidationError('name', 'name must not be empty');
    }
    return input;
  },
  format: (value) => value,
};

export class Name extends Field<string> {
  constructor(input: string) {
    super(nameRule, input);
  }

  override get value(): string {
    return this.required();
  }

  // The name is the address book key.
  override update(_input: string): void {
    throw new ValidationError('name', 'name cannot be changed');
  }
}
