import { describe, it, expect } from 'vitest';
import { Birthday } from '../birthday';
import { ContactRecord } from '../record';
import { ValidationError } from '../errors';
import { Field, Name, nameRule } from '../fields';

describe('Field', () => {
  it('starts empty when built without input', () => {
    const field = new Field(nameRule);
    expect(field.value).toBeUndefined();
    expect(field.toString()).toBe('');
    expect(field.kind).toBe('name');
  });

  it('routes every write through its rule', () => {
    const field = new Field(nameRule);
    field.update('alice');
    expect(field.value).toBe('alice');
    expect(() => field.update('   ')).toThrow(ValidationError);
    expect(field.value).toBe('alice');
  });

  it('fails plainly when a required value is missing', () => {
    class RequiredName extends Field<string> {
      constructor() {
        super(nameRule);
      }

      read(): string {
        return this.required();
      }
    }
    const field = new RequiredName();
    expect(() => field.read()).toThrow('name field has no value');
    expect(() => field.read()).not.toThrow(ValidationError);
  });

  it('accepts a custom rule', () => {
    const upper = new Field({
      kind: 'name',
      parse: (input: string) => input.toUpperCase(),
      format: (value: string) => `<${value}>`,
    }, 'bob');
    expect(upper.value).toBe('BOB');
    expect(upper.toString()).toBe('<BOB>');
  });
});

describe('Name', () => {
  it('stores the name as given', () => {
    expect(new Name(' Mary Ann ').value).toBe(' Mary Ann ');
  });

  it('rejects an empty name', () => {
    expect(() => new Name('')).toThrow('name must not be empty');
  });

  it('cannot be changed after construction', () => {
    const name = new Name('bob');
    expect(() => name.update('robert')).toThrow('name cannot be changed');
    expect(name.value).toBe('bob');
  });
});

describe('Birthday', () => {
  it('holds a calendar date and displays it in ISO form', () => {
    const birthday = new Birthday('1990-05-15');
    expect(birthday.value).toEqual({ year: 1990, month: 5, day: 15 });
    expect(birthday.toString()).toBe('1990-05-15');
  });

  it('cannot be changed through its value', () => {
    const record = new ContactRecord('bob', '1990-05-15');
    const date = record.birthday?.value;
    if (!date) throw new Error('expected a birthday');

    expect(Object.isFrozen(date)).toBe(true);
    expect(Reflect.set(date, 'month', 2)).toBe(false);
    expect(Reflect.set(date, 'day', 31)).toBe(false);
    expect(record.birthday?.toString()).toBe('1990-05-15');
    expect(record.toSnapshot().birthday).toBe('1990-05-15');
  });

  it('keeps the previous date when an update is rejected', () => {
    const birthday = new Birthday('1990-05-15');
    expect(() => birthday.update('15.05.1991')).toThrow('invalid date format, expected YYYY-MM-DD');
    expect(birthday.toString()).toBe('1990-05-15');
  });
});
