import { v4 as uuidv4 } from 'uuid';
import { Birthday, daysUntilBirthday } from './birthday';
import { Name } from './fields';
import { Phone } from './phone';
import { RecordSnapshot } from './types';

export interface ContactRecordOptions {
  id?: string;
  createdAt?: string;
}

/**
 * One contact: a fixed name, an optional birthday and an ordered list of phones.
 */
export class ContactRecord {
  readonly id: string;
  readonly name: Name;
  readonly birthday: Birthday | undefined;
  readonly createdAt: string;
  private readonly phoneList: Phone[] = [];

  constructor(name: string, birthday?: string, options: ContactRecordOptions = {}) {
    this.name = new Name(name);
    this.birthday = birthday ? new Birthday(birthday) : undefined;
    this.id = options.id ?? uuidv4();
    this.createdAt = options.createdAt ?? new Date().toISOString();
  }

  get phones(): readonly Phone[] {
    return this.phoneList;
  }

  addPhone(value: string): Phone {
    const phone = new Phone(value);
    this.phoneList.push(phone);
    return phone;
  }

  removePhone(value: string): boolean {
    const idx = this.phoneList.findIndex((p) => p.value === value);
    if (idx === -1) return false;
    this.phoneList.splice(idx, 1);
    return true;
  }

  /**
   * Re-validates the first phone equal to `oldValue` with `newValue`.
   * Returns false, changing nothing, when no phone matches.
   */
  editPhone(oldValue: string, newValue: string): boolean {
    const phone = this.phoneList.find((p) => p.value === oldValue);
    if (!phone) return false;
    phone.update(newValue);
    return true;
  }

  hasPhone(value: string): boolean {
    return this.phoneList.some((p) => p.value === value);
  }

  daysToBirthday(today?: Date): number | undefined {
    if (!this.birthday) return undefined;
    return daysUntilBirthday(this.birthday.value, today);
  }

  toString(): string {
    const phonesStr = this.phoneList.map((p) => p.toString()).join(', ');
    const birthdayStr = this.birthday ? `, Birthday: ${this.birthday.toString()}` : '';
    return `Name: ${this.name.toString()}${birthdayStr}, Phones: ${phonesStr}`;
  }

  toSnapshot(): RecordSnapshot {
    return {
      id: this.id,
      name: this.name.value,
      birthday: this.birthday ? this.birthday.toString() : null,
      phones: this.phoneList.map((p) => p.value),
      createdAt: this.createdAt,
    };
  }

  static fromSnapshot(snapshot: RecordSnapshot): ContactRecord {
    const record = new ContactRecord(snapshot.name, snapshot.birthday ?? undefined, {
      id: snapshot.id,
      createdAt: snapshot.createdAt,
    });
    for (const phone of snapshot.phones) {
      record.addPhone(phone);
    }
    return record;
  }
}
