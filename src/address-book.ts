import { ContactRecord } from './record';
import { readSnapshot, writeSnapshot } from './store';
import { AddressBookSnapshot, SearchCriteria } from './types';
import { ContactView } from './view';

export const MISSING_FILE_MESSAGE = 'File not found. Creating a new address book.';

export interface AddressBookOptions {
  /** Receives diagnostics such as a missing snapshot file. */
  view?: ContactView;
}

/**
 * All contacts, keyed by name. Adding a record under an existing name replaces it.
 */
export class AddressBook implements Iterable<ContactRecord> {
  private data = new Map<string, ContactRecord>();
  private readonly view: ContactView | undefined;

  constructor(options: AddressBookOptions = {}) {
    this.view = options.view;
  }

  get size(): number {
    return this.data.size;
  }

  addRecord(record: ContactRecord): void {
    this.data.set(record.name.value, record);
  }

  has(name: string): boolean {
    return this.data.has(name);
  }

  findRecord(name: string): ContactRecord | undefined {
    return this.data.get(name);
  }

  removeRecord(name: string): boolean {
    return this.data.delete(name);
  }

  searchRecords(criteria: SearchCriteria): ContactRecord[] {
    const results: ContactRecord[] = [];
    for (const record of this.data.values()) {
      if (matches(record, criteria)) {
        results.push(record);
      }
    }
    return results;
  }

  records(): IterableIterator<ContactRecord> {
    return this.data.values();
  }

  [Symbol.iterator](): Iterator<ContactRecord> {
    return this.records();
  }

  toSnapshot(): AddressBookSnapshot {
    return {
      version: 1,
      savedAt: new Date().toISOString(),
      records: Array.from(this.data.values(), (record) => record.toSnapshot()),
    };
  }

  saveToStorage(filePath: string): void {
    writeSnapshot(filePath, this.toSnapshot());
  }

  /**
   * Replaces every record with the file's contents.
   * A missing file empties the book; an unreadable one throws `StorageError` and changes nothing.
   */
  loadFromStorage(filePath: string): void {
    const snapshot = readSnapshot(filePath);
    if (!snapshot) {
      this.data = new Map();
      if (this.view) {
        this.view.showMessage(MISSING_FILE_MESSAGE);
      } else {
        console.warn(MISSING_FILE_MESSAGE);
      }
      return;
    }

    const next = new Map<string, ContactRecord>();
    for (const entry of snapshot.records) {
      const record = ContactRecord.fromSnapshot(entry);
      next.set(record.name.value, record);
    }
    this.data = next;
  }
}

function matches(record: ContactRecord, criteria: SearchCriteria): boolean {
  for (const [field, value] of Object.entries(criteria)) {
    if (value === undefined) continue;
    if (field === 'name' && record.name.value !== value) return false;
    if (field === 'phone' && !record.hasPhone(value)) return false;
  }
  return true;
}
