import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ContactRecord } from '../record';
import { ContactView } from '../view';

export class RecordingView implements ContactView {
  messages: string[] = [];
  errors: string[] = [];
  contacts: string[] = [];

  showMessage(message: string): void {
    this.messages.push(message);
  }

  showContact(record: ContactRecord): void {
    this.contacts.push(record.toString());
  }

  showContacts(records: Iterable<ContactRecord>): void {
    for (const record of records) {
      this.showContact(record);
    }
  }

  showError(message: string): void {
    this.errors.push(message);
  }
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'contact-book-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
