import { ContactRecord } from './record';

/**
 * Everything the address book and command layer show to the user goes through here.
 */
export interface ContactView {
  showMessage(message: string): void;
  showContact(record: ContactRecord): void;
  showContacts(records: Iterable<ContactRecord>): void;
  showError(message: string): void;
}

export class ConsoleView implements ContactView {
  showMessage(message: string): void {
    console.log(message);
  }

  showContact(record: ContactRecord): void {
    console.log(record.toString());
  }

  showContacts(records: Iterable<ContactRecord>): void {
    for (const record of records) {
      this.showContact(record);
    }
  }

  showError(message: string): void {
    console.error(`Error: ${message}`);
  }
}
