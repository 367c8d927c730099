export interface CalendarDate {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number;
}

/**
 * Search criteria for `AddressBook.searchRecords`.
 * Only `name` and `phone` are matched; other keys are ignored.
 */
export interface SearchCriteria {
  name?: string;
  phone?: string;
  [field: string]: string | undefined;
}

export interface RecordSnapshot {
  id: string;
  name: string;
  birthday: string | null; // YYYY-MM-DD
  phones: string[];
  createdAt: string;
}

export interface AddressBookSnapshot {
  version: 1;
  savedAt: string;
  records: RecordSnapshot[];
}

export interface AppConfig {
  dataFile: string;
  prompt: string;
}
