export { AddressBook, MISSING_FILE_MESSAGE } from './address-book';
export type { AddressBookOptions } from './address-book';
export {
  Birthday,
  birthdayRule,
  daysUntilBirthday,
  formatCalendarDate,
  getNextBirthdayDate,
  parseCalendarDate,
} from './birthday';
export { executeCommand, MESSAGES } from './commands';
export type { CommandContext, CommandOutcome } from './commands';
export { loadConfig } from './config';
export { StorageError, ValidationError } from './errors';
export type { FieldKind } from './errors';
export { Field, Name, nameRule } from './fields';
export type { FieldRule } from './fields';
export { normalizePhone, Phone, phoneRule, validateAndFormatPhone } from './phone';
export { ContactRecord } from './record';
export type { ContactRecordOptions } from './record';
export { readSnapshot, writeSnapshot } from './store';
export type { AddressBookSnapshot, AppConfig, CalendarDate, RecordSnapshot, SearchCriteria } from './types';
export { ConsoleView } from './view';
export type { ContactView } from './view';
