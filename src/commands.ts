import { AddressBook } from './address-book';
import { StorageError, ValidationError } from './errors';
import { normalizePhone } from './phone';
import { ContactRecord } from './record';
import { ContactView } from './view';

export interface CommandContext {
  book: AddressBook;
  view: ContactView;
  dataFile: string;
  /** Today's date for birthday countdowns; defaults to the system clock. */
  now?: () => Date;
}

export type CommandOutcome = 'continue' | 'exit';

const EXIT_COMMANDS = ['good bye', 'close', 'exit'];
const SEARCH_FIELDS = ['name', 'phone'];
const DIGITS_ONLY = /^\d+$/;

export const MESSAGES = {
  greeting: 'How can I help you?',
  saved: 'Address book saved successfully.',
  farewell: 'Address book saved. Good bye!',
  empty: 'Address book is empty.',
  noResults: 'No matching contacts found.',
  invalidCommand: 'Invalid command. Please try again.',
} as const;

const USAGE = {
  add: 'add <name> [phone...] [YYYY-MM-DD]',
  edit: 'edit <name> <old phone> <new phone>',
  search: 'search <name|phone> <value>',
  birthday: 'birthday <name>',
} as const;

/**
 * Runs one line of input against the address book.
 * Errors are reported through the view; only the exit commands end the session.
 */
export function executeCommand(input: string, ctx: CommandContext): CommandOutcome {
  try {
    return dispatch(input, ctx);
  } catch (error) {
    if (error instanceof ValidationError || error instanceof StorageError) {
      ctx.view.showError(error.message);
    } else {
      const errMsg = error instanceof Error ? error.message : String(error);
      console.error('Command error:', error);
      ctx.view.showError(`Unexpected error: ${errMsg}`);
    }
    return 'continue';
  }
}

function dispatch(input: string, ctx: CommandContext): CommandOutcome {
  const tokens = input.trim().split(/\s+/).filter((t) => t.length > 0);
  const keyword = (tokens[0] ?? '').toLowerCase();
  const phrase = tokens.map((t) => t.toLowerCase()).join(' ');

  if (EXIT_COMMANDS.includes(phrase)) {
    ctx.book.saveToStorage(ctx.dataFile);
    ctx.view.showMessage(MESSAGES.farewell);
    return 'exit';
  }

  if (phrase === 'hello') {
    ctx.view.showMessage(MESSAGES.greeting);
  } else if (phrase === 'show all') {
    showAll(ctx);
  } else if (phrase === 'save') {
    ctx.book.saveToStorage(ctx.dataFile);
    ctx.view.showMessage(MESSAGES.saved);
  } else if (keyword === 'add') {
    addContact(tokens.slice(1), ctx);
  } else if (keyword === 'edit') {
    editContact(tokens.slice(1), ctx);
  } else if (keyword === 'search') {
    searchContacts(tokens.slice(1), ctx);
  } else if (keyword === 'birthday') {
    showBirthday(tokens.slice(1), ctx);
  } else {
    ctx.view.showError(MESSAGES.invalidCommand);
  }
  return 'continue';
}

function usage(syntax: string, ctx: CommandContext): void {
  ctx.view.showError(`Usage: ${syntax}`);
}

function addContact(args: string[], ctx: CommandContext): void {
  const [name, ...rest] = args;
  if (!name) {
    usage(USAGE.add, ctx);
    return;
  }

  if (ctx.book.has(name)) {
    ctx.view.showMessage(`Contact ${name} already exists. Use 'edit' to modify.`);
    return;
  }

  const phones = rest.filter((arg) => DIGITS_ONLY.test(arg));
  const birthday = rest.find((arg) => !DIGITS_ONLY.test(arg));

  // A bad token must leave the book untouched.
  const record = new ContactRecord(name, birthday);
  for (const phone of phones) {
    record.addPhone(phone);
  }
  ctx.book.addRecord(record);

  const phoneList = record.phones.map((p) => p.value).join(', ');
  ctx.view.showMessage(
    phoneList
      ? `Contact ${name} with phone ${phoneList} added.`
      : `Contact ${name} with no phone added.`
  );
}

function editContact(args: string[], ctx: CommandContext): void {
  if (args.length !== 3) {
    usage(USAGE.edit, ctx);
    return;
  }

  const [name, oldPhone, newPhone] = args;
  const record = ctx.book.findRecord(name);
  if (!record) {
    ctx.view.showMessage(`Contact ${name} not found.`);
    return;
  }

  if (!record.editPhone(oldPhone, newPhone)) {
    ctx.view.showMessage(`Phone ${oldPhone} not found for ${name}.`);
    return;
  }
  ctx.view.showMessage(`Phone number for ${name} changed to ${normalizePhone(newPhone)}.`);
}

function searchContacts(args: string[], ctx: CommandContext): void {
  if (args.length !== 2) {
    usage(USAGE.search, ctx);
    return;
  }

  const field = args[0].toLowerCase();
  const value = args[1];
  if (!SEARCH_FIELDS.includes(field)) {
    ctx.view.showError(`Unknown search field '${args[0]}'. Use 'name' or 'phone'.`);
    return;
  }

  const results = ctx.book.searchRecords({ [field]: value });
  if (results.length > 0) {
    ctx.view.showContacts(results);
  } else {
    ctx.view.showMessage(MESSAGES.noResults);
  }
}

function showBirthday(args: string[], ctx: CommandContext): void {
  if (args.length !== 1) {
    usage(USAGE.birthday, ctx);
    return;
  }

  const [name] = args;
  const record = ctx.book.findRecord(name);
  if (!record) {
    ctx.view.showMessage(`Contact ${name} not found.`);
    return;
  }

  const days = record.daysToBirthday(ctx.now ? ctx.now() : new Date());
  if (days === undefined) {
    ctx.view.showMessage(`${name} has no birthday set.`);
  } else if (days === 0) {
    ctx.view.showMessage(`${name}'s birthday is today!`);
  } else {
    ctx.view.showMessage(`${days} day${days === 1 ? '' : 's'} until ${name}'s birthday.`);
  }
}

function showAll(ctx: CommandContext): void {
  if (ctx.book.size === 0) {
    ctx.view.showMessage(MESSAGES.empty);
    return;
  }
  ctx.view.showContacts(ctx.book);
}
