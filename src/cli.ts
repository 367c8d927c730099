#!/usr/bin/env node
import * as readline from 'readline';
import { AddressBook } from './address-book';
import { executeCommand } from './commands';
import { loadConfig } from './config';
import { StorageError } from './errors';
import { AppConfig } from './types';
import { ConsoleView, ContactView } from './view';

export function startSession(
  config: AppConfig,
  view: ContactView = new ConsoleView(),
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): readline.Interface {
  const book = new AddressBook({ view });
  book.loadFromStorage(config.dataFile);

  const rl = readline.createInterface({ input, output, terminal: false });
  const ctx = { book, view, dataFile: config.dataFile };
  let finished = false;

  rl.setPrompt(config.prompt);
  rl.prompt();

  rl.on('line', (line) => {
    if (finished) return;
    if (executeCommand(line, ctx) === 'exit') {
      finished = true;
      rl.close();
      return;
    }
    rl.prompt();
  });

  // End of input saves the same way `close` does.
  rl.on('close', () => {
    if (!finished) {
      finished = true;
      executeCommand('close', ctx);
    }
  });

  return rl;
}

function main(): void {
  const config = loadConfig();
  const view = new ConsoleView();
  try {
    startSession(config, view);
  } catch (error) {
    if (error instanceof StorageError) {
      view.showError(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

if (require.main === module) {
  main();
}
