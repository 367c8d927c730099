import * as path from 'path';
import { AppConfig } from './types';

const DEFAULT_DATA_FILE = path.join(__dirname, '..', 'data', 'address-book.json');
const DEFAULT_PROMPT = 'Enter a command: ';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataFile = env.CONTACTS_FILE?.trim();
  return {
    dataFile: dataFile ? path.resolve(dataFile) : DEFAULT_DATA_FILE,
    prompt: env.CONTACTS_PROMPT || DEFAULT_PROMPT,
  };
}
