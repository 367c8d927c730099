import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parseCalendarDate } from './birthday';
import { StorageError, ValidationError } from './errors';
import { isNormalizedPhone } from './phone';
import { AddressBookSnapshot } from './types';

const isoDate = z.string().refine(
  (value) => {
    try {
      parseCalendarDate(value);
      return true;
    } catch (error) {
      if (error instanceof ValidationError) return false;
      throw error;
    }
  },
  { message: 'Birthday must be a YYYY-MM-DD date' }
);

const RecordSnapshotSchema = z.object({
  id: z.string().min(1),
  name: z.string().refine((value) => value.trim().length > 0, { message: 'Name is required' }),
  birthday: isoDate.nullable(),
  phones: z.array(z.string().refine(isNormalizedPhone, { message: 'Phone must be 9 digits' })),
  createdAt: z.string(),
});

const AddressBookSnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  records: z.array(RecordSnapshotSchema),
});

function ensureDataDir(filePath: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Reads a snapshot file. Returns null when the file does not exist.
 */
export function readSnapshot(filePath: string): AddressBookSnapshot | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const errMsg = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Could not read address book ${filePath}: ${errMsg}`, filePath, error);
  }

  const result = AddressBookSnapshotSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.join('.') || 'root';
    throw new StorageError(
      `Address book ${filePath} is invalid at ${where}: ${issue.message}`,
      filePath,
      result.error
    );
  }
  return result.data;
}

export function writeSnapshot(filePath: string, snapshot: AddressBookSnapshot): void {
  try {
    ensureDataDir(filePath);
    fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2), 'utf-8');
  } catch (error) {
    const errMsg = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Could not write address book ${filePath}: ${errMsg}`, filePath, error);
  }
}
