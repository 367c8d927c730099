import * as fs from 'fs';
import { once } from 'events';
import * as path from 'path';
import { PassThrough } from 'stream';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MISSING_FILE_MESSAGE } from '../address-book';
import { startSession } from '../cli';
import { MESSAGES } from '../commands';
import { StorageError } from '../errors';
import { readSnapshot } from '../store';
import { makeTempDir, RecordingView, removeDir } from './helpers';

describe('startSession', () => {
  let dir: string;
  let dataFile: string;

  beforeEach(() => {
    dir = makeTempDir();
    dataFile = path.join(dir, 'book.json');
  });

  afterEach(() => {
    removeDir(dir);
  });

  async function session(lines: string[], view: RecordingView): Promise<void> {
    const input = new PassThrough();
    const rl = startSession({ dataFile, prompt: '> ' }, view, input, new PassThrough());
    const closed = once(rl, 'close');
    input.end(lines.map((line) => `${line}\n`).join(''));
    await closed;
  }

  it('runs commands until exit and saves', async () => {
    const view = new RecordingView();
    await session(['add bob 123456789', 'add bob 987654321', 'exit', 'hello'], view);

    expect(view.messages).toEqual([
      MISSING_FILE_MESSAGE,
      'Contact bob with phone 123456789 added.',
      "Contact bob already exists. Use 'edit' to modify.",
      MESSAGES.farewell,
    ]);
    expect(readSnapshot(dataFile)?.records.map((r) => r.phones)).toEqual([['123456789']]);
  });

  it('saves when input ends without an exit command', async () => {
    const view = new RecordingView();
    await session(['add alice 987654321'], view);

    expect(view.messages[view.messages.length - 1]).toBe(MESSAGES.farewell);
    expect(readSnapshot(dataFile)?.records.map((r) => r.name)).toEqual(['alice']);
  });

  it('picks up the contacts saved by an earlier session', async () => {
    await session(['add alice 987654321 1990-05-15', 'exit'], new RecordingView());

    const view = new RecordingView();
    await session(['show all', 'exit'], view);
    expect(view.contacts).toEqual(['Name: alice, Birthday: 1990-05-15, Phones: 987654321']);
    expect(view.messages).toEqual([MESSAGES.farewell]);
  });

  it('refuses to start from a corrupt file', () => {
    fs.writeFileSync(dataFile, '[]', 'utf-8');
    expect(() => startSession({ dataFile, prompt: '> ' }, new RecordingView(), new PassThrough(), new PassThrough())).toThrow(
      StorageError
    );
  });
});
