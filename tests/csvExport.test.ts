import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { toCsv, saveToCsv } from '../src/core/csvExport.js';
import type { MentionRecord } from '../src/types.js';
import { silentLogger } from './helpers.js';

const HEADER = 'Source,Thread_URL,Thread_Title,Comment_ID,Comment_Author,Comment_Date,Brand,Reason,Tariff,Comment_Text';

const record: MentionRecord = {
  source: 'Reddit',
  threadUrl: 'https://old.reddit.com/r/ev/comments/1/t/',
  threadTitle: 'Home chargers',
  recordId: 't1_a',
  author: 'volt_dad',
  capturedAt: '2025-03-01 09:30:00',
  brand: 'Ohme',
  tariff: 'Agile Octopus',
  reason: 'Ohme app is great',
  text: 'Ohme app is great, cheap too.',
};

describe('toCsv', () => {
  it('writes the header and quotes fields containing delimiters', () => {
    expect(toCsv([record])).toBe(
      `${HEADER}\n` +
      'Reddit,https://old.reddit.com/r/ev/comments/1/t/,Home chargers,t1_a,volt_dad,2025-03-01 09:30:00,' +
      'Ohme,Ohme app is great,Agile Octopus,"Ohme app is great, cheap too."\n'
    );
  });

  it('escapes embedded quotes', () => {
    const row = toCsv([{ ...record, author: 'the "ev" guy', text: 'Ohme' }]).split('\n')[1];
    expect(row).toBe(
      'Reddit,https://old.reddit.com/r/ev/comments/1/t/,Home chargers,t1_a,"the ""ev"" guy",2025-03-01 09:30:00,' +
      'Ohme,Ohme app is great,Agile Octopus,Ohme'
    );
  });
});

describe('saveToCsv', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ev-csv-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('overwrites an existing file', async () => {
    const file = path.join(dir, 'out.csv');
    await fs.writeFile(file, 'stale contents\n');

    const written = await saveToCsv([record, { ...record, recordId: 't1_b' }], file, silentLogger());

    expect(written).toBe(true);
    const lines = (await fs.readFile(file, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(HEADER);
    expect(lines[2].split(',')[3]).toBe('t1_b');
  });

  it('leaves the file untouched when there is nothing to write', async () => {
    const file = path.join(dir, 'out.csv');
    await fs.writeFile(file, 'previous run\n');
    const logger = silentLogger();
    const warnSpy = vi.spyOn(logger, 'warn');

    const written = await saveToCsv([], file, logger);

    expect(written).toBe(false);
    expect(await fs.readFile(file, 'utf-8')).toBe('previous run\n');
    expect(warnSpy).toHaveBeenCalledWith('No data to save.');
  });
});
