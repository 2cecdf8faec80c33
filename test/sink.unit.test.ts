import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FatalError } from '../src/errors.js';
import { CsvFileSink, project } from '../src/sink.js';

describe('CsvFileSink', () => {
  let dir: string;
  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'suppress-sink-'));
  });
  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes rows larger than the stream buffer in order', async () => {
    const big = 'x'.repeat(20_000);
    const sink = await CsvFileSink.open(path.join(dir, 'big.csv'), ['recipient', 'description']);
    for (let i = 0; i < 5; i++) await sink.write({ recipient: `r${i}@example.com`, description: big });
    await sink.close();

    const lines = fs.readFileSync(path.join(dir, 'big.csv'), 'utf8').split('\n');
    expect(sink.rows).toBe(5);
    expect(lines[0]).toBe('recipient,description');
    expect(lines.slice(1, 6).map(l => l.split(',')[0])).toEqual([
      'r0@example.com',
      'r1@example.com',
      'r2@example.com',
      'r3@example.com',
      'r4@example.com'
    ]);
    expect(lines[1]).toBe(`r0@example.com,${big}`);
  });

  it('fails close when the file cannot be opened', async () => {
    const sink = await CsvFileSink.open(dir, ['recipient']);
    await expect(sink.close()).rejects.toBeInstanceOf(FatalError);
  });
});

describe('project', () => {
  it('keeps the configured columns in order', () => {
    expect(project({ type: 'transactional', recipient: 'a@example.com', source: 'x' }, ['recipient', 'type', 'created'])).toEqual([
      'a@example.com',
      'transactional',
      undefined
    ]);
  });
});
