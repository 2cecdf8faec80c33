// src/reader.ts
import fs from 'fs';
import { TextDecoder } from 'util';
import { CsvError, parse } from 'csv-parse';
import { FatalError } from './errors.js';
import { normalizeRow, resolveHeader, type Header } from './normalizer.js';
import type { RecordDefaults, RowOutcome } from './types.js';

export type DecodedFile = { text: string; encoding: string; lines: number };

type DecodeResult =
  | { ok: true; text: string }
  | { ok: false; line: number; message: string };

const NEWLINE = 0x0a;

/**
 * Decodes line by line with a fatal decoder, so a bad byte sequence can be
 * reported near the line it sits on.
 */
export function decodeAs(buf: Uint8Array, encoding: string): DecodeResult {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (e) {
    return { ok: false, line: 0, message: e instanceof Error ? e.message : String(e) };
  }

  const parts: string[] = [];
  let line = 1;
  let start = 0;
  try {
    while (start < buf.length) {
      let end = buf.indexOf(NEWLINE, start);
      end = end === -1 ? buf.length : end + 1;
      parts.push(decoder.decode(buf.subarray(start, end), { stream: true }));
      start = end;
      line++;
    }
    parts.push(decoder.decode());
  } catch (e) {
    return { ok: false, line, message: e instanceof Error ? e.message : String(e) };
  }
  return { ok: true, text: parts.join('') };
}

function countLines(text: string): number {
  if (!text) return 0;
  const breaks = text.match(/\n/g)?.length ?? 0;
  return text.endsWith('\n') ? breaks : breaks + 1;
}

export async function readWithEncodings(filePath: string, encodings: string[]): Promise<DecodedFile> {
  let buf: Buffer;
  try {
    buf = await fs.promises.readFile(filePath);
  } catch (e) {
    throw new FatalError(`Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  for (const encoding of encodings) {
    console.log(`📂 Trying file ${filePath} with encoding: ${encoding}`);
    const res = decodeAs(buf, encoding);
    if (res.ok) {
      const lines = countLines(res.text);
      console.log(`✅ File reads OK. Lines in file: ${lines}`);
      return { text: res.text, encoding, lines };
    }
    console.warn(`   Near line ${res.line}: ${res.message}`);
  }
  throw new FatalError(`${filePath} could not be read with any of the encodings: ${encodings.join(', ')}`);
}

type InfoRecord = { record: string[]; info: { lines: number } };

function isInfoRecord(value: unknown): value is InfoRecord {
  if (typeof value !== 'object' || value === null) return false;
  if (!('record' in value) || !('info' in value)) return false;
  const { record, info } = value;
  return (
    Array.isArray(record) &&
    record.every(c => typeof c === 'string') &&
    typeof info === 'object' &&
    info !== null &&
    'lines' in info &&
    typeof info.lines === 'number'
  );
}

export async function* readRows(text: string): AsyncGenerator<{ cells: string[]; line: number }> {
  // a stray quote inside a cell stays literal text; the address check rejects it
  const parser = parse(text, {
    info: true,
    relax_quotes: true,
    relax_column_count: true,
    skip_empty_lines: true
  });
  try {
    for await (const item of parser) {
      if (!isInfoRecord(item)) throw new FatalError('Unexpected CSV parser output');
      yield { cells: item.record, line: item.info.lines };
    }
  } catch (e) {
    if (e instanceof CsvError) throw new FatalError(`Cannot parse .csv file: ${e.message}`);
    throw e;
  }
}

/**
 * Streams the file's data rows through the normalizer. The first row decides
 * whether there is a header.
 */
export async function* readOutcomes(text: string, defaults: RecordDefaults): AsyncGenerator<RowOutcome> {
  let header: Header | null = null;
  for await (const { cells, line } of readRows(text)) {
    if (!header) {
      header = resolveHeader(cells);
      if (!header.firstRowIsData) continue;
    }
    yield normalizeRow(cells, header, line, defaults);
  }
}
