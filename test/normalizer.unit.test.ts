import { describe, it, expect } from 'vitest';
import { FatalError } from '../src/errors.js';
import { identityKey, normalizeRow, resolveHeader, type Header } from '../src/normalizer.js';
import type { RecordDefaults } from '../src/types.js';
import { silenceConsole } from './helpers.js';

const defaults: RecordDefaults = { type: 'non_transactional', description: 'Imported' };

describe('resolveHeader', () => {
  it('takes a first row containing recipient as the header', () => {
    expect(resolveHeader(['recipient', ' type ', 'description'])).toEqual({
      fields: ['recipient', 'type', 'description'],
      firstRowIsData: false
    });
  });

  it('treats a single bare address as data with a synthesized header', () => {
    expect(resolveHeader([' someone@example.com '])).toEqual({ fields: ['recipient'], firstRowIsData: true });
  });

  it('fails on an unrecognized field name', () => {
    expect(() => resolveHeader(['recipient', 'colour'])).toThrow(FatalError);
    expect(() => resolveHeader(['recipient', 'colour'])).toThrow('Unexpected .csv file field name found: "colour"');
  });

  it('fails when there is neither a recipient column nor a bare address', () => {
    expect(() => resolveHeader(['email', 'name'])).toThrow('Invalid .csv file header - must contain "recipient" field');
    expect(() => resolveHeader(['a@example.com', 'x'])).toThrow(FatalError);
  });
});

describe('normalizeRow', () => {
  silenceConsole();

  const typed: Header = { fields: ['recipient', 'type', 'description'], firstRowIsData: false };
  const flags: Header = { fields: ['recipient', 'transactional', 'non_transactional'], firstRowIsData: false };

  it('fails the run on a row/header length mismatch', () => {
    expect(() => normalizeRow(['a@example.com'], typed, 5, defaults)).toThrow('Line 5: expected 3 fields, found 1');
  });

  it('lower-cases the recipient and keeps a good type', () => {
    expect(normalizeRow([' Bob@Example.COM ', '"Transactional"', 'vip'], typed, 2, defaults)).toEqual({
      valid: true,
      record: { recipient: 'bob@example.com', type: 'transactional', description: 'vip' },
      flagsDefaulted: false,
      line: 2
    });
  });

  it('applies the default description when the cell is empty', () => {
    const out = normalizeRow(['a@example.com', 'non_transactional', '  '], typed, 2, defaults);
    expect(out).toEqual({
      valid: true,
      record: { recipient: 'a@example.com', type: 'non_transactional', description: 'Imported' },
      flagsDefaulted: false,
      line: 2
    });
  });

  it('defaults an invalid type and counts it as defaulted', () => {
    const out = normalizeRow(['a@example.com', 'marketing', ''], typed, 3, defaults);
    expect(out).toEqual({
      valid: true,
      record: { recipient: 'a@example.com', type: 'non_transactional', description: 'Imported', typeDefaulted: true },
      flagsDefaulted: true,
      line: 3
    });
    expect(console.warn).toHaveBeenCalledWith('Line 3: invalid "type" = marketing');
  });

  it('resolves the deprecated flag pair', () => {
    const t = normalizeRow(['a@example.com', 'TRUE', 'false'], flags, 2, defaults);
    const n = normalizeRow(['b@example.com', '"false"', 'True'], flags, 3, defaults);
    expect(t.valid && t.record.type).toBe('transactional');
    expect(n.valid && n.record.type).toBe('non_transactional');
    expect(t.valid && t.flagsDefaulted).toBe(false);
  });

  it('defaults when the flag pair does not name exactly one type', () => {
    const both = normalizeRow(['a@example.com', 'true', 'true'], flags, 2, defaults);
    const junk = normalizeRow(['a@example.com', 'yes', 'false'], flags, 3, defaults);
    expect(both.valid && both.flagsDefaulted).toBe(true);
    expect(junk.valid && junk.flagsDefaulted).toBe(true);
    expect(console.warn).toHaveBeenCalledWith('Line 3: invalid "transactional" = yes');
  });

  it('defaults when only one of the deprecated flags is present', () => {
    const header: Header = { fields: ['recipient', 'transactional'], firstRowIsData: false };
    const out = normalizeRow(['a@example.com', 'true'], header, 2, defaults);
    expect(out.valid && out.record.type).toBe('non_transactional');
    expect(out.valid && out.flagsDefaulted).toBe(true);
  });

  it('marks a bad address invalid with a line-numbered diagnostic', () => {
    const out = normalizeRow(['not-an-address', 'transactional', ''], typed, 7, defaults);
    expect(out).toEqual({
      valid: false,
      reason: 'The email address is not valid. It must have exactly one @-sign.',
      line: 7
    });
    expect(console.warn).toHaveBeenCalledWith(
      'Line 7: not-an-address The email address is not valid. It must have exactly one @-sign.'
    );
  });

  it('marks a row without a recipient invalid', () => {
    expect(normalizeRow(['', 'transactional', 'x'], typed, 4, defaults)).toEqual({
      valid: false,
      reason: 'missing recipient',
      line: 4
    });
  });

  it('carries passthrough fields', () => {
    const header: Header = {
      fields: ['recipient', 'source', 'created', 'updated', 'subaccount_id'],
      firstRowIsData: false
    };
    const out = normalizeRow(['a@example.com', 'Manually Added', '2023-01-01', '2023-02-01', '12'], header, 2, defaults);
    expect(out.valid && out.record).toEqual({
      recipient: 'a@example.com',
      type: 'non_transactional',
      description: 'Imported',
      source: 'Manually Added',
      created: '2023-01-01',
      updated: '2023-02-01',
      subaccount_id: '12',
      typeDefaulted: true
    });
  });
});

describe('identityKey', () => {
  it('separates the same recipient with different types', () => {
    expect(identityKey({ recipient: 'a@example.com', type: 'transactional' })).not.toBe(
      identityKey({ recipient: 'a@example.com', type: 'non_transactional' })
    );
    expect(identityKey({ recipient: 'a@example.com' })).toBe(identityKey({ recipient: 'a@example.com' }));
  });
});
