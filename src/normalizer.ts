import { FatalError } from './errors.js';
import { validateEmail } from './validator.js';
import {
  isSuppressionType,
  type RecordDefaults,
  type RowOutcome,
  type SuppressionRecord,
  type SuppressionType
} from './types.js';

export const RECOGNIZED_FIELDS = [
  'recipient',
  'type',
  'source',
  'description',
  'created',
  'updated',
  'subaccount_id',
  'transactional',
  'non_transactional'
] as const;
export type FieldName = (typeof RECOGNIZED_FIELDS)[number];

const FIELD_NAMES: ReadonlySet<string> = new Set(RECOGNIZED_FIELDS);

export function isFieldName(name: string): name is FieldName {
  return FIELD_NAMES.has(name);
}

export type Header = {
  fields: FieldName[];
  // headerless files: the first row is already an address
  firstRowIsData: boolean;
};

type RowFields = Partial<Record<FieldName, string>>;

export function resolveHeader(firstRow: string[]): Header {
  const cells = firstRow.map(c => c.trim());
  if (cells.includes('recipient')) {
    const fields: FieldName[] = [];
    for (const name of cells) {
      if (!isFieldName(name)) throw new FatalError(`Unexpected .csv file field name found: "${name}"`);
      fields.push(name);
    }
    return { fields, firstRowIsData: false };
  }
  if (cells.length === 1 && cells[0].includes('@')) {
    return { fields: ['recipient'], firstRowIsData: true };
  }
  throw new FatalError('Invalid .csv file header - must contain "recipient" field');
}

const stripQuotes = (s: string) => s.replace(/^["']+|["']+$/g, '').trim();

function parseFlag(raw: string): boolean | null {
  const v = stripQuotes(raw).toLowerCase();
  if (v === 'true') return true;
  if (v === 'false') return false;
  return null;
}

function resolveType(fields: RowFields, line: number): SuppressionType | null {
  if (fields.type !== undefined) {
    const t = stripQuotes(fields.type).toLowerCase();
    if (isSuppressionType(t)) return t;
    console.warn(`Line ${line}: invalid "type" = ${fields.type}`);
  }

  // deprecated pair of flags; both must be present
  if (fields.transactional !== undefined && fields.non_transactional !== undefined) {
    const trans = parseFlag(fields.transactional);
    const nonTrans = parseFlag(fields.non_transactional);
    if (trans === null) console.warn(`Line ${line}: invalid "transactional" = ${fields.transactional}`);
    if (nonTrans === null) console.warn(`Line ${line}: invalid "non_transactional" = ${fields.non_transactional}`);
    if (trans === true && nonTrans === false) return 'transactional';
    if (trans === false && nonTrans === true) return 'non_transactional';
  }
  return null;
}

export function normalizeRow(cells: string[], header: Header, line: number, defaults: RecordDefaults): RowOutcome {
  if (cells.length !== header.fields.length) {
    throw new FatalError(`Line ${line}: expected ${header.fields.length} fields, found ${cells.length}`);
  }

  const fields: RowFields = {};
  header.fields.forEach((name, i) => {
    const v = cells[i].trim();
    if (v) fields[name] = v;
  });

  if (fields.recipient === undefined) {
    console.warn(`Line ${line}: missing recipient`);
    return { valid: false, reason: 'missing recipient', line };
  }
  const check = validateEmail(fields.recipient);
  if (!check.ok) {
    console.warn(`Line ${line}: ${fields.recipient} ${check.reason}`);
    return { valid: false, reason: check.reason, line };
  }

  const type = resolveType(fields, line);
  const record: SuppressionRecord = {
    recipient: check.normalized,
    type: type ?? defaults.type,
    description: fields.description ?? defaults.description
  };
  if (fields.source !== undefined) record.source = fields.source;
  if (fields.created !== undefined) record.created = fields.created;
  if (fields.updated !== undefined) record.updated = fields.updated;
  if (fields.subaccount_id !== undefined) record.subaccount_id = fields.subaccount_id;
  if (type === null) record.typeDefaulted = true;

  return { valid: true, record, flagsDefaulted: type === null, line };
}

export function identityKey(record: SuppressionRecord): string {
  return `${record.recipient}\u0000${record.type ?? ''}`;
}
