export const SUPPRESSION_TYPES = ['transactional', 'non_transactional'] as const;
export type SuppressionType = (typeof SUPPRESSION_TYPES)[number];

export function isSuppressionType(value: string): value is SuppressionType {
  return value === 'transactional' || value === 'non_transactional';
}

export type SuppressionRecord = {
  recipient: string;
  type?: SuppressionType;
  description?: string;
  source?: string;
  created?: string;
  updated?: string;
  subaccount_id?: string;
  // type came from TYPE_DEFAULT, not from the row
  typeDefaulted?: boolean;
};

export type RowOutcome =
  | { valid: true; record: SuppressionRecord; flagsDefaulted: boolean; line: number }
  | { valid: false; reason: string; line: number };

export type RunSummary = {
  checked: number;
  goodRecips: number;
  badRecips: number;
  duplicateRecips: number;
  doneRecips: number;
  flagsGood: number;
  flagsDefaulted: number;
};

export type RecordDefaults = {
  type: SuppressionType;
  description: string;
};

// One row of the remote listing; fields beyond the known ones are kept as-is.
export type RemoteEntry = Record<string, unknown>;
