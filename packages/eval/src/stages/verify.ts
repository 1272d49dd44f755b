import { getPath, isRecord, type FieldValue, type RecordExpectation } from '@patchproof/shared';

export interface VerificationResult {
  ok: boolean;
  message: string;
  recordCount: number;
}

/**
 * Records from query output: `result.records`, `records`, or a top-level array.
 */
export function extractRecords(json: unknown): unknown[] | undefined {
  if (Array.isArray(json)) return json;
  for (const path of ['result.records', 'records']) {
    const value = getPath(json, path);
    if (Array.isArray(value)) return value;
  }
  return undefined;
}

function display(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function sameValue(actual: unknown, expected: FieldValue): boolean {
  if (actual === expected) return true;
  // Query output often renders numbers and booleans as strings
  return expected !== null && actual !== null && actual !== undefined && String(actual) === String(expected);
}

/**
 * Checks query records against an expectation. Every record must carry every expected field value.
 */
export function verifyRecords(records: unknown[], expect: RecordExpectation): VerificationResult {
  const recordCount = records.length;
  if (expect.recordCount !== undefined && recordCount !== expect.recordCount) {
    return {
      ok: false,
      message: `Expected ${expect.recordCount} records, got ${recordCount}`,
      recordCount,
    };
  }

  for (const { field, value } of expect.fields ?? []) {
    if (recordCount === 0) {
      return { ok: false, message: `No records to check field ${field}`, recordCount };
    }
    for (const record of records) {
      const actual = isRecord(record) ? getPath(record, field) : undefined;
      if (!sameValue(actual, value)) {
        return {
          ok: false,
          message: `Field ${field} expected '${display(value)}', got '${display(actual)}'`,
          recordCount,
        };
      }
    }
  }

  return { ok: true, message: `Verified ${recordCount} records`, recordCount };
}
