import { getPath, isRecord } from '@patchproof/shared';

export interface TestSummary {
  passed: number;
  failed: number;
  total: number;
  /** Percentage 0-100, when the runner reported one */
  coverage?: number;
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\s*\d+(\.\d+)?\s*%?\s*$/.test(value)) {
    return parseFloat(value);
  }
  return undefined;
}

function first(record: Record<string, unknown>, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = toNumber(record[key]);
    if (value !== undefined) return value;
  }
  return undefined;
}

function fromJson(json: unknown): TestSummary | undefined {
  const candidates = [getPath(json, 'result.summary'), getPath(json, 'summary'), json];
  for (const candidate of candidates) {
    if (!isRecord(candidate)) continue;
    const passed = first(candidate, ['passing', 'passed', 'numPassedTests']);
    const failed = first(candidate, ['failing', 'failed', 'numFailedTests']);
    if (passed === undefined && failed === undefined) continue;
    const total =
      first(candidate, ['testsRan', 'total', 'numTotalTests']) ?? (passed ?? 0) + (failed ?? 0);
    return {
      passed: passed ?? total - (failed ?? 0),
      failed: failed ?? total - (passed ?? 0),
      total,
      coverage: first(candidate, ['testRunCoverage', 'orgWideCoverage', 'coverage']),
    };
  }
  return undefined;
}

function match(text: string, re: RegExp): number | undefined {
  const m = re.exec(text);
  return m ? Number(m[1]) : undefined;
}

function fromText(text: string): TestSummary | undefined {
  const coverage = match(text, /coverage[^\d\n]*(\d+(?:\.\d+)?)\s*%/i);

  // "Tests:       1 failed, 3 passed, 4 total"
  const jestLine = /^\s*Tests:.*\btotal\b.*$/m.exec(text)?.[0];
  if (jestLine) {
    const passed = match(jestLine, /(\d+) passed/) ?? 0;
    const failed = match(jestLine, /(\d+) failed/) ?? 0;
    const total = match(jestLine, /(\d+) total/) ?? passed + failed;
    return { passed, failed, total, coverage };
  }

  // "3 passing" / "1 failing"
  const passing = match(text, /(\d+) passing\b/);
  const failing = match(text, /(\d+) failing\b/);
  if (passing !== undefined || failing !== undefined) {
    const passed = passing ?? 0;
    const failed = failing ?? 0;
    return { passed, failed, total: passed + failed, coverage };
  }

  return undefined;
}

/**
 * Pass/fail counts from a test run's output. JSON summaries win over text.
 */
export function parseTestSummary(json: unknown, text: string): TestSummary | undefined {
  return fromJson(json) ?? fromText(text);
}
