import fs from 'fs/promises';
import path from 'path';
import {
  UsageError,
  atomicWriteJson,
  formatIssues,
  ReportSchema,
  type Report,
} from '@patchproof/shared';

export const REPORT_FILE = 'report.json';

export async function writeReport(report: Report, runDir: string): Promise<string> {
  const filePath = path.join(runDir, REPORT_FILE);
  await atomicWriteJson(filePath, report);
  return filePath;
}

/**
 * Reads a report written by an earlier run. Accepts the report file or its run directory.
 */
export async function readReport(location: string): Promise<Report> {
  const stat = await fs.stat(location).catch(() => undefined);
  if (!stat) throw new UsageError(`Report not found: ${location}`);
  const filePath = stat.isDirectory() ? path.join(location, REPORT_FILE) : location;

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    throw new UsageError(`Could not read report ${filePath}`, { cause: error });
  }
  const parsed = ReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Not a valid report: ${filePath}\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
