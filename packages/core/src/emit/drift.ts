import * as fs from 'fs';
import * as path from 'path';
import { compareKeys } from '../util.js';
import { SCHEMA_SUFFIX, type EmittedFile } from './serialize.js';

export interface DriftReport {
  /** Documents the run produces that are not on disk. */
  missing: string[];
  /** Documents on disk whose contents differ from the run's. */
  changed: string[];
  /** Schema documents on disk the run would not produce. */
  extra: string[];
}

function listSchemaFiles(outDir: string): string[] {
  if (!fs.existsSync(outDir)) {
    return [];
  }
  return fs
    .readdirSync(outDir)
    .filter((name) => name.endsWith(SCHEMA_SUFFIX))
    .sort(compareKeys);
}

/**
 * Compare freshly rendered documents with what `outDir` holds.
 */
export function checkDrift(
  outDir: string,
  files: readonly EmittedFile[]
): DriftReport {
  const report: DriftReport = { missing: [], changed: [], extra: [] };
  const expected = new Set<string>();

  for (const file of files) {
    expected.add(file.name);
    const target = path.join(outDir, file.name);
    if (!fs.existsSync(target)) {
      report.missing.push(file.name);
    } else if (fs.readFileSync(target, 'utf-8') !== file.contents) {
      report.changed.push(file.name);
    }
  }

  report.extra = listSchemaFiles(outDir).filter((name) => !expected.has(name));
  return report;
}

export function hasDrift(report: DriftReport): boolean {
  return (
    report.missing.length > 0 ||
    report.changed.length > 0 ||
    report.extra.length > 0
  );
}
