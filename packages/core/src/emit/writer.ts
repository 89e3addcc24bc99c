import * as fs from 'fs';
import * as path from 'path';
import { EmissionError, errorMessage } from '../errors.js';
import type { EmittedFile } from './serialize.js';

export interface WriteOptions {
  /** Progress sink, one line per document. Defaults to `console.log`. */
  log?: (message: string) => void;
  /** Directory as shown in progress lines. Defaults to `outDir`. */
  displayDir?: string;
}

function removeQuietly(files: Iterable<string>): void {
  for (const file of files) {
    fs.rmSync(file, { force: true });
  }
}

function isReplaceable(target: string): boolean {
  const stat = fs.lstatSync(target, { throwIfNoEntry: false });
  return stat === undefined || stat.isFile();
}

interface Replacement {
  target: string;
  backup?: string;
}

/**
 * Undo the renames done so far: drop the new documents and move each
 * backup over its target again.
 */
function restore(replaced: readonly Replacement[]): void {
  for (const { target, backup } of [...replaced].reverse()) {
    fs.rmSync(target, { force: true });
    if (backup) {
      fs.renameSync(backup, target);
    }
  }
}

/**
 * Write every document into `outDir`.
 *
 * All documents are staged as temporary siblings first and only then renamed
 * over their targets. Replaced documents are kept as backups until every
 * rename has succeeded, so any failure leaves the previous generation in
 * place. The first failure aborts the run.
 *
 * @returns absolute paths of the written documents
 */
export function writeDocuments(
  outDir: string,
  files: readonly EmittedFile[],
  options: WriteOptions = {}
): string[] {
  const log = options.log ?? console.log;
  const displayDir = options.displayDir ?? outDir;

  try {
    fs.mkdirSync(outDir, { recursive: true });
  } catch (error) {
    throw new EmissionError(
      `Failed to create output directory ${outDir}: ${errorMessage(error)}`,
      undefined,
      { cause: error }
    );
  }

  for (const file of files) {
    if (!isReplaceable(path.join(outDir, file.name))) {
      throw new EmissionError(
        `Failed to write ${file.name}: target exists and is not a file`,
        file.name
      );
    }
  }

  const staged = new Map<string, string>();
  for (const file of files) {
    const target = path.join(outDir, file.name);
    const temp = path.join(outDir, `.${file.name}.${process.pid}.tmp`);
    try {
      fs.writeFileSync(temp, file.contents, 'utf-8');
      staged.set(temp, target);
    } catch (error) {
      removeQuietly([...staged.keys(), temp]);
      throw new EmissionError(
        `Failed to write ${file.name}: ${errorMessage(error)}`,
        file.name,
        { cause: error }
      );
    }
  }

  const replaced: Replacement[] = [];
  const pending = new Set(staged.keys());
  for (const [temp, target] of staged) {
    const replacement: Replacement = { target };
    try {
      if (fs.existsSync(target)) {
        const backup = `${temp}.bak`;
        fs.renameSync(target, backup);
        replacement.backup = backup;
      }
      fs.renameSync(temp, target);
    } catch (error) {
      removeQuietly(pending);
      if (replacement.backup) {
        fs.renameSync(replacement.backup, target);
      }
      restore(replaced);
      throw new EmissionError(
        `Failed to write ${path.basename(target)}: ${errorMessage(error)}`,
        path.basename(target),
        { cause: error }
      );
    }
    pending.delete(temp);
    replaced.push(replacement);
  }

  const written: string[] = [];
  for (const { target, backup } of replaced) {
    if (backup) {
      fs.rmSync(backup, { force: true });
    }
    written.push(path.resolve(target));
    log(`Generated ${path.join(displayDir, path.basename(target))}`);
  }

  return written;
}
