import fs from 'node:fs';
import path from 'node:path';

export const DEFAULT_MIRROR_FILE = 'today.jsonl';

export type WriteOutcome = 'written' | 'skipped';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function subjectFilePath(storageRoot: string, subject: string, date: string): string {
  return path.join(storageRoot, `${subject}.${date}.jsonl`);
}

export function mirrorFilePath(storageRoot: string, fileName = DEFAULT_MIRROR_FILE): string {
  return path.join(storageRoot, fileName);
}

/** One compact JSON value per line, each line newline-terminated. */
export function serializeJsonl(items: readonly unknown[]): string {
  return items.map((item) => `${JSON.stringify(item)}\n`).join('');
}

/**
 * Writes `items` as JSON-lines. Without `overwrite`, an existing file is left
 * untouched and 'skipped' is returned. Content lands via a .tmp file and a
 * rename.
 */
export function writeJsonl(filePath: string, items: readonly unknown[], opts: { overwrite: boolean }): WriteOutcome {
  if (!opts.overwrite && fs.existsSync(filePath)) return 'skipped';

  ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp`;
  try {
    fs.writeFileSync(tmpPath, serializeJsonl(items), 'utf8');
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
  return 'written';
}
