import path from 'node:path';

import fse from 'fs-extra';

export type JsonReadResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: 'missing' | 'unreadable' | 'malformed'; error: string | null };

function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let text: string;
  try {
    if (!(await fse.pathExists(filePath))) {
      return { ok: false, reason: 'missing', error: null };
    }
    text = await fse.readFile(filePath, 'utf-8');
  } catch (err) {
    return { ok: false, reason: 'unreadable', error: toErrorMessage(err) };
  }

  if (text.trim().length === 0) {
    return { ok: false, reason: 'malformed', error: 'File is empty' };
  }

  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (err) {
    return { ok: false, reason: 'malformed', error: toErrorMessage(err) };
  }
}

// Write to a sibling temp file, then rename over the destination. A reader never
// sees a half-written file, and an interrupted run leaves the previous file intact.
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fse.ensureDir(dir);

  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fse.writeFile(tmp, contents, 'utf-8');
    await fse.rename(tmp, filePath);
  } catch (err) {
    await fse.remove(tmp).catch(() => undefined);
    throw err;
  }
}
