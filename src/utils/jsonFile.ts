// JSON persistence helpers for the scan state files

import { promises as fs } from 'node:fs';
import path from 'node:path';

/**
 * Write `data` as JSON so readers only ever see the old or the new file:
 * temp file in the target's directory, then rename over the target.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export type JsonReadResult =
  | { ok: true; data: unknown }
  | { ok: false; reason: 'missing' | 'unreadable' | 'malformed'; message: string };

export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    return {
      ok: false,
      reason: missing ? 'missing' : 'unreadable',
      message: error instanceof Error ? error.message : String(error)
    };
  }

  try {
    const data: unknown = JSON.parse(text);
    return { ok: true, data };
  } catch (error) {
    return { ok: false, reason: 'malformed', message: error instanceof Error ? error.message : String(error) };
  }
}
