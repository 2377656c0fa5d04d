import { dirname } from 'node:path';
import { errToMessage } from '../errors';
import { nodeFsOps, type FsOps } from './fs-ops';

export type ArtifactWriteResult =
  | { ok: true; path: string }
  | { ok: false; path: string; error: string };

/**
 * Best-effort write: parent directories are created, and a failure is
 * returned rather than thrown.
 */
export async function writeTextArtifact(
  path: string,
  text: string,
  fs: FsOps = nodeFsOps,
): Promise<ArtifactWriteResult> {
  try {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(path, text, 'utf8');
    return { ok: true, path };
  } catch (err) {
    return { ok: false, path, error: errToMessage(err) };
  }
}

export function serializeJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export async function writeJsonArtifact(
  path: string,
  value: unknown,
  fs: FsOps = nodeFsOps,
): Promise<ArtifactWriteResult> {
  let text: string;
  try {
    text = serializeJson(value);
  } catch (err) {
    // circular structures, BigInt
    return { ok: false, path, error: errToMessage(err) };
  }
  return await writeTextArtifact(path, text, fs);
}
