import { Logger } from '@nestjs/common';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export type BootstrapEnv = {
  repoRoot: string;
  dataDir: string;
};

function parseUmask(raw: string | undefined): number | null {
  const v = raw?.trim();
  if (!v) return null;
  let s = v.toLowerCase();
  if (s.startsWith('0o')) s = s.slice(2);
  // Support "22" / "022" / "0022"
  if (!/^[0-7]{1,4}$/.test(s)) return null;
  return Number.parseInt(s, 8);
}

export async function ensureBootstrapEnv(): Promise<BootstrapEnv> {
  // The scheduler (cron, CI workflow) starts us from the checkout root.
  const repoRoot = process.cwd();

  // APP_UMASK (octal) applies to run directories and their artifacts.
  const desiredUmask = parseUmask(process.env.APP_UMASK);
  if (desiredUmask !== null) {
    try {
      process.umask(desiredUmask);
    } catch (err) {
      new Logger('Bootstrap').warn(
        `APP_UMASK ignored: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  const dataDir = process.env.APP_DATA_DIR?.trim() || join(repoRoot, 'data');
  process.env.APP_DATA_DIR = dataDir;
  await mkdir(dataDir, { recursive: true });

  return { repoRoot, dataDir };
}
