import { Inject, Injectable, Logger } from '@nestjs/common';
import { join, resolve } from 'node:path';
import { RUN_DIR_PREFIX } from '../app.constants';
import { errorCode, errToMessage, RunDirectoryError } from '../errors';
import { FS_OPS, type FsOps } from './fs-ops';

// Same-second collisions get _2, _3, ... Past this something else is wrong.
const MAX_NAME_ATTEMPTS = 100;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** `run_YYYYMMDD_HHMMSS` in UTC. */
export function formatRunDirName(now: Date): string {
  const ymd = `${now.getUTCFullYear()}${pad2(now.getUTCMonth() + 1)}${pad2(now.getUTCDate())}`;
  const hms = `${pad2(now.getUTCHours())}${pad2(now.getUTCMinutes())}${pad2(now.getUTCSeconds())}`;
  return `${RUN_DIR_PREFIX}${ymd}_${hms}`;
}

export type AllocatedRunDir = {
  name: string;
  path: string;
};

@Injectable()
export class RunDirectoryService {
  private readonly logger = new Logger(RunDirectoryService.name);

  constructor(@Inject(FS_OPS) private readonly fs: FsOps) {}

  /**
   * Creates a fresh run directory under `outDir`. Creation failures are fatal:
   * nothing downstream can run without a destination.
   */
  async allocate(params: { outDir: string; now: Date }): Promise<AllocatedRunDir> {
    const outDir = resolve(params.outDir);
    try {
      await this.fs.mkdir(outDir, { recursive: true });
    } catch (err) {
      throw new RunDirectoryError(
        `Failed to create output directory ${outDir}: ${errToMessage(err)}`,
        { cause: err },
      );
    }

    const base = formatRunDirName(params.now);
    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt += 1) {
      const name = attempt === 1 ? base : `${base}_${attempt}`;
      const path = join(outDir, name);
      try {
        // Non-recursive on purpose: EEXIST tells us the name is taken.
        await this.fs.mkdir(path);
        if (attempt > 1) {
          this.logger.warn(`Run directory ${base} already existed; using ${name}`);
        }
        return { name, path };
      } catch (err) {
        if (errorCode(err) === 'EEXIST') continue;
        throw new RunDirectoryError(
          `Failed to create run directory ${path}: ${errToMessage(err)}`,
          { cause: err },
        );
      }
    }

    throw new RunDirectoryError(
      `Failed to allocate a unique run directory for ${base} after ${MAX_NAME_ATTEMPTS} attempts`,
    );
  }
}
