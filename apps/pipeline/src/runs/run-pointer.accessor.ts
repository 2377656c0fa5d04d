import { Inject, Injectable } from '@nestjs/common';
import { join, resolve } from 'node:path';
import { LAST_RUN_DIR_FILE } from '../app.constants';
import { errorCode } from '../errors';
import { FS_OPS, type FsOps } from './fs-ops';
import { latestPointerPath, type LatestPointerMode } from './latest-pointer.service';

export type ResolvedLatest = {
  path: string;
  resolved: string;
  mode: LatestPointerMode;
};

/**
 * Read side of the run pointers. Anything that wants "the newest run" goes
 * through here instead of touching `latest` or `last_run_dir.txt` directly.
 */
@Injectable()
export class RunPointerAccessor {
  constructor(@Inject(FS_OPS) private readonly fs: FsOps) {}

  lastRunDirFile(outDir: string): string {
    return join(resolve(outDir), LAST_RUN_DIR_FILE);
  }

  async resolveLatest(outDir: string): Promise<ResolvedLatest | null> {
    const path = latestPointerPath(outDir);
    let isSymlink: boolean;
    try {
      const st = await this.fs.lstat(path);
      if (!st.isSymbolicLink() && !st.isDirectory()) return null;
      isSymlink = st.isSymbolicLink();
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw err;
    }

    try {
      const resolved = await this.fs.realpath(path);
      return { path, resolved, mode: isSymlink ? 'symlink' : 'copy' };
    } catch {
      // dangling or looping symlink
      return null;
    }
  }

  async readLastRunDir(outDir: string): Promise<string | null> {
    try {
      const text = await this.fs.readFile(this.lastRunDirFile(outDir), 'utf8');
      const line = text.split(/\r?\n/)[0]?.trim() ?? '';
      return line || null;
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw err;
    }
  }

  /** Write-then-rename so readers never see a truncated path. */
  async writeLastRunDir(outDir: string, runDir: string): Promise<string> {
    const target = this.lastRunDirFile(outDir);
    const staging = `${target}.tmp-${process.pid}`;
    await this.fs.writeFile(staging, `${resolve(runDir)}\n`, 'utf8');
    await this.fs.rename(staging, target);
    return target;
  }
}
