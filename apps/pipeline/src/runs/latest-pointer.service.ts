import { Inject, Injectable, Logger } from '@nestjs/common';
import { basename, dirname, join, resolve } from 'node:path';
import { ARTIFACTS, LATEST_POINTER_NAME } from '../app.constants';
import { errorCode, errToMessage, LatestPointerError } from '../errors';
import { writeJsonArtifact } from './artifact-writer';
import { FS_OPS, type FsOps } from './fs-ops';

export type LatestPointerMode = 'symlink' | 'copy';

/**
 * Diagnostic snapshot written to `links.sanity.json` in the run directory.
 * Never read back by the pipeline.
 */
export type LinksSanityRecord = {
  runDir: string;
  latestPath: string;
  mode: LatestPointerMode | null;
  symlinkAttempted: boolean;
  symlinkCreated: boolean;
  symlinkValid: boolean;
  latestExists: boolean;
  latestIsSymlink: boolean;
  latestResolved: string | null;
  errors: string[];
  checkedAt: string;
};

export type LatestPointerUpdate = {
  mode: LatestPointerMode;
  latestPath: string;
  sanity: LinksSanityRecord;
};

export function latestPointerPath(outDir: string): string {
  return join(resolve(outDir), LATEST_POINTER_NAME);
}

@Injectable()
export class LatestPointerService {
  private readonly logger = new Logger(LatestPointerService.name);

  constructor(@Inject(FS_OPS) private readonly fs: FsOps) {}

  /**
   * Repoint `<outDir>/latest` at `runDir`:
   * clear -> symlink -> validate -> (fallback) copy -> sanity record.
   *
   * Throws `LatestPointerError` only when the fallback copy fails; in that case
   * the pointer path is left absent (the copy is staged in a temp sibling and
   * renamed into place).
   */
  async update(params: {
    outDir: string;
    runDir: string;
    disableSymlink?: boolean;
  }): Promise<LatestPointerUpdate> {
    const latestPath = latestPointerPath(params.outDir);
    const runDir = await this.resolveRunDir(params.runDir);
    const errors: string[] = [];

    const stalePath = await this.clearExisting(latestPath, errors);

    const symlinkAttempted = !params.disableSymlink;
    let symlinkCreated = false;
    let symlinkValid = false;
    if (symlinkAttempted) {
      symlinkCreated = await this.tryCreateSymlink(runDir, latestPath, errors);
      if (symlinkCreated) {
        symlinkValid = await this.validateSymlink(runDir, latestPath, errors);
        if (!symlinkValid) await this.discardInvalidSymlink(latestPath, errors);
      }
    }

    let mode: LatestPointerMode | null = symlinkValid ? 'symlink' : null;
    let copyError: unknown = null;
    if (!symlinkValid) {
      try {
        await this.copyIntoPlace(runDir, latestPath);
        mode = 'copy';
      } catch (err) {
        copyError = err;
        errors.push(`copy: ${errToMessage(err)}`);
      }
    }

    if (mode !== null && stalePath !== null) {
      await this.removeStale(stalePath, errors);
    }

    const sanity = await this.buildSanityRecord({
      runDir,
      latestPath,
      mode,
      symlinkAttempted,
      symlinkCreated,
      symlinkValid,
      errors,
    });
    await this.writeSanityRecord(runDir, sanity);

    if (copyError !== null || mode === null) {
      throw new LatestPointerError(
        `Failed to copy ${runDir} to ${latestPath}: ${errToMessage(copyError)}`,
        { cause: copyError },
      );
    }

    this.logger.log(`latest -> ${runDir} (${mode})`);
    return { mode, latestPath, sanity };
  }

  private async resolveRunDir(runDir: string): Promise<string> {
    try {
      return await this.fs.realpath(runDir);
    } catch {
      return resolve(runDir);
    }
  }

  /**
   * Best-effort: always ends with the pointer path absent unless both removal
   * and the rename-aside fail. Returns where a renamed-aside pointer went.
   */
  private async clearExisting(
    latestPath: string,
    errors: string[],
  ): Promise<string | null> {
    let isRealDirectory: boolean;
    try {
      const st = await this.fs.lstat(latestPath);
      isRealDirectory = st.isDirectory() && !st.isSymbolicLink();
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        errors.push(`clear: lstat failed: ${errToMessage(err)}`);
      }
      return null;
    }

    try {
      if (isRealDirectory) {
        await this.fs.rm(latestPath, { recursive: true, force: true });
      } else {
        await this.fs.unlink(latestPath);
      }
      return null;
    } catch (err) {
      errors.push(`clear: remove failed: ${errToMessage(err)}`);
    }

    const stalePath = join(
      dirname(latestPath),
      `${basename(latestPath)}.stale-${Date.now()}`,
    );
    try {
      await this.fs.rename(latestPath, stalePath);
      this.logger.warn(`Moved stale ${latestPath} aside to ${stalePath}`);
      return stalePath;
    } catch (err) {
      errors.push(`clear: rename-aside failed: ${errToMessage(err)}`);
      return null;
    }
  }

  private async removeStale(stalePath: string, errors: string[]) {
    try {
      await this.fs.rm(stalePath, { recursive: true, force: true });
    } catch (err) {
      errors.push(`clear: stale cleanup failed: ${errToMessage(err)}`);
    }
  }

  private async tryCreateSymlink(
    runDir: string,
    latestPath: string,
    errors: string[],
  ): Promise<boolean> {
    try {
      await this.fs.symlink(runDir, latestPath, 'dir');
      return true;
    } catch (err) {
      errors.push(`symlink: not created: ${errToMessage(err)}`);
      return false;
    }
  }

  private async validateSymlink(
    runDir: string,
    latestPath: string,
    errors: string[],
  ): Promise<boolean> {
    try {
      const resolved = await this.fs.realpath(latestPath);
      if (resolved === runDir) return true;
      errors.push(`symlink: invalid: resolves to ${resolved}, expected ${runDir}`);
      return false;
    } catch (err) {
      errors.push(`symlink: invalid: ${errToMessage(err)}`);
      return false;
    }
  }

  private async discardInvalidSymlink(latestPath: string, errors: string[]) {
    try {
      await this.fs.unlink(latestPath);
    } catch (err) {
      errors.push(`symlink: unlink invalid failed: ${errToMessage(err)}`);
    }
  }

  private async copyIntoPlace(runDir: string, latestPath: string) {
    const stagingPath = join(
      dirname(latestPath),
      `${basename(latestPath)}.tmp-${Date.now()}`,
    );
    try {
      await this.fs.cp(runDir, stagingPath, { recursive: true });
      await this.fs.rename(stagingPath, latestPath);
    } catch (err) {
      await this.fs
        .rm(stagingPath, { recursive: true, force: true })
        .catch((cleanupErr: unknown) => {
          this.logger.warn(
            `Failed to remove staging copy ${stagingPath}: ${errToMessage(cleanupErr)}`,
          );
        });
      throw err;
    }
  }

  private async buildSanityRecord(
    params: Omit<
      LinksSanityRecord,
      'latestExists' | 'latestIsSymlink' | 'latestResolved' | 'checkedAt'
    >,
  ): Promise<LinksSanityRecord> {
    let latestExists = false;
    let latestIsSymlink = false;
    try {
      const st = await this.fs.lstat(params.latestPath);
      latestExists = true;
      latestIsSymlink = st.isSymbolicLink();
    } catch {
      latestExists = false;
    }

    let latestResolved: string | null = null;
    if (latestExists) {
      try {
        latestResolved = await this.fs.realpath(params.latestPath);
      } catch {
        latestResolved = null;
      }
    }

    return {
      ...params,
      errors: [...params.errors],
      latestExists,
      latestIsSymlink,
      latestResolved,
      checkedAt: new Date().toISOString(),
    };
  }

  private async writeSanityRecord(runDir: string, sanity: LinksSanityRecord) {
    const res = await writeJsonArtifact(
      join(runDir, ARTIFACTS.linksSanity),
      sanity,
      this.fs,
    );
    if (!res.ok) {
      this.logger.debug(`links sanity write skipped: ${res.error}`);
    }
  }
}
