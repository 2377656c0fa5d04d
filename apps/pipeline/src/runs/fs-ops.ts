import {
  appendFile,
  cp,
  lstat,
  mkdir,
  readFile,
  realpath,
  rename,
  rm,
  symlink,
  unlink,
  writeFile,
} from 'node:fs/promises';

/**
 * The filesystem calls the run-directory protocol depends on. Injected so
 * tests can make individual operations fail (e.g. symlink on a filesystem
 * that does not support it).
 */
export type FsOps = {
  appendFile: typeof appendFile;
  cp: typeof cp;
  lstat: typeof lstat;
  mkdir: typeof mkdir;
  readFile: typeof readFile;
  realpath: typeof realpath;
  rename: typeof rename;
  rm: typeof rm;
  symlink: typeof symlink;
  unlink: typeof unlink;
  writeFile: typeof writeFile;
};

export const FS_OPS = Symbol('FS_OPS');

export const nodeFsOps: FsOps = {
  appendFile,
  cp,
  lstat,
  mkdir,
  readFile,
  realpath,
  rename,
  rm,
  symlink,
  unlink,
  writeFile,
};
