import { mkdir, mkdtemp, readFile, realpath, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { nodeFsOps } from './fs-ops';
import { RunPointerAccessor } from './run-pointer.accessor';

describe('RunPointerAccessor', () => {
  let outDir: string;
  const accessor = new RunPointerAccessor(nodeFsOps);

  beforeEach(async () => {
    outDir = await realpath(await mkdtemp(join(tmpdir(), 'picks-pointers-')));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  it('returns null when nothing has run yet', async () => {
    expect(await accessor.resolveLatest(outDir)).toBeNull();
    expect(await accessor.readLastRunDir(outDir)).toBeNull();
  });

  it('resolves a symlinked latest', async () => {
    const runDir = join(outDir, 'run_1');
    await mkdir(runDir);
    await symlink(runDir, join(outDir, 'latest'), 'dir');

    expect(await accessor.resolveLatest(outDir)).toEqual({
      path: join(outDir, 'latest'),
      resolved: runDir,
      mode: 'symlink',
    });
  });

  it('reports a copied latest as copy mode', async () => {
    await mkdir(join(outDir, 'latest'));
    const res = await accessor.resolveLatest(outDir);
    expect(res?.mode).toBe('copy');
  });

  it('treats a dangling latest as absent', async () => {
    await symlink(join(outDir, 'missing'), join(outDir, 'latest'), 'dir');
    expect(await accessor.resolveLatest(outDir)).toBeNull();
  });

  it('treats a plain file named latest as absent', async () => {
    await writeFile(join(outDir, 'latest'), 'not a directory', 'utf8');
    expect(await accessor.resolveLatest(outDir)).toBeNull();
  });

  it('writes and reads last_run_dir.txt', async () => {
    const runDir = join(outDir, 'run_20240102_030405');
    const file = await accessor.writeLastRunDir(outDir, runDir);

    expect(file).toBe(join(outDir, 'last_run_dir.txt'));
    expect(await readFile(file, 'utf8')).toBe(`${runDir}\n`);
    expect(await accessor.readLastRunDir(outDir)).toBe(runDir);

    const next = join(outDir, 'run_20240102_030406');
    await accessor.writeLastRunDir(outDir, next);
    expect(await accessor.readLastRunDir(outDir)).toBe(next);
  });
});
