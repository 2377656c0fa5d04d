import { mkdir, mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RunDirectoryError } from '../errors';
import { nodeFsOps } from './fs-ops';
import { formatRunDirName, RunDirectoryService } from './run-directory.service';

describe('RunDirectoryService', () => {
  const now = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(join(tmpdir(), 'picks-runs-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  it('formats run names in UTC', () => {
    expect(formatRunDirName(now)).toBe('run_20240102_030405');
  });

  it('creates the output root and the run directory', async () => {
    const svc = new RunDirectoryService(nodeFsOps);
    const root = join(outDir, 'a', 'b');
    const res = await svc.allocate({ outDir: root, now });

    expect(res).toEqual({
      name: 'run_20240102_030405',
      path: join(root, 'run_20240102_030405'),
    });
    expect((await stat(res.path)).isDirectory()).toBe(true);
  });

  it('suffixes same-second collisions', async () => {
    const svc = new RunDirectoryService(nodeFsOps);
    await mkdir(join(outDir, 'run_20240102_030405'));
    await mkdir(join(outDir, 'run_20240102_030405_2'));

    const res = await svc.allocate({ outDir, now });
    expect(res.name).toBe('run_20240102_030405_3');

    const again = await svc.allocate({ outDir, now });
    expect(again.name).toBe('run_20240102_030405_4');
  });

  it('fails fatally on any other creation error', async () => {
    const mkdirMock = jest
      .fn()
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(
        Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }),
      );
    const svc = new RunDirectoryService({ ...nodeFsOps, mkdir: mkdirMock });

    await expect(svc.allocate({ outDir, now })).rejects.toBeInstanceOf(
      RunDirectoryError,
    );
  });

  it('fails fatally when the output root cannot be created', async () => {
    const mkdirMock = jest
      .fn()
      .mockRejectedValue(Object.assign(new Error('EROFS'), { code: 'EROFS' }));
    const svc = new RunDirectoryService({ ...nodeFsOps, mkdir: mkdirMock });

    await expect(svc.allocate({ outDir, now })).rejects.toThrow(
      /Failed to create output directory/,
    );
  });
});
