import { describe, it, expect } from 'vitest';
import { SourceFetcher, archivePathFor } from '../tools/source/fetcher.js';
import { FetchError } from '../errors.js';
import type { SourceArtifact, TargetFamily } from '../types/contracts.js';
import { FakeDownloader, FakeRunner, MemoryFileSystem, STAGING } from './fakes.js';

const REPO = 'https://example.test/jasper.git';
const DEST = '/work/src/jasper';

function setup(
  fs = new MemoryFileSystem(),
  runner = new FakeRunner(),
  downloader = new FakeDownloader(),
  target: TargetFamily = 'posix',
) {
  return { fs, runner, downloader, fetcher: new SourceFetcher(fs, runner, downloader, { target, stagingDir: STAGING }) };
}

describe('fetchRepository', () => {
  it('clones when the destination is absent', async () => {
    const { fetcher, runner } = setup();
    const res = await fetcher.fetchRepository(REPO, DEST, { depth: 1 });
    expect(res.ok).toBe(true);
    expect(runner.lines()).toEqual([`git clone --depth 1 ${REPO} ${DEST}`]);
  });

  it('does nothing for a valid checkout without refresh', async () => {
    const { fetcher, runner, downloader } = setup(new MemoryFileSystem({ dirs: [`${DEST}/.git`] }));
    const res = await fetcher.fetchRepository(REPO, DEST, { refresh: false });
    expect(res.ok).toBe(true);
    expect(runner.calls).toEqual([]);
    expect(downloader.urls).toEqual([]);
  });

  it('pulls in place when refresh is requested', async () => {
    const { fetcher, runner } = setup(new MemoryFileSystem({ dirs: [`${DEST}/.git`] }));
    await fetcher.fetchRepository(REPO, DEST, { refresh: true });
    expect(runner.lines()).toEqual([`git -C ${DEST} pull --ff-only`]);
  });

  it('refuses to touch a directory that is not a checkout', async () => {
    const { fetcher, runner, fs } = setup(new MemoryFileSystem({ files: [`${DEST}/notes.txt`] }));
    const res = await fetcher.fetchRepository(REPO, DEST);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(FetchError);
    expect(res.error.message).toBe(`${DEST} exists but is not a git checkout; rerun with --force-clean to replace it`);
    expect(runner.calls).toEqual([]);
    expect(fs.removed).toEqual([]);
  });

  it('replaces a foreign directory when forceClean is set', async () => {
    const { fetcher, runner, fs } = setup(new MemoryFileSystem({ files: [`${DEST}/notes.txt`] }));
    const res = await fetcher.fetchRepository(REPO, DEST, { forceClean: true });
    expect(res.ok).toBe(true);
    expect(fs.removed).toEqual([DEST]);
    expect(runner.lines()).toEqual([`git clone ${REPO} ${DEST}`]);
  });

  it('clones into an existing empty directory', async () => {
    const { fetcher, runner } = setup(new MemoryFileSystem({ dirs: [DEST] }));
    await fetcher.fetchRepository(REPO, DEST, { branch: 'main' });
    expect(runner.lines()).toEqual([`git clone --branch main ${REPO} ${DEST}`]);
  });

  it('carries the git output on a failed clone', async () => {
    const runner = new FakeRunner(() => ({ ok: false, exitCode: 128, stderr: 'fatal: repository not found\n' }));
    const { fetcher } = setup(undefined, runner);
    const res = await fetcher.fetchRepository(REPO, DEST);
    if (res.ok) throw new Error('expected failure');
    expect(res.error.message).toBe(`git clone ${REPO} failed (exit 128)`);
    expect(res.error.output).toBe('fatal: repository not found');
  });
});

describe('fetchArchive', () => {
  const URL_ = 'https://example.test/tessdata/spa.traineddata';
  const FILE = '/data/tessdata/spa.traineddata';
  const STAGED = `${STAGING}/spa.traineddata`;

  it('treats an existing file as success without downloading', async () => {
    const { fetcher, downloader } = setup(new MemoryFileSystem({ files: [FILE] }));
    const res = await fetcher.fetchArchive(URL_, FILE);
    expect(res.ok).toBe(true);
    expect(downloader.urls).toEqual([]);
  });

  it('stages a missing file and installs it with elevation', async () => {
    const { fetcher, fs, runner, downloader } = setup();
    const res = await fetcher.fetchArchive(URL_, FILE);
    expect(res.ok).toBe(true);
    expect(downloader.urls).toEqual([URL_]);
    expect(runner.lines()).toEqual([`install -D -m 644 ${STAGED} ${FILE}`]);
    expect(runner.calls[0].opts).toEqual({ elevated: true });
    expect(fs.removed).toEqual([STAGED]);
    expect(fs.files.has(STAGED)).toBe(false);
  });

  it('writes the file in place on windows', async () => {
    const { fetcher, fs, runner } = setup(undefined, undefined, undefined, 'windows');
    await fetcher.fetchArchive(URL_, FILE);
    expect(runner.calls).toEqual([]);
    expect(new TextDecoder().decode(fs.files.get(FILE))).toBe(`body of ${URL_}`);
  });

  it('downloads again over an existing file when forceClean is set', async () => {
    const { fetcher, runner, downloader } = setup(new MemoryFileSystem({ files: [FILE] }));
    await fetcher.fetchArchive(URL_, FILE, { forceClean: true });
    expect(downloader.urls).toEqual([URL_]);
    expect(runner.lines()).toEqual([`install -D -m 644 ${STAGED} ${FILE}`]);
  });

  it('reports a failed install and drops the staged copy', async () => {
    const runner = new FakeRunner(() => ({ ok: false, stderr: 'install: cannot create regular file\n' }));
    const { fetcher, fs } = setup(undefined, runner);
    const res = await fetcher.fetchArchive(URL_, FILE);
    if (res.ok) throw new Error('expected failure');
    expect(res.error.message).toBe(`installing ${FILE} failed (exit 1)`);
    expect(res.error.output).toBe('install: cannot create regular file');
    expect(fs.removed).toEqual([STAGED]);
  });

  it('reports download failures', async () => {
    const { fetcher, runner } = setup(undefined, undefined, new FakeDownloader(new Set([URL_])));
    const res = await fetcher.fetchArchive(URL_, FILE);
    if (res.ok) throw new Error('expected failure');
    expect(res.error.message).toBe(`download of ${URL_} failed: HTTP 404 for ${URL_}`);
    expect(runner.calls).toEqual([]);
  });
});

describe('fetch (extracted archives)', () => {
  const ZLIB = 'https://example.test/dl/zlib-1.3.1.tar.gz';
  const TARBALL = '/work/src/zlib-1.3.1.tar.gz';
  const artifact: SourceArtifact = {
    origin: { type: 'archive', url: ZLIB, version: '1.3.1', extract: true },
    localPath: '/work/src/zlib',
    candidates: [],
  };

  it('unpacks into the artifact directory', async () => {
    const { fetcher, runner, downloader } = setup();
    const res = await fetcher.fetch(artifact);
    expect(res.ok).toBe(true);
    expect(downloader.urls).toEqual([ZLIB]);
    expect(runner.lines()).toEqual([`tar -xf ${TARBALL} -C /work/src/zlib --strip-components=1`]);
  });

  it('skips extraction when the directory already holds files', async () => {
    const fs = new MemoryFileSystem({ files: [TARBALL, '/work/src/zlib/configure'] });
    const { fetcher, runner, downloader } = setup(fs);
    await fetcher.fetch(artifact);
    expect(runner.calls).toEqual([]);
    expect(downloader.urls).toEqual([]);
  });

  it('does not download again once the archive is gone but the tree is extracted', async () => {
    const { fetcher, runner, downloader } = setup(new MemoryFileSystem({ files: ['/work/src/zlib/configure'] }));
    const res = await fetcher.fetch(artifact);
    expect(res.ok).toBe(true);
    expect(downloader.urls).toEqual([]);
    expect(runner.calls).toEqual([]);
  });

  it('removes a partial extraction so the next run extracts again', async () => {
    const fs = new MemoryFileSystem({ files: [TARBALL] });
    let tarRuns = 0;
    const runner = new FakeRunner(() => {
      tarRuns++;
      if (tarRuns > 1) return undefined;
      fs.addFile('/work/src/zlib/partial.c');
      return { ok: false, exitCode: 2, stderr: 'tar: Unexpected EOF in archive' };
    });
    const { fetcher } = setup(fs, runner);

    const first = await fetcher.fetch(artifact);
    if (first.ok) throw new Error('expected failure');
    expect(first.error.message).toBe(`extracting ${TARBALL} failed (exit 2)`);
    expect(await fs.hasEntries('/work/src/zlib')).toBe(false);

    const second = await fetcher.fetch(artifact);
    expect(second.ok).toBe(true);
    expect(tarRuns).toBe(2);
  });

  it('replaces archive and tree when forceClean is set', async () => {
    const fs = new MemoryFileSystem({ files: [TARBALL, '/work/src/zlib/configure'] });
    const { fetcher, runner, downloader } = setup(fs);
    await fetcher.fetch(artifact, true);
    expect(fs.removed).toEqual([TARBALL, '/work/src/zlib']);
    expect(downloader.urls).toEqual([ZLIB]);
    expect(runner.lines()).toEqual([`tar -xf ${TARBALL} -C /work/src/zlib --strip-components=1`]);
  });
});

describe('archivePathFor', () => {
  it('prefixes the version when the file name lacks it', () => {
    expect(archivePathFor({
      origin: { type: 'archive', url: 'https://example.test/releases/download/v2/source.tar.gz', version: '2.0' },
      localPath: '/work/src/lib',
      candidates: [],
    })).toBe('/work/src/2.0-source.tar.gz');
  });
});
