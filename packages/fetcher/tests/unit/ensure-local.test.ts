import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NotFoundError, UnauthorizedError } from '@model-bootstrap/utils';
import { ensureLocal, fetchArtifact } from '../../src/ensure-local.js';
import { FetchStatus } from '../../src/types.js';
import type { ArtifactSpec } from '../../src/types.js';
import { FakeHub, RecordingReporter, contentFor } from '../helpers/fake-hub.js';

describe('ensureLocal', () => {
  let workDir: string;
  let modelsDir: string;
  let hub: FakeHub;
  let reporter: RecordingReporter;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'ensure-local-'));
    modelsDir = path.join(workDir, 'models');
    hub = new FakeHub(path.join(workDir, 'cache'));
    reporter = new RecordingReporter();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  function specFor(sourcePath: string, subdir = 'vae', destinationName?: string): ArtifactSpec {
    return {
      sourceId: 'org/repo',
      sourcePath,
      destinationDir: path.join(modelsDir, subdir),
      destinationName,
    };
  }

  it('makes no hub call when the destination exists', async () => {
    const spec = specFor('model.safetensors');
    await mkdir(spec.destinationDir, { recursive: true });
    await writeFile(path.join(spec.destinationDir, 'model.safetensors'), 'truncated');

    await expect(ensureLocal(spec, 'test-secret', { hub, reporter })).resolves.toBe(true);

    expect(hub.callCount).toBe(0);
    expect(reporter.events).toEqual([['alreadyPresent', 'model.safetensors']]);
    expect(await readFile(path.join(spec.destinationDir, 'model.safetensors'), 'utf8')).toBe(
      'truncated'
    );
  });

  it('downloads and copies a missing artifact', async () => {
    const spec = specFor('split_files/vae/flux2-vae.safetensors');
    const expected = contentFor('org/repo', 'split_files/vae/flux2-vae.safetensors');

    const outcome = await fetchArtifact(spec, undefined, { hub, reporter });

    const destination = path.join(modelsDir, 'vae', 'flux2-vae.safetensors');
    expect(outcome).toEqual({
      status: FetchStatus.Downloaded,
      name: 'flux2-vae.safetensors',
      destination,
      source: 'org/repo/split_files/vae/flux2-vae.safetensors',
      sizeBytes: expected.length,
    });
    expect(await readFile(destination, 'utf8')).toBe(expected);
    expect(reporter.named('downloading')).toEqual([
      ['downloading', 'flux2-vae.safetensors', 'org/repo/split_files/vae/flux2-vae.safetensors'],
    ]);
    expect(reporter.named('progress')).toEqual([['progress', 'flux2-vae.safetensors']]);
    expect(reporter.named('done')).toEqual([['done', 'flux2-vae.safetensors', expected.length]]);
  });

  it('passes the credential to the hub', async () => {
    await ensureLocal(specFor('model.safetensors'), 'test-secret', { hub });

    expect(hub.downloads).toEqual([
      { sourceId: 'org/repo', sourcePath: 'model.safetensors', token: 'test-secret' },
    ]);
  });

  it('saves under the destination name override', async () => {
    await ensureLocal(specFor('ae.safetensors', 'vae', 'flux1-ae.safetensors'), undefined, { hub });

    expect(existsSync(path.join(modelsDir, 'vae', 'flux1-ae.safetensors'))).toBe(true);
    expect(existsSync(path.join(modelsDir, 'vae', 'ae.safetensors'))).toBe(false);
  });

  it('fetches a shared destination only once', async () => {
    const first = specFor('split_files/vae/shared.safetensors');
    const second: ArtifactSpec = { ...first, sourceId: 'org/other-repo' };

    expect(await ensureLocal(first, undefined, { hub })).toBe(true);
    expect(await ensureLocal(second, undefined, { hub })).toBe(true);

    expect(hub.downloads).toHaveLength(1);
  });

  it('preserves the modification time and permissions of the cached file', async () => {
    const mtime = new Date('2024-01-02T03:04:05Z');
    hub = new FakeHub(path.join(workDir, 'cache'), { mtime, mode: 0o640 });

    await ensureLocal(specFor('model.safetensors'), undefined, { hub });

    const { mtimeMs, mode } = await stat(path.join(modelsDir, 'vae', 'model.safetensors'));
    expect(mtimeMs).toBe(mtime.getTime());
    expect(mode & 0o777).toBe(0o640);
  });

  it('reports a failure when the destination cannot be inspected', async () => {
    await mkdir(modelsDir, { recursive: true });
    await writeFile(path.join(modelsDir, 'vae'), 'not a directory');

    const outcome = await fetchArtifact(specFor('model.safetensors'), undefined, { hub, reporter });

    expect(outcome.status).toBe(FetchStatus.TransferFailed);
    expect(outcome.reason).toMatch(/^ENOTDIR/);
    expect(hub.callCount).toBe(0);
    expect(reporter.named('failed')).toHaveLength(1);
    expect(await readFile(path.join(modelsDir, 'vae'), 'utf8')).toBe('not a directory');
    await expect(ensureLocal(specFor('model.safetensors'), undefined, { hub })).resolves.toBe(false);
  });

  it('leaves no partial file behind and keeps going', async () => {
    const failing = specFor('broken.safetensors');
    const partial = path.join(failing.destinationDir, 'broken.safetensors');
    hub.failOn('org/repo', 'broken.safetensors', new Error('connection reset'), async () => {
      await writeFile(partial, 'half');
    });

    const results = [
      await ensureLocal(failing, undefined, { hub, reporter }),
      await ensureLocal(specFor('next.safetensors'), undefined, { hub, reporter }),
    ];

    expect(results).toEqual([false, true]);
    expect(existsSync(partial)).toBe(false);
    expect(existsSync(path.join(modelsDir, 'vae', 'next.safetensors'))).toBe(true);
    expect(reporter.named('failed')).toEqual([
      ['failed', 'broken.safetensors', 'connection reset'],
    ]);
  });

  it('classifies hub errors', async () => {
    hub.failOn('org/repo', 'gated.safetensors', new UnauthorizedError('Access denied'));
    hub.failOn('org/repo', 'missing.safetensors', new NotFoundError('Hub file', 'org/repo/missing'));
    hub.failOn('org/repo', 'io.safetensors', new Error('EIO'));

    const statuses = [
      (await fetchArtifact(specFor('gated.safetensors'), undefined, { hub })).status,
      (await fetchArtifact(specFor('missing.safetensors'), undefined, { hub })).status,
      (await fetchArtifact(specFor('io.safetensors'), undefined, { hub })).status,
    ];

    expect(statuses).toEqual([
      FetchStatus.Unauthorized,
      FetchStatus.NotFound,
      FetchStatus.TransferFailed,
    ]);
  });

  it('records the failure reason in the outcome', async () => {
    hub.failOn('org/repo', 'missing.safetensors', new NotFoundError('Hub file', 'org/repo/missing'));

    const outcome = await fetchArtifact(specFor('missing.safetensors'), undefined, { hub });

    expect(outcome.reason).toBe("Hub file with identifier 'org/repo/missing' not found");
    expect(outcome.sizeBytes).toBeUndefined();
  });
});
