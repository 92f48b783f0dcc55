import fs from 'fs';
import os from 'os';
import path from 'path';
import { generateWorkerId, loadWorkerIdentity } from '../../src/identity';

describe('loadWorkerIdentity', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'worker-identity-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should generate and persist an identity on first start', async () => {
    const file = path.join(dir, '.worker_id');

    const workerId = await loadWorkerIdentity(file);

    expect(workerId).toMatch(/^worker-[0-9a-f-]{36}$/);
    expect(await fs.promises.readFile(file, 'utf-8')).toBe(`${workerId}\n`);
  });

  it('should reuse the stored identity on restart', async () => {
    const file = path.join(dir, '.worker_id');

    const first = await loadWorkerIdentity(file);
    const second = await loadWorkerIdentity(file);

    expect(second).toBe(first);
  });

  it('should trim whitespace around a stored identity', async () => {
    const file = path.join(dir, '.worker_id');
    await fs.promises.writeFile(file, '  worker-fixed \n');

    expect(await loadWorkerIdentity(file)).toBe('worker-fixed');
  });

  it('should replace an empty identity file', async () => {
    const file = path.join(dir, '.worker_id');
    await fs.promises.writeFile(file, '');

    const workerId = await loadWorkerIdentity(file);

    expect(workerId).toMatch(/^worker-/);
    expect((await fs.promises.readFile(file, 'utf-8')).trim()).toBe(workerId);
  });

  it('should create missing directories', async () => {
    const file = path.join(dir, 'state', 'nested', '.worker_id');

    const workerId = await loadWorkerIdentity(file);

    expect(fs.existsSync(file)).toBe(true);
    expect(workerId).toMatch(/^worker-/);
  });

  it('should generate distinct identities', () => {
    expect(generateWorkerId()).not.toBe(generateWorkerId());
  });
});
