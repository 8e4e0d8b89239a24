import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { main } from '../../src/main.js';
import { BootstrapErrorCode } from '../../src/shared/errors.js';
import { RecordingExecutor } from '../helpers/recording-executor.js';

describe('main', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vps-bootstrap-main-'));
    configPath = path.join(dir, 'config.yaml');
    await fs.writeFile(configPath, 'user:\n  name: Not Valid\n', 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reports the privilege failure before reading the configuration', async () => {
    const executor = new RecordingExecutor();

    const result = await main({ euid: 1000, env: { VPS_BOOTSTRAP_CONFIG: configPath }, executor });

    expect(result.exitCode).toBe(1);
    expect(result.error?.code).toBe(BootstrapErrorCode.NOT_ROOT);
    expect(result.error?.message).toBe('This script must be run as root');
    expect(executor.calls).toHaveLength(0);
  });

  it('stops on an invalid configuration when run as root', async () => {
    const executor = new RecordingExecutor();

    const result = await main({ euid: 0, env: { VPS_BOOTSTRAP_CONFIG: configPath }, executor });

    expect(result.exitCode).toBe(1);
    expect(result.error?.code).toBe(BootstrapErrorCode.CONFIG_INVALID);
    expect(result.error?.message).toBe(`Invalid configuration in ${configPath}: user.name: must be a lowercase POSIX login name`);
    expect(executor.calls).toHaveLength(0);
  });
});
