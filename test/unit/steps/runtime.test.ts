import { nodeInstallScript, nvmInstallScript, nvmInstallUrl, runtimeManagerStep, runtimeStep } from '../../../src/steps/runtime.js';
import { NVM_PRELUDE } from '../../../src/steps/helpers.js';
import { BootstrapErrorCode } from '../../../src/shared/errors.js';
import { RecordingExecutor } from '../../helpers/recording-executor.js';
import { caught, createContext, createSandbox, removeSandbox, type Sandbox } from '../../helpers/context.js';

describe('runtime scripts', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('resolves the pinned nvm installer URL', () => {
    expect(nvmInstallUrl(sandbox.config)).toBe('https://raw.githubusercontent.com/nvm-sh/nvm/v0.40.3/install.sh');
    expect(nvmInstallScript(sandbox.config)).toBe(
      "set -o pipefail\ncurl -fsSL 'https://raw.githubusercontent.com/nvm-sh/nvm/v0.40.3/install.sh' | bash",
    );
  });

  it('installs and selects the LTS line by default', () => {
    expect(nodeInstallScript(sandbox.config)).toBe(
      `${NVM_PRELUDE}\nnvm install --lts && nvm use --lts && nvm alias default 'lts/*' && node --version && npm --version`,
    );
  });

  it('pins an explicit version', () => {
    const config = { ...sandbox.config, runtime: { ...sandbox.config.runtime, node_version: '22.11.0' } };
    expect(nodeInstallScript(config)).toBe(
      `${NVM_PRELUDE}\nnvm install '22.11.0' && nvm use '22.11.0' && nvm alias default '22.11.0' && node --version && npm --version`,
    );
  });
});

describe('runtime-manager and runtime steps', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('runs the nvm installer as the target user', async () => {
    const executor = new RecordingExecutor();
    const result = await runtimeManagerStep.run(createContext(sandbox.config, executor));
    expect(result.details).toEqual({ version: 'v0.40.3', url: 'https://raw.githubusercontent.com/nvm-sh/nvm/v0.40.3/install.sh' });
    expect(executor.argvs()).toEqual([['sudo', '-u', 'deploy', '-H', 'bash', '-c', nvmInstallScript(sandbox.config)]]);
  });

  it('fails the run when the installer cannot be downloaded', async () => {
    const executor = new RecordingExecutor().on('curl', { exitCode: 6, stderr: 'curl: (6) Could not resolve host: raw.githubusercontent.com' });
    const err = await caught(() => runtimeManagerStep.run(createContext(sandbox.config, executor)));
    expect(err).toMatchObject({ code: BootstrapErrorCode.COMMAND_FAILED, context: { errorCode: 'NETWORK_ERROR' } });
  });

  it('reports the installed node and npm versions', async () => {
    const executor = new RecordingExecutor().on('nvm install', { stdout: 'Now using node v22.11.0 (npm v10.9.0)\nv22.11.0\n10.9.0\n' });
    const result = await runtimeStep.run(createContext(sandbox.config, executor));
    expect(result.details).toEqual({ requested: 'lts', node: 'v22.11.0', npm: '10.9.0' });
    expect(executor.argvs()).toEqual([['sudo', '-u', 'deploy', '-H', 'bash', '-c', nodeInstallScript(sandbox.config)]]);
  });
});
