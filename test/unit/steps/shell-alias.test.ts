import fs from 'fs/promises';
import path from 'path';
import { aliasBlock, aliasLine, shellAliasStep } from '../../../src/steps/shell-alias.js';
import { RecordingExecutor } from '../../helpers/recording-executor.js';
import { caught, createContext, createSandbox, removeSandbox, type Sandbox } from '../../helpers/context.js';

const ALIAS = 'alias claudeca="claude --continue --dangerously-allow-everything"';

describe('shell-alias step', () => {
  let sandbox: Sandbox;
  let profile: string;

  beforeEach(async () => {
    sandbox = await createSandbox();
    profile = path.join(sandbox.paths.home, '.bashrc');
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('builds the alias block', () => {
    expect(aliasLine(sandbox.config)).toBe(ALIAS);
    expect(aliasBlock(sandbox.config)).toBe(`\n# Claude Code alias\n${ALIAS}\n`);
  });

  it('escapes characters that are special inside double quotes', () => {
    const config = { ...sandbox.config, alias: { ...sandbox.config.alias, name: 'home', command: 'echo "$HOME"' } };
    expect(aliasLine(config)).toBe('alias home="echo \\"\\$HOME\\""');
  });

  it('appends the block to the profile as the target user', async () => {
    await fs.writeFile(profile, 'export EDITOR=vim\n', 'utf-8');
    const executor = new RecordingExecutor().emulateFilesystem();

    const result = await shellAliasStep.run(createContext(sandbox.config, executor));

    expect(result.status).toBe('applied');
    expect(await fs.readFile(profile, 'utf-8')).toBe(`export EDITOR=vim\n\n# Claude Code alias\n${ALIAS}\n`);
    expect(executor.calls).toEqual([{ argv: ['sudo', '-u', 'deploy', 'tee', '-a', profile], stdin: aliasBlock(sandbox.config) }]);
  });

  it('creates the profile when it does not exist', async () => {
    const executor = new RecordingExecutor().emulateFilesystem();
    await shellAliasStep.run(createContext(sandbox.config, executor));
    expect((await fs.readFile(profile, 'utf-8')).split('\n')).toContain(ALIAS);
  });

  it('does not append a second block on re-run', async () => {
    const executor = new RecordingExecutor().emulateFilesystem();
    const ctx = createContext(sandbox.config, executor);
    await shellAliasStep.run(ctx);
    const second = await shellAliasStep.run(ctx);

    expect(second.status).toBe('skipped');
    expect(executor.calls).toHaveLength(1);
    const lines = (await fs.readFile(profile, 'utf-8')).split('\n').filter((l) => l === ALIAS);
    expect(lines).toHaveLength(1);
  });

  it('fails on a profile it cannot read instead of treating it as empty', async () => {
    await fs.mkdir(profile);
    const executor = new RecordingExecutor().emulateFilesystem();

    const err = await caught(() => shellAliasStep.run(createContext(sandbox.config, executor)));

    expect(err).toMatchObject({ code: 'EISDIR' });
    expect(executor.calls).toHaveLength(0);
  });
});
