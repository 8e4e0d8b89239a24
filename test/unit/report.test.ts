import { formatCompletionNotice, formatVerification } from '../../src/report.js';
import { parseConfig } from '../../src/config/loader.js';

describe('formatVerification', () => {
  it('prints found values', () => {
    const config = parseConfig({});
    const text = formatVerification(
      { user: 'michau', nodeVersion: 'v22.11.0', npmVersion: '10.9.0', cliPath: '/home/michau/.nvm/versions/node/v22.11.0/bin/claude', aliasLine: 'alias claudeca="x"' },
      config,
    );
    expect(text.split('\n')).toEqual([
      '=== Verification ===',
      'User: michau',
      'Node version: v22.11.0',
      'NPM version: 10.9.0',
      'claude installed: /home/michau/.nvm/versions/node/v22.11.0/bin/claude',
      'Aliases available after next login:',
      'alias claudeca="x"',
      '',
    ]);
  });
});

describe('formatCompletionNotice', () => {
  it('lists the hardening applied and the backup path', () => {
    const lines = formatCompletionNotice(parseConfig({}), { backupPath: '/etc/ssh/sshd_config.backup.20261018_090507', includesDropIns: false }).split('\n');
    expect(lines).toContain('- Password authentication is now DISABLED');
    expect(lines).toContain('- Root login is now DISABLED');
    expect(lines).toContain('- Only SSH key authentication is allowed');
    expect(lines).toContain("Make sure you can log in as 'michau' with your SSH key before closing this session!");
    expect(lines).toContain('1. Test SSH access: ssh michau@your-server-ip (in a new terminal)');
    expect(lines).toContain('SSH config backup saved at: /etc/ssh/sshd_config.backup.20261018_090507');
  });

  it('only claims what the configured directives do', () => {
    const config = parseConfig({ user: { name: 'ops' }, ssh: { directives: { PermitRootLogin: 'no' } } });
    const lines = formatCompletionNotice(config, { backupPath: null, includesDropIns: false }).split('\n');
    expect(lines).toContain('- Root login is now DISABLED');
    expect(lines).not.toContain('- Password authentication is now DISABLED');
    expect(lines).toContain('SSH config backup saved at: /etc/ssh/sshd_config.backup.*');
  });

  it('qualifies each claim when sshd_config includes drop-in files', () => {
    const lines = formatCompletionNotice(parseConfig({}), { backupPath: null, includesDropIns: true }).split('\n');
    expect(lines).not.toContain('- Password authentication is now DISABLED');
    expect(lines).toContain('- Password authentication is now DISABLED in /etc/ssh/sshd_config, unless an included drop-in file sets it first');
    expect(lines).toContain('- Root login is now DISABLED in /etc/ssh/sshd_config, unless an included drop-in file sets it first');
    expect(lines).toContain('Drop-in files pulled in by Include are read first and their values win.');
    expect(lines).toContain("Check the effective values with: sshd -T | grep -iE '^(passwordauthentication|permitrootlogin|pubkeyauthentication) '");
  });
});
