/**
 * SSH Transport Tests
 */

import type { CommandResult } from '@hoist/shared';
import { SSHTransport } from '../client.js';

function createRunner() {
  return {
    execute: jest.fn((_command: string, _description: string): Promise<CommandResult> =>
      Promise.resolve({ stdout: '', stderr: '' })),
  };
}

describe('SSHTransport', () => {
  const target = { host: 'example.com', user: 'deploy', sshKey: '' };

  it('should wrap remote commands in ssh', async () => {
    const runner = createRunner();
    const ssh = new SSHTransport(target, runner);

    await ssh.exec('docker ps', 'Listing containers');

    expect(runner.execute).toHaveBeenCalledWith('ssh deploy@example.com "docker ps"', 'Listing containers');
  });

  it('should check the connection with a remote echo', async () => {
    const runner = createRunner();
    await new SSHTransport(target, runner).check();

    expect(runner.execute).toHaveBeenCalledWith(
      "ssh deploy@example.com \"echo 'SSH connection successful'\"",
      'Checking SSH connection',
    );
  });

  it('should copy files with scp', async () => {
    const runner = createRunner();
    await new SSHTransport(target, runner).copyFile('.env');

    expect(runner.execute).toHaveBeenCalledWith(
      'scp .env deploy@example.com:~/.env',
      'Copying .env to server',
    );
  });

  it('should expose the bare ssh prefix', () => {
    const ssh = new SSHTransport({ ...target, sshKey: '/keys/id' }, createRunner());
    expect(ssh.command).toBe('ssh -i /keys/id deploy@example.com');
    expect(ssh.host).toBe('example.com');
  });
});
