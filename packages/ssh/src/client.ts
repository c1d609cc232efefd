/**
 * @hoist/ssh - SSH Transport
 * Binds a remote target to a command runner
 */

import type { CommandResult, RemoteTarget } from '@hoist/shared';
import type { CommandRunner } from '@hoist/exec';
import { copyCommand, remoteCommand, wrapRemote } from './remote.js';

export class SSHTransport {
  constructor(
    private readonly target: RemoteTarget,
    private readonly runner: CommandRunner,
  ) {}

  get host(): string {
    return this.target.host;
  }

  /** The bare ssh prefix, for commands that pipe into the remote side. */
  get command(): string {
    return remoteCommand(this.target);
  }

  exec(inner: string, description: string): Promise<CommandResult> {
    return this.runner.execute(wrapRemote(this.target, inner), description);
  }

  async check(): Promise<void> {
    await this.exec("echo 'SSH connection successful'", 'Checking SSH connection');
  }

  async copyFile(localPath: string, description: string = `Copying ${localPath} to server`): Promise<void> {
    await this.runner.execute(copyCommand(this.target, localPath), description);
  }
}
