/**
 * @hoist/ssh - Remote Command Templates
 *
 * Every remote call is a single non-interactive `ssh` invocation. Values are
 * substituted as-is; callers hand the result to the executor and never parse
 * it back.
 */

import type { RemoteTarget } from '@hoist/shared';

export function sshKeyFlag(target: RemoteTarget): string {
  return target.sshKey ? `-i ${target.sshKey}` : '';
}

/** `ssh [-i <key>] <user>@<host>`. Recomputed for every command, never cached. */
export function remoteCommand(target: RemoteTarget): string {
  const keyFlag = sshKeyFlag(target);
  return keyFlag
    ? `ssh ${keyFlag} ${target.user}@${target.host}`
    : `ssh ${target.user}@${target.host}`;
}

export function wrapRemote(target: RemoteTarget, inner: string): string {
  return `${remoteCommand(target)} "${inner}"`;
}

/** Copies a local file into the remote home directory under the same relative path. */
export function copyCommand(target: RemoteTarget, localPath: string): string {
  const keyFlag = sshKeyFlag(target);
  const destination = `${target.user}@${target.host}:~/${localPath}`;
  return keyFlag
    ? `scp ${keyFlag} ${localPath} ${destination}`
    : `scp ${localPath} ${destination}`;
}
