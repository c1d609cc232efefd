/**
 * @hoist/ssh
 */

export { SSHTransport } from './client.js';
export { sshKeyFlag, remoteCommand, wrapRemote, copyCommand } from './remote.js';
