/**
 * @hoist/shared - Constants
 */

/** How many images of the configured repository survive a cleanup. */
export const RELEASES_TO_KEEP = 5;

/** Appended to the container name while a rollback holds the old container aside. */
export const BACKUP_SUFFIX = '_backup';

export const DEFAULT_LOG_FILE = 'deploy.log';

export { getVersion } from './version.js';
