/**
 * @hoist/shared - Version (from HOIST_VERSION or the VERSION file)
 *
 * Read once at start-up and carried on the config; nothing mutates it later.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export function getVersion(env: NodeJS.ProcessEnv = process.env): string {
  // Environment variable override (for Docker builds, CI, etc.)
  if (env.HOIST_VERSION) {
    return env.HOIST_VERSION;
  }

  const candidates = [
    join(process.cwd(), 'VERSION'),
    join(__dirname, '..', '..', '..', '..', 'VERSION'),
  ];

  for (const p of candidates) {
    if (existsSync(p)) {
      const version = readFileSync(p, 'utf-8').trim();
      if (version) return version;
    }
  }

  return '0.0.0';
}
