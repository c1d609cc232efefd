/**
 * Result Formatting Tests
 */

import { formatSteps, formatTarget } from '../lib/formatter.js';
import { resolveConfig } from '../lib/config.js';

const ANSI = /\u001b\[[0-9;]*m/g;

function plain(text: string): string {
  return text.replace(ANSI, '');
}

describe('formatSteps', () => {
  it('should align step names and print the total', () => {
    const output = plain(formatSteps({
      success: false,
      duration: 1234,
      steps: [
        { name: 'validate', status: 'success', duration: 3, output: 'ok' },
        { name: 'build', status: 'failed', duration: 10, error: 'boom' },
        { name: 'env_copy', status: 'skipped', duration: 0, output: 'No env file configured' },
      ],
    }));

    expect(output.split('\n')).toEqual([
      '  ✔ validate  3ms  ok',
      '  ✖ build     10ms  boom',
      '  - env_copy  0ms  No env file configured',
      '',
      '  Total: 1.2s',
    ]);
  });

  it('should not leave trailing spaces on steps without detail', () => {
    const output = plain(formatSteps({
      success: true,
      duration: 0,
      steps: [{ name: 'ssh_check', status: 'success', duration: 5 }],
    }));

    expect(output.split('\n')[0]).toBe('  ✔ ssh_check  5ms');
  });
});

describe('formatTarget', () => {
  it('should describe where the image goes', () => {
    const config = resolveConfig({ host: 'example.com', user: 'deploy', hostPort: '8080' }, {}, '1.0.0');

    expect(plain(formatTarget(config)).split('\n')).toEqual([
      'Host:       deploy@example.com',
      'Image:      app:latest',
      'Container:  app (8080:3000)',
    ]);
  });
});
