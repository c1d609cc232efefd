/**
 * Test doubles for the deployment services: a scripted command runner and a
 * recording logger. No command ever reaches a shell.
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseDeploymentConfig } from '@hoist/shared';
import type { CommandResult, DeploymentConfig, DeploymentConfigInput } from '@hoist/shared';
import type { CommandRunner } from '@hoist/exec';

type Reply = string | CommandResult | Error;

interface Rule {
  match: string | RegExp;
  reply: Reply;
}

export interface RecordedCall {
  command: string;
  description: string;
}

/**
 * Answers commands from a list of rules; the first rule whose pattern matches
 * wins. A string pattern matches by substring. Unmatched commands succeed
 * with empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Rule[] = [];

  on(match: string | RegExp, reply: Reply): this {
    this.rules.push({ match, reply });
    return this;
  }

  get commands(): string[] {
    return this.calls.map(call => call.command);
  }

  async execute(command: string, description: string): Promise<CommandResult> {
    this.calls.push({ command, description });

    const rule = this.rules.find(({ match }) =>
      typeof match === 'string' ? command.includes(match) : match.test(command));

    if (!rule) return { stdout: '', stderr: '' };
    if (rule.reply instanceof Error) throw rule.reply;
    return typeof rule.reply === 'string' ? { stdout: rule.reply, stderr: '' } : rule.reply;
  }
}

export function createLogger() {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

/** A Dockerfile that exists, in a fresh temp directory. */
export function createDockerfile(): string {
  const dir = mkdtempSync(join(tmpdir(), 'hoist-deploy-'));
  const path = join(dir, 'Dockerfile');
  writeFileSync(path, 'FROM scratch\n');
  return path;
}

export function testConfig(overrides: DeploymentConfigInput = {}): DeploymentConfig {
  return parseDeploymentConfig({
    host: 'example.com',
    user: 'deploy',
    image: 'app',
    tag: 'v6',
    containerName: 'app',
    ...overrides,
  });
}

/** `docker images` output for app:v1 (oldest) through app:v<count>. */
export function releaseListing(count: number): string {
  const lines: string[] = [];
  for (let n = count; n >= 1; n--) {
    lines.push(`app:v${n}___2024-03-0${n} 10:00:00 +0000 UTC`);
  }
  return `${lines.join('\n')}\n`;
}
