import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { AccessToken, CredentialBroker } from './types.js';
import { AuthFailure } from '../errors/index.js';
import { AUTH_DEFAULTS } from '../config/constants.js';
import { errorMessage, getProperty, isString } from '../utils/type-guards.js';

/**
 * Broker for a fixed bearer token (from settings or the environment).
 * Every scope receives the same token.
 */
export class StaticCredentialBroker implements CredentialBroker {
  private readonly token: string;
  private readonly lifetimeMs: number;
  private readonly now: () => number;

  constructor(token: string, options: { lifetimeMs?: number; now?: () => number } = {}) {
    this.token = token;
    this.lifetimeMs = options.lifetimeMs ?? AUTH_DEFAULTS.STATIC_TOKEN_LIFETIME_MS;
    this.now = options.now ?? Date.now;
  }

  async requestToken(): Promise<AccessToken> {
    if (this.token.trim().length === 0) {
      throw new AuthFailure('No access token configured');
    }
    return { token: this.token, expiresAt: new Date(this.now() + this.lifetimeMs) };
  }
}

export type CommandRunner = (command: string, args: string[]) => Promise<{ stdout: string }>;

const execFileAsync = promisify(execFile);

const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { encoding: 'utf-8' });
  return { stdout };
};

/** Output of `az account get-access-token --output json` */
const cliTokenSchema = z.object({
  accessToken: z.string().min(1),
  /** Epoch seconds */
  expires_on: z.union([z.number(), z.string()]).optional(),
  /** Local time, e.g. "2024-05-01 13:45:00.000000" */
  expiresOn: z.string().optional(),
});

/**
 * Broker that asks a locally logged-in CLI for tokens
 */
export class CommandCredentialBroker implements CredentialBroker {
  private readonly command: string;
  private readonly run: CommandRunner;
  private readonly now: () => number;

  constructor(options: { command?: string; run?: CommandRunner; now?: () => number } = {}) {
    this.command = options.command ?? AUTH_DEFAULTS.CLI_COMMAND;
    this.run = options.run ?? runCommand;
    this.now = options.now ?? Date.now;
  }

  async requestToken(scope: string): Promise<AccessToken> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(this.command, [
        'account',
        'get-access-token',
        '--scope',
        scope,
        '--output',
        'json',
      ]));
    } catch (error) {
      throw new AuthFailure(
        `${this.command} could not provide a token for ${scope}: ${describeCommandError(error)}. ` +
          `Please run '${this.command} login' to authenticate.`,
        { cause: error }
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (error) {
      throw new AuthFailure(`${this.command} printed a token that is not JSON: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const result = cliTokenSchema.safeParse(parsed);
    if (!result.success) {
      throw new AuthFailure(`${this.command} printed an unexpected token format`);
    }

    return {
      token: result.data.accessToken,
      expiresAt: this.expiryOf(result.data),
    };
  }

  private expiryOf(output: z.infer<typeof cliTokenSchema>): Date {
    // Empty or non-positive epoch values count as missing
    if (output.expires_on !== undefined && String(output.expires_on).trim() !== '') {
      const seconds = Number(output.expires_on);
      if (Number.isFinite(seconds) && seconds > 0) {
        return new Date(seconds * 1000);
      }
    }

    if (output.expiresOn !== undefined) {
      const parsed = Date.parse(output.expiresOn.replace(' ', 'T').replace(/(\.\d{3})\d+$/, '$1'));
      if (!Number.isNaN(parsed)) {
        return new Date(parsed);
      }
    }

    // No usable expiry: treat like a static token
    return new Date(this.now() + AUTH_DEFAULTS.STATIC_TOKEN_LIFETIME_MS);
  }
}

function describeCommandError(error: unknown): string {
  if (getProperty(error, 'code') === 'ENOENT') {
    return 'command not found';
  }
  const stderr = getProperty(error, 'stderr');
  if (isString(stderr) && stderr.trim().length > 0) {
    return stderr.trim();
  }
  return errorMessage(error);
}
