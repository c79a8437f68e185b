import { spawn } from 'child_process';
import { RateLimitError } from '../utils/errors';
import { cliLogger, ExtractorLogger } from '../utils/logger';
import type { InferenceClient } from './client';

export interface ClaudeCliOptions {
  /** Binary to run, defaults to `claude` on PATH */
  command?: string;
  timeoutMs?: number;
  cwd?: string;
  logger?: ExtractorLogger;
}

const RATE_LIMIT_PATTERN = /rate.?limit|\b429\b|overloaded|too many requests/i;

export function isRateLimitOutput(output: string): boolean {
  return RATE_LIMIT_PATTERN.test(output);
}

/**
 * Inference client backed by the Claude CLI in print mode.
 * The prompt goes over stdin, which avoids shell escaping issues.
 */
export class ClaudeCliClient implements InferenceClient {
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly cwd: string;
  private readonly logger: ExtractorLogger;

  constructor(options: ClaudeCliOptions = {}) {
    this.command = options.command ?? 'claude';
    this.timeoutMs = options.timeoutMs ?? 90000;
    this.cwd = options.cwd ?? '/tmp';
    this.logger = options.logger ?? cliLogger;
  }

  generate(prompt: string, model?: string): Promise<string> {
    const args = model ? ['-p', '--model', model] : ['-p'];

    return new Promise((resolve, reject) => {
      const claude = spawn(this.command, args, {
        cwd: this.cwd,
        timeout: this.timeoutMs,
      });

      let stdout = '';
      let stderr = '';

      claude.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      claude.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      claude.on('close', (code: number | null) => {
        if (code === 0) {
          this.logger.debug(`Claude CLI response length: ${stdout.length}`);
          resolve(stdout.trim());
          return;
        }
        const output = `${stderr}\n${stdout}`;
        if (isRateLimitOutput(output)) {
          reject(new RateLimitError(`Claude CLI rate limited: ${stderr.trim()}`));
          return;
        }
        reject(new Error(`Claude CLI exited with code ${code}: ${stderr}`));
      });

      claude.on('error', (err: Error) => {
        reject(err);
      });

      // EPIPE when the binary exits before reading the prompt
      claude.stdin.on('error', (err: Error) => {
        reject(err);
      });

      claude.stdin.write(prompt);
      claude.stdin.end();
    });
  }
}
