import { spawn } from 'child_process';
import { toErrorMessage, type Logger } from '@audio-batch/core';

export type ProcessResult = {
  code: number;
  stdout: Buffer;
  stderr: string;
};

export type RunOptions = {
  input?: Buffer;
  timeoutMs?: number;
  logger?: Logger;
};

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * Run a command to completion, capturing binary stdout and text stderr
 */
export function runProcess(cmd: string, args: string[], opts: RunOptions = {}): Promise<ProcessResult> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      stdio: ['pipe', 'pipe', 'pipe']
    });

    const stdout: Buffer[] = [];
    let stderr = '';

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      reject(new Error(`Command timed out after ${timeoutMs}ms: ${cmd} ${args.join(' ')}`));
    }, timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdout.push(data);
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({
        code: code ?? -1,
        stdout: Buffer.concat(stdout),
        stderr
      });
    });

    // EPIPE also surfaces through the exit code and stderr
    child.stdin.on('error', (err) => {
      opts.logger?.debug({ cmd, error: toErrorMessage(err) }, 'Process stdin closed before input was written');
    });
    if (opts.input) {
      child.stdin.end(opts.input);
    } else {
      child.stdin.end();
    }
  });
}

/**
 * Describe a non-zero exit, or null when the command succeeded
 */
export function failureMessage(result: ProcessResult, context: string): string | null {
  if (result.code === 0) {
    return null;
  }
  const tail = result.stderr.trim().split('\n').slice(-5).join('\n');
  return `${context} failed (code=${result.code}): ${tail}`;
}
