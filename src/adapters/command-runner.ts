/**
 * Child process execution for the toolchain adapters.
 */

import { spawn } from 'child_process';
import { logger } from '../logger';

export interface CommandRequest {
  command: string;
  args: string[];
  cwd?: string;
  /** Merged over the parent environment. */
  env?: Record<string, string>;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number | null;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
  timedOut: boolean;
}

/** Runs external commands. Adapters depend on this so tests can script it. */
export interface CommandRunner {
  run(request: CommandRequest): Promise<CommandResult>;
}

const log = logger.child({ module: 'command-runner' });

export class ProcessCommandRunner implements CommandRunner {
  run(request: CommandRequest): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(request.command, request.args, {
        cwd: request.cwd,
        env: { ...process.env, ...request.env },
        stdio: ['pipe', 'pipe', 'pipe'],
        windowsHide: true,
      });

      const chunks: string[] = [];
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (request.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          log.warn('Command timed out; killing', { command: request.command, timeoutMs: request.timeoutMs });
          child.kill('SIGKILL');
        }, request.timeoutMs);
      }

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => chunks.push(chunk));
      child.stderr.on('data', (chunk: string) => chunks.push(chunk));

      child.on('error', (err) => {
        if (timer) clearTimeout(timer);
        reject(err);
      });
      child.on('close', (code) => {
        if (timer) clearTimeout(timer);
        resolve({ exitCode: code, output: chunks.join(''), timedOut });
      });

      if (request.input !== undefined) {
        child.stdin.end(request.input);
      } else {
        child.stdin.end();
      }
    });
  }
}

/** Render a command line for logs. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ');
}
