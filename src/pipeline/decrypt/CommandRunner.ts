/**
 * Runs an external tool and collects its exit status and stderr.
 *
 * Uses child_process directly; the tools involved (gpg) are expected on PATH.
 */

import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stderr: string;
}

/**
 * `input`, when given, is written to the tool's stdin and stdin is closed.
 */
export type CommandRunner = (command: string, args: string[], input?: string) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, input) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'ignore', 'pipe'] });
    const stderr: Buffer[] = [];

    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', (code) => {
      resolve({ exitCode: code ?? -1, stderr: Buffer.concat(stderr).toString('utf8').trim() });
    });

    // The tool may exit before reading stdin; EPIPE then is not a failure of its own
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'EPIPE') reject(error);
    });
    child.stdin.end(input ?? '');
  });
