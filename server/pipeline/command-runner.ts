import { spawn } from 'child_process';
import { CommandFailedError } from '../errors';
import { forSource } from '../logger';

const log = forSource('command');

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Executes one external program; only its exit status matters to callers. */
export type CommandRunner = (command: string, args: readonly string[], options?: CommandOptions) => Promise<CommandResult>;

// Keep only the tail of long tool logs in memory.
const MAX_CAPTURE = 64 * 1024;

const appendCapped = (buffer: string, chunk: Buffer): string => {
  const next = buffer + chunk.toString();
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
};

/**
 * Spawns `command` with an argument vector (no shell), resolving on exit code 0
 * and rejecting with CommandFailedError otherwise.
 */
export const spawnCommand: CommandRunner = (command, args, options = {}) => {
  const cmdline = [command, ...args].join(' ');
  log.info(`Executing: ${cmdline}`);
  const startedAt = Date.now();

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd ?? process.cwd(),
      env: { ...process.env, ...options.env },
    });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => { stdout = appendCapped(stdout, chunk); });
    child.stderr.on('data', (chunk: Buffer) => { stderr = appendCapped(stderr, chunk); });
    child.on('error', (err) => {
      reject(err);
    });
    child.on('close', (code) => {
      const elapsed = ((Date.now() - startedAt) / 1000).toFixed(2);
      if (code !== 0) {
        log.error(`${command} failed after ${elapsed}s with code ${code}`);
        reject(new CommandFailedError(command, code, stderr || stdout));
        return;
      }
      log.info(`${command} completed in ${elapsed}s`);
      resolve({ stdout, stderr });
    });
  });
};
