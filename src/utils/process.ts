import { spawn } from 'child_process';

export interface RunCommandOptions {
  /** Kill the process and reject after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Signature of runCommand, injectable where tests need a fake
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<string>;

/**
 * Runs a command with the given arguments
 * @param command - Command to run
 * @param args - Command line arguments
 * @param options - Optional timeout
 * @returns Promise that resolves with stdout when command completes
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
          }, options.timeoutMs)
        : undefined;

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (timer) clearTimeout(timer);
      if (timedOut) {
        reject(new Error(`Command timed out after ${options.timeoutMs}ms: ${command}`));
      } else if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(`Command failed with code ${code}: ${stderr}`));
      }
    });

    child.on('error', (err) => {
      if (timer) clearTimeout(timer);
      reject(new Error(`Failed to start command: ${err.message}`));
    });
  });
};
