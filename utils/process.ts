import { spawn } from 'node:child_process';

export type ProcessOutcome =
  | { readonly kind: 'exited'; readonly code: number | null; readonly stdout: Buffer; readonly stderr: string }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'spawn-error'; readonly message: string };

export interface RunOptions {
  readonly timeoutMs: number;
  readonly input?: string; // written to stdin, which is then closed
}

/**
 * Spawns an external tool and collects its output. Never rejects: a missing
 * binary, a timeout and a non-zero exit all come back as outcomes.
 */
export const runProcess = (command: string, args: readonly string[], options: RunOptions): Promise<ProcessOutcome> =>
  new Promise(resolve => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    let stderr = '';
    let settled = false;

    const finish = (outcome: ProcessOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      finish({ kind: 'timeout' });
    }, options.timeoutMs);

    child.stdout.on('data', (data: Buffer) => stdout.push(data));
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', error => finish({ kind: 'spawn-error', message: error.message }));
    child.on('close', code => finish({ kind: 'exited', code, stdout: Buffer.concat(stdout), stderr }));

    // EPIPE when the tool exits before reading its input; 'close' reports the real failure.
    child.stdin.on('error', error => console.warn(`[Process] ${command} stdin: ${error.message}`));
    if (options.input !== undefined) child.stdin.write(options.input, 'utf8');
    child.stdin.end();
  });
