import { spawn } from 'child_process';
import { errnoOf } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('convert:process');

export interface RunProcessOptions {
  /** Wall-clock limit in milliseconds; the whole process group is killed when it expires */
  timeout: number;
  /** Largest stdout or stderr accepted, in bytes */
  maxBuffer: number;
  env: NodeJS.ProcessEnv;
}

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/**
 * Rejection of runProcess, shaped like an execFile error
 */
export interface ProcessError extends Error {
  code: number | string | null;
  killed: boolean;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

function processError(
  message: string,
  fields: { code: number | string | null; killed: boolean; signal: NodeJS.Signals | null } & ProcessOutput
): ProcessError {
  return Object.assign(new Error(message), fields);
}

/**
 * Run a command in its own process group
 *
 * soffice is a launcher that forks soffice.bin, so killing only the direct
 * child would leave the converter running. The group is killed with SIGKILL
 * when the timeout expires and again once the launcher exits, which reaps
 * anything it left behind.
 *
 * Resolves on exit code 0; rejects with a ProcessError otherwise.
 */
export function runProcess(file: string, args: string[], options: RunProcessOptions): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(file, args, {
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: options.env,
    });

    let stdout = '';
    let stderr = '';
    let killed = false;
    let overflow = false;
    let settled = false;

    const killGroup = (): void => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, 'SIGKILL');
      } catch (error) {
        // ESRCH: the group is already gone
        if (errnoOf(error) !== 'ESRCH') {
          logger.warn({ pid: child.pid, errno: errnoOf(error) }, 'Failed to kill process group');
        }
      }
    };

    const timer = setTimeout(() => {
      killed = true;
      killGroup();
    }, options.timeout);

    const settle = (outcome: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outcome();
    };

    const collect = (stream: 'stdout' | 'stderr') => (chunk: Buffer) => {
      if (stream === 'stdout') {
        stdout += chunk.toString('utf8');
      } else {
        stderr += chunk.toString('utf8');
      }
      if (!overflow && (stdout.length > options.maxBuffer || stderr.length > options.maxBuffer)) {
        overflow = true;
        killGroup();
      }
    };

    child.stdout.on('data', collect('stdout'));
    child.stderr.on('data', collect('stderr'));

    child.on('error', (error) => {
      settle(() =>
        reject(
          processError(error.message, { code: errnoOf(error) ?? null, killed: false, signal: null, stdout, stderr })
        )
      );
    });

    // Leftover group members would hold the pipes open and delay 'close'
    child.on('exit', () => {
      clearTimeout(timer);
      killGroup();
    });

    child.on('close', (code, signal) => {
      settle(() => {
        if (overflow) {
          reject(
            processError('stdout maxBuffer length exceeded', {
              code: 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER',
              killed: false,
              signal,
              stdout,
              stderr,
            })
          );
        } else if (killed) {
          reject(processError(`Command timed out: ${file}`, { code, killed: true, signal, stdout, stderr }));
        } else if (code === 0) {
          resolve({ stdout, stderr });
        } else {
          reject(processError(`Command failed: ${file}`, { code, killed: false, signal, stdout, stderr }));
        }
      });
    });
  });
}
