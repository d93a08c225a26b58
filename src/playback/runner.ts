import { spawn } from 'child_process';
import type { AttemptResult, PlayerCandidate } from './types';

const STDERR_LIMIT_BYTES = 4096;

export interface RunOptions {
  timeoutMs: number;
}

export type CandidateRunner = (
  candidate: PlayerCandidate,
  artifactPath: string,
  options: RunOptions,
) => Promise<AttemptResult>;

/**
 * Runs one player to completion. Never rejects: a missing executable, a
 * non-zero exit and a timeout all resolve to `ok: false`.
 */
export const runCandidate: CandidateRunner = (candidate, artifactPath, options) =>
  new Promise<AttemptResult>((resolve) => {
    const stderr: Buffer[] = [];
    let stderrBytes = 0;
    let timedOut = false;
    let settled = false;

    const finish = (result: Omit<AttemptResult, 'candidate' | 'stderr' | 'timedOut'>): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      resolve({
        candidate,
        ...result,
        timedOut,
        stderr: Buffer.concat(stderr).toString('utf8').trim(),
      });
    };

    const child = spawn(candidate.executable, [...candidate.args, artifactPath], {
      stdio: ['ignore', 'ignore', 'pipe'],
      windowsHide: true,
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
      // a grandchild may still hold the stderr pipe open, which would delay 'close'
      child.stderr.destroy();
    }, options.timeoutMs);

    child.stderr.on('data', (chunk: Buffer) => {
      if (stderrBytes >= STDERR_LIMIT_BYTES) return;
      const slice = chunk.subarray(0, STDERR_LIMIT_BYTES - stderrBytes);
      stderr.push(slice);
      stderrBytes += slice.length;
    });

    child.on('error', (error) => {
      finish({ ok: false, exitCode: null, signal: null, error: error.message });
    });

    child.on('exit', (code, signal) => {
      if (timedOut) {
        finish({ ok: false, exitCode: code, signal, error: `timed out after ${options.timeoutMs}ms` });
      }
    });

    child.on('close', (code, signal) => {
      if (timedOut) {
        finish({ ok: false, exitCode: code, signal, error: `timed out after ${options.timeoutMs}ms` });
        return;
      }
      finish({ ok: code === 0, exitCode: code, signal });
    });
  });
