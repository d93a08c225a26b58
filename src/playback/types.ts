import type { AudioFormat } from '../storage/types';

export type HostPlatform = 'darwin' | 'linux' | 'win32';

export interface PlayerCandidate {
  /** Label used in logs, metrics and error reports. */
  name: string;
  executable: string;
  /** Fixed arguments; the artifact path is appended after them. */
  args: readonly string[];
  platforms: readonly HostPlatform[];
  formats: readonly AudioFormat[];
}

/** A user-chosen player, tried before every built-in. */
export interface PlayerOverride {
  executable: string;
  args: readonly string[];
}

export interface AttemptResult {
  candidate: PlayerCandidate;
  ok: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  error?: string;
  stderr: string;
}

export interface PlaybackOutcome {
  succeeded: true;
  candidateUsed: PlayerCandidate;
  attempts: AttemptResult[];
}
