import { NoPlayableCandidateError } from '../errors';
import { log } from '../log';
import { recordPlaybackAttempt, recordPlaybackExhausted } from '../metrics';
import type { AudioArtifact, AudioFormat } from '../storage/types';
import { resolveCandidates, toHostPlatform } from './resolver';
import { CandidateRunner, runCandidate } from './runner';
import type { AttemptResult, HostPlatform, PlaybackOutcome, PlayerCandidate, PlayerOverride } from './types';

const DEFAULT_TIMEOUT_MS = 120_000;

export interface PlaybackDispatcherOptions {
  platform?: HostPlatform | null;
  override?: PlayerOverride | null;
  timeoutMs?: number;
  runner?: CandidateRunner;
  builtins?: readonly PlayerCandidate[];
}

function attemptResultLabel(attempt: AttemptResult): 'ok' | 'failed' | 'timeout' | 'spawn_error' {
  if (attempt.ok) return 'ok';
  if (attempt.timedOut) return 'timeout';
  if (attempt.exitCode === null && attempt.signal === null) return 'spawn_error';
  return 'failed';
}

/**
 * Renders artifacts locally by walking the resolved players in order.
 * A player that is missing or fails is routine; only exhausting every
 * candidate is reported to the caller.
 */
export class PlaybackDispatcher {
  private readonly platform: HostPlatform | null;
  private readonly override: PlayerOverride | null;
  private readonly timeoutMs: number;
  private readonly runner: CandidateRunner;
  private readonly builtins?: readonly PlayerCandidate[];

  constructor(options: PlaybackDispatcherOptions = {}) {
    this.platform = options.platform === undefined ? toHostPlatform(process.platform) : options.platform;
    this.override = options.override ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.runner = options.runner ?? runCandidate;
    this.builtins = options.builtins;
  }

  candidatesFor(format: AudioFormat): PlayerCandidate[] {
    return resolveCandidates(this.platform, format, this.override, this.builtins);
  }

  async play(artifact: AudioArtifact, format: AudioFormat = artifact.format): Promise<PlaybackOutcome> {
    const candidates = this.candidatesFor(format);
    const attempts: AttemptResult[] = [];

    for (const candidate of candidates) {
      const attempt = await this.runner(candidate, artifact.path, { timeoutMs: this.timeoutMs });
      attempts.push(attempt);
      recordPlaybackAttempt(candidate.name, attemptResultLabel(attempt));

      if (attempt.ok) {
        log.info(
          { event: 'playback_succeeded', id: artifact.id, player: candidate.name, attempts: attempts.length },
          'audio played',
        );
        return { succeeded: true, candidateUsed: candidate, attempts };
      }

      log.debug(
        {
          event: 'playback_candidate_failed',
          id: artifact.id,
          player: candidate.name,
          exit_code: attempt.exitCode,
          signal: attempt.signal,
          timed_out: attempt.timedOut,
          error: attempt.error,
          stderr: attempt.stderr,
        },
        'player candidate failed, trying next',
      );
    }

    recordPlaybackExhausted();
    const attempted = attempts.map((attempt) => attempt.candidate.name);
    log.warn(
      { event: 'playback_exhausted', id: artifact.id, format, platform: this.platform, attempted },
      'no player could render audio artifact',
    );
    throw new NoPlayableCandidateError(artifact.id, attempted);
  }
}
