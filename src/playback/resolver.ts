import type { AudioFormat } from '../storage/types';
import { BUILTIN_PLAYERS } from './candidates';
import type { HostPlatform, PlayerCandidate, PlayerOverride } from './types';

const OVERRIDE_PLATFORMS: readonly HostPlatform[] = ['darwin', 'linux', 'win32'];

export function toHostPlatform(platform: NodeJS.Platform): HostPlatform | null {
  if (platform === 'darwin' || platform === 'linux' || platform === 'win32') {
    return platform;
  }
  return null;
}

export function overrideCandidate(override: PlayerOverride, formats: readonly AudioFormat[]): PlayerCandidate {
  return {
    name: `override:${override.executable}`,
    executable: override.executable,
    args: [...override.args],
    platforms: OVERRIDE_PLATFORMS,
    formats,
  };
}

function sameInvocation(a: PlayerCandidate, b: PlayerOverride): boolean {
  return a.executable === b.executable && a.args.length === b.args.length && a.args.every((arg, i) => arg === b.args[i]);
}

/**
 * Ordered players for a platform and format. An override always comes first,
 * whatever its tags; an empty result means nothing on this host can play it.
 */
export function resolveCandidates(
  platform: HostPlatform | null,
  format: AudioFormat,
  override?: PlayerOverride | null,
  builtins: readonly PlayerCandidate[] = BUILTIN_PLAYERS,
): PlayerCandidate[] {
  const matching = builtins.filter(
    (candidate) =>
      platform !== null &&
      candidate.platforms.includes(platform) &&
      candidate.formats.includes(format) &&
      !(override && sameInvocation(candidate, override)),
  );

  if (!override) {
    return matching;
  }
  return [overrideCandidate(override, [format]), ...matching];
}
