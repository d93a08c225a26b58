import type { PlayerCandidate } from './types';

const FFPLAY_ARGS = ['-nodisp', '-autoexit', '-loglevel', 'quiet'] as const;

// PowerShell receives the file path as $args[0].
const POWERSHELL_ARGS = [
  '-NoProfile',
  '-NonInteractive',
  '-Command',
  '(New-Object Media.SoundPlayer $args[0]).PlaySync()',
] as const;

/** Built-in players, most reliable first within each platform. */
export const BUILTIN_PLAYERS: readonly PlayerCandidate[] = [
  {
    name: 'afplay',
    executable: 'afplay',
    args: [],
    platforms: ['darwin'],
    formats: ['wav', 'mp3', 'flac'],
  },
  {
    name: 'paplay',
    executable: 'paplay',
    args: [],
    platforms: ['linux'],
    formats: ['wav', 'ogg', 'flac'],
  },
  {
    name: 'aplay',
    executable: 'aplay',
    args: ['-q'],
    platforms: ['linux'],
    formats: ['wav'],
  },
  {
    name: 'powershell-soundplayer',
    executable: 'powershell.exe',
    args: POWERSHELL_ARGS,
    platforms: ['win32'],
    formats: ['wav'],
  },
  {
    name: 'ffplay',
    executable: 'ffplay',
    args: FFPLAY_ARGS,
    platforms: ['darwin', 'linux', 'win32'],
    formats: ['wav', 'mp3', 'ogg', 'flac'],
  },
  {
    name: 'mpg123',
    executable: 'mpg123',
    args: ['-q'],
    platforms: ['darwin', 'linux'],
    formats: ['mp3'],
  },
  {
    name: 'sox-play',
    executable: 'play',
    args: ['-q'],
    platforms: ['linux'],
    formats: ['wav', 'mp3', 'ogg', 'flac'],
  },
];
