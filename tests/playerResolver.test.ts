import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { PlayerCandidate } from '../src/playback/types';
import { setTestEnv } from './testEnv';

setTestEnv();

function names(candidates: PlayerCandidate[]): string[] {
  return candidates.map((candidate) => candidate.name);
}

test('resolveCandidates filters built-ins by platform and format in priority order', async () => {
  const { resolveCandidates } = await import('../src/playback/resolver');

  assert.deepEqual(names(resolveCandidates('linux', 'wav')), ['paplay', 'aplay', 'ffplay', 'sox-play']);
  assert.deepEqual(names(resolveCandidates('linux', 'mp3')), ['ffplay', 'mpg123', 'sox-play']);
  assert.deepEqual(names(resolveCandidates('darwin', 'mp3')), ['afplay', 'ffplay', 'mpg123']);
  assert.deepEqual(names(resolveCandidates('darwin', 'ogg')), ['ffplay']);
  assert.deepEqual(names(resolveCandidates('win32', 'wav')), ['powershell-soundplayer', 'ffplay']);
  assert.deepEqual(names(resolveCandidates('win32', 'mp3')), ['ffplay']);
});

test('resolveCandidates returns an empty list when nothing matches', async () => {
  const { resolveCandidates } = await import('../src/playback/resolver');
  const onlyMac: PlayerCandidate[] = [
    { name: 'afplay', executable: 'afplay', args: [], platforms: ['darwin'], formats: ['wav'] },
  ];

  assert.deepEqual(resolveCandidates(null, 'wav'), []);
  assert.deepEqual(resolveCandidates('linux', 'wav', undefined, onlyMac), []);
  assert.deepEqual(resolveCandidates('darwin', 'mp3', null, onlyMac), []);
});

test('an override comes first even when its tags would exclude it', async () => {
  const { resolveCandidates } = await import('../src/playback/resolver');

  const resolved = resolveCandidates('win32', 'ogg', { executable: 'mpv', args: ['--no-video'] });
  assert.deepEqual(names(resolved), ['override:mpv', 'ffplay']);
  assert.equal(resolved[0]?.executable, 'mpv');
  assert.deepEqual(resolved[0]?.args, ['--no-video']);

  assert.deepEqual(names(resolveCandidates(null, 'flac', { executable: 'mpv', args: [] })), ['override:mpv']);
});

test('a built-in identical to the override is not tried twice', async () => {
  const { resolveCandidates } = await import('../src/playback/resolver');

  const resolved = resolveCandidates('linux', 'wav', { executable: 'aplay', args: ['-q'] });
  assert.deepEqual(names(resolved), ['override:aplay', 'paplay', 'ffplay', 'sox-play']);
});

test('toHostPlatform only accepts platforms with built-in players', async () => {
  const { toHostPlatform } = await import('../src/playback/resolver');

  assert.equal(toHostPlatform('linux'), 'linux');
  assert.equal(toHostPlatform('darwin'), 'darwin');
  assert.equal(toHostPlatform('win32'), 'win32');
  assert.equal(toHostPlatform('freebsd'), null);
});
