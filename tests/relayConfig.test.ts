import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { test } from 'node:test';
import { makeTempDir, removeTempDir, setTestEnv } from './testEnv';

setTestEnv();

async function writeJson(dir: string, value: unknown): Promise<string> {
  const filePath = path.join(dir, 'relay_config.json');
  await fs.writeFile(filePath, JSON.stringify(value));
  return filePath;
}

test('loadRelayConfig falls back to defaults without file or env', async () => {
  const { loadRelayConfig } = await import('../src/config/relayConfig');
  const dir = await makeTempDir();
  try {
    const config = loadRelayConfig({ env: {}, configPath: path.join(dir, 'missing.json') });
    assert.deepEqual(config, {
      host: '0.0.0.0',
      port: 8000,
      audioDir: 'audio',
      ttlSeconds: 3600,
      sweepIntervalSeconds: 300,
      protectedPaths: [],
      playerOverride: null,
      playerTimeoutMs: 120000,
    });
    assert.ok(Object.isFrozen(config));
  } finally {
    await removeTempDir(dir);
  }
});

test('loadRelayConfig prefers env over file over defaults', async () => {
  const { loadRelayConfig } = await import('../src/config/relayConfig');
  const dir = await makeTempDir();
  try {
    const configPath = await writeJson(dir, {
      port: 9000,
      audio_cache_ttl_seconds: 60,
      audio_cache_cleanup_interval_seconds: 10,
      protected_paths: ['assets/fallback.wav'],
      _comment: 'ignored',
    });
    const config = loadRelayConfig({
      env: { RELAY_AUDIO_TTL: '0', RELAY_HOST: '127.0.0.1', RELAY_AUDIO_DIR: '' },
      configPath,
    });

    assert.equal(config.ttlSeconds, 0);
    assert.equal(config.host, '127.0.0.1');
    assert.equal(config.port, 9000);
    assert.equal(config.sweepIntervalSeconds, 10);
    assert.equal(config.audioDir, 'audio');
    assert.deepEqual(config.protectedPaths, ['assets/fallback.wav']);
  } finally {
    await removeTempDir(dir);
  }
});

test('loadRelayConfig reads the file named by RELAY_CONFIG_FILE', async () => {
  const { loadRelayConfig } = await import('../src/config/relayConfig');
  const dir = await makeTempDir();
  try {
    const configPath = await writeJson(dir, { audio_cache_ttl_seconds: 42 });
    const config = loadRelayConfig({ env: { RELAY_CONFIG_FILE: configPath } });
    assert.equal(config.ttlSeconds, 42);
  } finally {
    await removeTempDir(dir);
  }
});

test('player override from env replaces the file override', async () => {
  const { loadRelayConfig } = await import('../src/config/relayConfig');
  const dir = await makeTempDir();
  try {
    const configPath = await writeJson(dir, {
      player_override: { executable: 'mpv', args: ['--no-video'] },
    });

    const fromFile = loadRelayConfig({ env: {}, configPath });
    assert.deepEqual(fromFile.playerOverride, { executable: 'mpv', args: ['--no-video'] });

    const fromEnv = loadRelayConfig({
      env: { RELAY_PLAYER: 'vlc', RELAY_PLAYER_ARGS: '["--intf","dummy"]' },
      configPath,
    });
    assert.deepEqual(fromEnv.playerOverride, { executable: 'vlc', args: ['--intf', 'dummy'] });

    const argsOnly = loadRelayConfig({ env: { RELAY_PLAYER_ARGS: '["--quiet"]' }, configPath });
    assert.deepEqual(argsOnly.playerOverride, { executable: 'mpv', args: ['--quiet'] });
  } finally {
    await removeTempDir(dir);
  }
});

test('loadRelayConfig rejects an invalid config file', async () => {
  const { loadRelayConfig } = await import('../src/config/relayConfig');
  const dir = await makeTempDir();
  try {
    const configPath = await writeJson(dir, { audio_cache_cleanup_interval_seconds: 0 });
    assert.throws(
      () => loadRelayConfig({ env: {}, configPath }),
      /Invalid config file .*audio_cache_cleanup_interval_seconds/,
    );

    const brokenPath = path.join(dir, 'broken.json');
    await fs.writeFile(brokenPath, '{ not json');
    assert.throws(() => loadRelayConfig({ env: {}, configPath: brokenPath }), /not valid JSON/);
  } finally {
    await removeTempDir(dir);
  }
});

test('loadRelayConfig rejects invalid environment values', async () => {
  const { loadRelayConfig } = await import('../src/config/relayConfig');
  const dir = await makeTempDir();
  try {
    assert.throws(
      () => loadRelayConfig({ env: { RELAY_AUDIO_TTL: '-5' }, configPath: path.join(dir, 'missing.json') }),
      /Invalid environment variables: RELAY_AUDIO_TTL/,
    );
    assert.throws(
      () => loadRelayConfig({ env: { RELAY_PLAYER_ARGS: 'not-json' }, configPath: path.join(dir, 'missing.json') }),
      /Invalid environment variables: RELAY_PLAYER_ARGS/,
    );
    assert.throws(
      () => loadRelayConfig({ env: { RELAY_PLAYER_ARGS: '["--quiet"]' }, configPath: path.join(dir, 'missing.json') }),
      /Invalid environment variables: RELAY_PLAYER_ARGS: needs RELAY_PLAYER or a player_override/,
    );
  } finally {
    await removeTempDir(dir);
  }
});

test('writeConfigTemplate round-trips through loadRelayConfig', async () => {
  const { loadRelayConfig, writeConfigTemplate } = await import('../src/config/relayConfig');
  const dir = await makeTempDir();
  try {
    const configPath = path.join(dir, 'template.json');
    writeConfigTemplate(configPath);

    const raw: unknown = JSON.parse(await fs.readFile(configPath, 'utf8'));
    assert.ok(typeof raw === 'object' && raw !== null && '_comment' in raw);

    const config = loadRelayConfig({ env: {}, configPath });
    assert.equal(config.ttlSeconds, 3600);
    assert.equal(config.sweepIntervalSeconds, 300);
  } finally {
    await removeTempDir(dir);
  }
});
