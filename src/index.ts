import { CacheJanitor } from './cache/janitor';
import { loadRelayConfig } from './config/relayConfig';
import { log } from './log';
import { PlaybackDispatcher } from './playback/dispatcher';
import { buildServer } from './server';
import { AudioArtifactStore } from './storage/audioStore';

async function main(): Promise<void> {
  const config = loadRelayConfig();

  const store = new AudioArtifactStore({ root: config.audioDir, protectedPaths: config.protectedPaths });
  await store.init();

  const janitor = new CacheJanitor(store);
  janitor.start({ intervalSeconds: config.sweepIntervalSeconds, ttlSeconds: config.ttlSeconds });

  const dispatcher = new PlaybackDispatcher({
    override: config.playerOverride,
    timeoutMs: config.playerTimeoutMs,
  });

  const { server } = buildServer({ store, dispatcher });

  server.listen(config.port, config.host, () => {
    log.info(
      {
        host: config.host,
        port: config.port,
        audio_dir: store.root,
        ttl_s: config.ttlSeconds,
        sweep_interval_s: config.sweepIntervalSeconds,
      },
      'server listening',
    );
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'server shutting down');

    janitor
      .stop()
      .then(
        () =>
          new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
          }),
      )
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error }, 'shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'startup failed');
  process.exit(1);
});
