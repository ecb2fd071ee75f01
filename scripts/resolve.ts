import { appConfig } from '../src/config';
import { CatalogResolver } from '../src/services/CatalogResolver';
import { describeEntity } from '../src/services/providers/BaseCatalogProvider';
import { scopedLog } from '../src/utils/logger';

const log = scopedLog('cli');

async function run() {
  const args = process.argv.slice(2);
  const stream = args.includes('--stream');
  const url = args.find((a) => !a.startsWith('--'));

  if (!url) {
    log.error('usage: resolve <catalog url> [--stream]');
    process.exit(1);
  }

  const resolver = CatalogResolver.fromConfig(appConfig);

  if (stream) {
    let batches = 0;
    let tracks = 0;
    for await (const batch of resolver.iterPlaylistTracks(url)) {
      batches += 1;
      tracks += batch.length;
      log.info('stream_batch', { batch: batches, size: batch.length, firstTitle: batch[0]?.title });
    }
    log.info('stream_finished', { url, batches, tracks });
    return;
  }

  const entity = await resolver.resolve(url);
  log.info('resolved', {
    url,
    ...describeEntity(entity),
    ...(entity.kind === 'playlist' ? { degraded: entity.degraded } : {}),
  });
}

run().catch((error: unknown) => {
  log.error('resolve_failed', error);
  process.exit(1);
});
