import dotenv from 'dotenv';
import { loadSettings } from './config/settings.js';
import { createApp } from './http/routes.js';
import { createNode } from './node/bootstrap.js';
import { createHttpPeerFetcher } from './peers/peer-client.js';
import { RedisChainStore } from './persistence/chain-store.js';
import { connectRedis, shutdownRedis } from './persistence/redis-client.js';
import { logger, errorMessage } from './observability/logger.js';

dotenv.config();

async function main(): Promise<void> {
  const settings = loadSettings();

  const redis = await connectRedis(settings.redisUrl);
  const store = redis ? new RedisChainStore(redis) : undefined;

  const node = await createNode(settings, {
    fetchPeerChain: createHttpPeerFetcher({ timeoutMs: settings.peerFetchTimeoutMs }),
    store,
  });

  const app = createApp(node);

  const server = app.listen(settings.port, () => {
    logger.info('startup', 'Ledger node listening', {
      port: settings.port,
      nodeId: settings.nodeId,
      storage: store ? 'redis' : 'memory',
      chainLength: node.getChainLength(),
      miningReward: settings.miningRewardEnabled,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('shutdown', `${signal} received, graceful shutdown`);
    server.close(() => {
      shutdownRedis()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('shutdown', 'Redis shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  logger.error('startup', 'Ledger node failed to start', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
