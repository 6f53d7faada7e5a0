import { beforeEach } from 'vitest';
import { logger } from '../src/observability/logger.js';
import { metrics } from '../src/metrics/metrics.js';

logger.setSilent(true);

beforeEach(() => {
  metrics.reset();
});
