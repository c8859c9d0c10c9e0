import pino from 'pino';
import type { GantryConfig } from './config.js';

export function createLogger(cfg: Pick<GantryConfig, 'GANTRY_LOG_LEVEL'>) {
  return pino({
    level: cfg.GANTRY_LOG_LEVEL,
    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie'],
      remove: true
    }
  });
}
