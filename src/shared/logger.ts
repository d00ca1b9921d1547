/**
 * Process-wide structured logger for code that runs outside a Fastify request.
 * Route handlers should prefer request.log.
 */

import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  level: config.nodeEnv === 'test' ? 'silent' : config.logLevel,
  base: { service: 'eligibility-engine' },
});

/** Child logger tagged with a component name */
export function componentLogger(component: string) {
  return logger.child({ component });
}
