/**
 * @eurocoin/observability
 *
 * Structured logging for the catalog API and the domain services.
 */

export { createLogger, logger, redactString, redactValue } from './logger.js';
export type { Logger } from './logger.js';
