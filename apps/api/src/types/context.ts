import type { ApiConfig } from '../config.js';
import type { Services } from '../services/index.js';

/**
 * Shared Hono context variables for API requests
 */
export type ContextVariables = {
  requestId: string;
  services: Services;
  config: ApiConfig;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
