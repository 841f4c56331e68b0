/**
 * Ownership ledger routes
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { ownershipReadsRoute } from './reads.js';
import { ownershipWritesRoute } from './writes.js';

const ownershipRoute = new Hono<AppBindings>();

ownershipRoute.route('/', ownershipWritesRoute);
ownershipRoute.route('/', ownershipReadsRoute);

export { ownershipRoute };
