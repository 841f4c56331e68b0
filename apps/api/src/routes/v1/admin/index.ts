/**
 * Admin routes
 * Guarded by the admin key and IP allow-list
 */

import { Hono } from 'hono';
import { adminAuthMiddleware } from '../../../middleware/admin-auth.js';
import type { AppBindings } from '../../../types/context.js';
import { adminCatalogRoute } from './catalog.js';
import { adminHistoryRoute } from './history.js';

const adminRoute = new Hono<AppBindings>();

adminRoute.use('*', adminAuthMiddleware);

adminRoute.route('/coins', adminCatalogRoute);
adminRoute.route('/history', adminHistoryRoute);

export { adminRoute };
