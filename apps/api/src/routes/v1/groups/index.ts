/**
 * Group routes
 * Directory management, membership and group-scoped collection views
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { groupDirectoryRoute } from './directory.js';
import { groupMembersRoute } from './members.js';
import { groupViewsRoute } from './views.js';

const groupsRoute = new Hono<AppBindings>();

groupsRoute.route('/', groupDirectoryRoute);
groupsRoute.route('/', groupMembersRoute);
groupsRoute.route('/', groupViewsRoute);

export { groupsRoute };
