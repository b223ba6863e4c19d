/**
 * Receipt entry routes
 * Handles insertion (JSON and CSV upload), listing and lookup
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { createEntriesRoute } from './create.js';
import { getEntryRoute } from './get.js';
import { listEntriesRoute } from './list.js';
import { uploadEntriesRoute } from './upload.js';

const entriesRoute = new Hono<AppBindings>();

// Mount entry routes
entriesRoute.route('/', createEntriesRoute);
entriesRoute.route('/', uploadEntriesRoute);
entriesRoute.route('/', listEntriesRoute);
entriesRoute.route('/', getEntryRoute);

export { entriesRoute, createEntriesRoute };
