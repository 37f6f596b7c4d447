/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/, /health)
 *   - module routes (accounts)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppDeps } from './di';
import { ACCOUNTS_PATH } from '../modules/accounts';

export const SERVICE_BANNER = {
  name: 'Account REST API Service',
  version: '1.0',
  paths: ACCOUNTS_PATH,
} as const;

export function registerRoutes(app: FastifyInstance, opts: { deps: AppDeps }) {
  // Home page
  app.get('/', () => SERVICE_BANNER);

  // Core health endpoint (platform checks); does not touch the database
  app.get('/health', () => ({ status: 'OK' }));

  // Module routes
  opts.deps.accounts.registerRoutes(app);
}
