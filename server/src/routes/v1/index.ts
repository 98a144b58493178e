/**
 * API v1 Router Aggregator
 * Centralizes all v1 API routes under /api/v1
 *
 * Route Structure:
 * - /api/v1/users/:userId/preferences                      GET, PUT
 * - /api/v1/users/:userId/location                         POST
 * - /api/v1/users/:userId/places/:index                    GET
 * - /api/v1/users/:userId/places/:index/story              POST
 * - /api/v1/users/:userId/places/:index/audio-delivered    POST
 */

import { Router } from 'express';
import { createGuideRouter, type GuideRouterDeps } from '../../controllers/guide/guide.controller.js';

export function createV1Router(deps: GuideRouterDeps): Router {
  const router = Router();

  router.use('/', createGuideRouter(deps));

  return router;
}
