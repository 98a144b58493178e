/**
 * Guide Controller
 *
 * GET  /users/:userId/preferences
 * PUT  /users/:userId/preferences
 * POST /users/:userId/location                       { lat, lng } → first card + localized progress
 * GET  /users/:userId/places/:index
 * POST /users/:userId/places/:index/story
 * POST /users/:userId/places/:index/audio-delivered
 */

import { Router, type Request, type Response } from 'express';
import type { GuideService } from '../../services/guide/guide.service.js';
import type { PreferencesStore } from '../../services/guide/preferences.store.js';
import type { I18nService } from '../../services/i18n/index.js';
import type { SearchProgress } from '../../services/places/progressive-search.js';
import {
  locationBodySchema,
  placeParamsSchema,
  preferencesBodySchema,
  toValidationFailure,
  userParamsSchema,
} from './guide.validation.js';

export interface GuideRouterDeps {
  guide: GuideService;
  preferences: PreferencesStore;
  i18n: I18nService;
}

function sendServerError(req: Request, res: Response, message: string, error: unknown, operation: string): void {
  req.log.error({
    event: 'guide_route_failed',
    operation,
    error: error instanceof Error ? error.message : String(error),
  }, '[GuideController] Unhandled error');
  res.status(500).json({ error: 'INTERNAL_ERROR', message });
}

export function createGuideRouter({ guide, preferences, i18n }: GuideRouterDeps): Router {
  const router = Router();
  const tryAgain = (userId: string) => i18n.t('try_again', preferences.getLanguage(userId));

  router.get('/users/:userId/preferences', (req: Request, res: Response) => {
    const params = userParamsSchema.safeParse(req.params);
    if (!params.success) {
      res.status(400).json(toValidationFailure(params.error));
      return;
    }
    res.json(preferences.get(params.data.userId));
  });

  router.put('/users/:userId/preferences', (req: Request, res: Response) => {
    const params = userParamsSchema.safeParse(req.params);
    const body = preferencesBodySchema.safeParse(req.body);
    if (!params.success) {
      res.status(400).json(toValidationFailure(params.error));
      return;
    }
    if (!body.success) {
      res.status(400).json(toValidationFailure(body.error));
      return;
    }

    const { userId } = params.data;
    const updated = preferences.update(userId, body.data);
    const enabled = preferences.enabledCategories(userId);
    const message = enabled.length === 0
      ? i18n.t('settings_saved_none', updated.language)
      : i18n.t('settings_saved_with_prefs', updated.language, {
        categories: enabled.map((category) => i18n.t(category, updated.language)).join(', '),
      });

    req.log.info({ event: 'preferences_updated', userId, enabled: enabled.length, language: updated.language }, '[GuideController] Preferences updated');
    res.json({ ...updated, message });
  });

  router.post('/users/:userId/location', async (req: Request, res: Response) => {
    const params = userParamsSchema.safeParse(req.params);
    const body = locationBodySchema.safeParse(req.body);
    if (!params.success) {
      res.status(400).json(toValidationFailure(params.error));
      return;
    }
    if (!body.success) {
      res.status(400).json(toValidationFailure(body.error));
      return;
    }

    try {
      const { userId } = params.data;
      const lang = preferences.getLanguage(userId);
      const progress: Array<{ stage: SearchProgress; message: string }> = [];
      const outcome = await guide.handleLocation(userId, body.data, (stage) => {
        progress.push({ stage, message: i18n.t(stage, lang) });
      });

      switch (outcome.status) {
        case 'found':
          res.json({ ...outcome, progress });
          return;
        case 'no_results':
          res.status(200).json({ ...outcome, progress });
          return;
        case 'no_categories':
          res.status(422).json(outcome);
          return;
      }
    } catch (error) {
      sendServerError(req, res, tryAgain(params.data.userId), error, 'location');
    }
  });

  router.get('/users/:userId/places/:index', async (req: Request, res: Response) => {
    const params = placeParamsSchema.safeParse(req.params);
    if (!params.success) {
      res.status(400).json(toValidationFailure(params.error));
      return;
    }

    try {
      const outcome = await guide.showPlace(params.data.userId, params.data.index);
      switch (outcome.status) {
        case 'shown':
          res.json(outcome);
          return;
        case 'lost_track':
          res.status(404).json(outcome);
          return;
        case 'error':
          res.status(502).json(outcome);
          return;
      }
    } catch (error) {
      sendServerError(req, res, tryAgain(params.data.userId), error, 'show_place');
    }
  });

  router.post('/users/:userId/places/:index/story', async (req: Request, res: Response) => {
    const params = placeParamsSchema.safeParse(req.params);
    if (!params.success) {
      res.status(400).json(toValidationFailure(params.error));
      return;
    }

    try {
      const outcome = await guide.tellMore(params.data.userId, params.data.index);
      switch (outcome.status) {
        case 'told': {
          const { audio, ...story } = outcome.story;
          res.json({
            status: outcome.status,
            story: { ...story, audio: audio ? audio.toString('base64') : null },
          });
          return;
        }
        case 'lost_track':
        case 'not_found':
          res.status(404).json(outcome);
          return;
        case 'in_progress':
          res.status(409).json(outcome);
          return;
        case 'cooling_down':
          res.setHeader('Retry-After', String(outcome.remainingSeconds));
          res.status(429).json(outcome);
          return;
        case 'failed':
          res.status(502).json(outcome);
          return;
      }
    } catch (error) {
      sendServerError(req, res, tryAgain(params.data.userId), error, 'story');
    }
  });

  router.post('/users/:userId/places/:index/audio-delivered', (req: Request, res: Response) => {
    const params = placeParamsSchema.safeParse(req.params);
    if (!params.success) {
      res.status(400).json(toValidationFailure(params.error));
      return;
    }

    const outcome = guide.markAudioDelivered(params.data.userId, params.data.index);
    res.status(outcome.status === 'ok' ? 200 : 404).json(outcome);
  });

  return router;
}
