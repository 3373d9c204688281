import { Router } from 'express';
import type { Services } from '../../services/index.js';
import { createCommentsRouter } from './comments.js';
import { createParksRouter } from './parks.js';
import { createPhotosRouter } from './photos.js';
import { createTagsRouter } from './tags.js';

export function createApiRouter(services: Services): Router {
  const router = Router();

  router.use('/parks', createParksRouter(services));
  router.use('/photos', createPhotosRouter(services.photos));
  router.use('/comments', createCommentsRouter(services.comments));
  router.use('/tags', createTagsRouter(services.tags));

  return router;
}
