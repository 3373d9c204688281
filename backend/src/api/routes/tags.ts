import { Router, type NextFunction, type Request, type Response } from 'express';
import type { TagService } from '../../services/tagService.js';
import { getCaller, requireAuth } from '../middlewares/auth.js';
import { validateId } from '../middlewares/validation.js';

export function createTagsRouter(tags: TagService): Router {
  const router = Router();

  /**
   * DELETE /v1/tags/:id
   * Admin only
   */
  router.delete('/:id', requireAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await tags.deleteTag(getCaller(req), req.params.id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
