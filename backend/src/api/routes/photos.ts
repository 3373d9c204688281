import { Router, type NextFunction, type Request, type Response } from 'express';
import type { PhotoService } from '../../services/photoService.js';
import { getCaller, optionalAuth, requireAuth } from '../middlewares/auth.js';
import { validateFlag, validateId } from '../middlewares/validation.js';

export function createPhotosRouter(photos: PhotoService): Router {
  const router = Router();

  /**
   * GET /v1/photos/:id
   */
  router.get('/:id', optionalAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const photo = await photos.getPhoto(getCaller(req), req.params.id);
      res.json({ success: true, data: photo });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /v1/photos/:id/approval
   * Body: { "approved": boolean }. Admin only.
   */
  router.patch('/:id/approval', requireAuth, validateFlag('approved'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const photo = await photos.setPhotoApproval(getCaller(req), req.params.id, req.body.approved === true);
      res.json({ success: true, data: photo });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /v1/photos/:id
   */
  router.delete('/:id', requireAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await photos.deletePhoto(getCaller(req), req.params.id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
