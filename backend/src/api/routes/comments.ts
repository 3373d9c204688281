import { Router, type NextFunction, type Request, type Response } from 'express';
import type { CommentService } from '../../services/commentService.js';
import { getCaller, optionalAuth, requireAuth } from '../middlewares/auth.js';
import { validateFlag, validateId } from '../middlewares/validation.js';

export function createCommentsRouter(comments: CommentService): Router {
  const router = Router();

  /**
   * GET /v1/comments/:id
   */
  router.get('/:id', optionalAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const comment = await comments.getComment(getCaller(req), req.params.id);
      res.json({ success: true, data: comment });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /v1/comments/:id/report
   * Body: { "reported": boolean }. Admin only.
   */
  router.patch('/:id/report', requireAuth, validateFlag('reported'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const comment = await comments.setCommentReported(getCaller(req), req.params.id, req.body.reported === true);
      res.json({ success: true, data: comment });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /v1/comments/:id
   */
  router.delete('/:id', requireAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await comments.deleteComment(getCaller(req), req.params.id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
