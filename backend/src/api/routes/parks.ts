import { Router, type NextFunction, type Request, type Response } from 'express';
import { matchedData } from 'express-validator';
import type { Services } from '../../services/index.js';
import type { ParkStatus } from '../../types/park.js';
import { PARK_STATUSES } from '../../types/park.js';
import { getCaller, optionalAuth, requireAuth } from '../middlewares/auth.js';
import {
  validateComment,
  validateId,
  validateParkCreation,
  validateParkQuery,
  validatePhotoUpload,
  validateStatusUpdate,
  validateTag,
  validateVote,
} from '../middlewares/validation.js';

const toStatus = (value: unknown): ParkStatus | undefined =>
  PARK_STATUSES.find((status) => status === value);

const optionalText = (value: unknown): string | null =>
  typeof value === 'string' ? value : null;

export function createParksRouter({ parks, votes, photos, comments, tags }: Services): Router {
  const router = Router();

  /**
   * GET /v1/parks
   * Parks visible to the caller, newest first. Optional ?status= filter.
   */
  router.get('/', optionalAuth, validateParkQuery, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await parks.listVisibleSubmissions(getCaller(req), {
        status: toStatus(req.query.status),
      });
      res.json({ success: true, count: data.length, data });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /v1/parks
   * Submit a park for community review
   */
  router.post('/', requireAuth, validateParkCreation, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = matchedData(req, { locations: ['body'] });
      const park = await parks.createSubmission(getCaller(req), {
        name: String(body.name),
        description: optionalText(body.description),
        latitude: Number(body.latitude),
        longitude: Number(body.longitude),
        address: optionalText(body.address),
      });
      res.status(201).json({ success: true, data: park });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /v1/parks/:id
   */
  router.get('/:id', optionalAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const park = await parks.getSubmission(getCaller(req), req.params.id);
      res.json({ success: true, data: park });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /v1/parks/:id/status
   * Admin override of the vote-driven status
   */
  router.patch('/:id/status', requireAuth, validateStatusUpdate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const status = toStatus(req.body.status);
      if (!status) {
        res.status(400).json({ error: 'Invalid status', code: 'VALIDATION_ERROR' });
        return;
      }
      const park = await parks.setSubmissionStatus(getCaller(req), req.params.id, status);
      res.json({ success: true, data: park });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /v1/parks/:id
   * Admin only; removes votes, photos, comments and tags with it
   */
  router.delete('/:id', requireAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await parks.deleteSubmission(getCaller(req), req.params.id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /v1/parks/:id/votes
   * Body: { "direction": "up" | "down" }. One vote per user per park.
   */
  router.post('/:id/votes', requireAuth, validateVote, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const direction = req.body.direction === 'up' ? 'up' : 'down';
      const result = await votes.castVote(getCaller(req), req.params.id, direction);
      res.status(201).json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /v1/parks/:id/votes
   * The caller's own vote, or every vote for admins
   */
  router.get('/:id/votes', optionalAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await votes.listVotes(getCaller(req), req.params.id);
      res.json({ success: true, count: data.length, data });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /v1/parks/:id/votes/me
   */
  router.get('/:id/votes/me', requireAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const vote = await votes.getOwnVote(getCaller(req), req.params.id);
      res.json({ success: true, data: vote });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /v1/parks/:id/photos
   */
  router.get('/:id/photos', optionalAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await photos.listPhotos(getCaller(req), req.params.id);
      res.json({ success: true, count: data.length, data });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /v1/parks/:id/photos
   * Body: { "url": "https://..." }. Binary upload happens elsewhere.
   */
  router.post('/:id/photos', requireAuth, validatePhotoUpload, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const photo = await photos.addPhoto(getCaller(req), req.params.id, String(req.body.url));
      res.status(201).json({ success: true, data: photo });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /v1/parks/:id/comments
   */
  router.get('/:id/comments', optionalAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await comments.listComments(getCaller(req), req.params.id);
      res.json({ success: true, count: data.length, data });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /v1/parks/:id/comments
   */
  router.post('/:id/comments', requireAuth, validateComment, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const comment = await comments.addComment(getCaller(req), req.params.id, String(req.body.content));
      res.status(201).json({ success: true, data: comment });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /v1/parks/:id/tags
   */
  router.get('/:id/tags', optionalAuth, validateId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await tags.listTags(getCaller(req), req.params.id);
      res.json({ success: true, count: data.length, data });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /v1/parks/:id/tags
   */
  router.post('/:id/tags', requireAuth, validateTag, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const tag = await tags.addTag(getCaller(req), req.params.id, String(req.body.tag));
      res.status(201).json({ success: true, data: tag });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
