import type { Express } from 'express';
import { SignJWT } from 'jose';
import request from 'supertest';
import { createApp } from '../../src/app';
import { MemoryStore } from '../../src/db/memoryStore';
import { createServices } from '../../src/services';
import { ADMIN_ID, MISSING_ID, OTHER_ID, OWNER_ID, parkInput } from '../helpers/fixtures';
import { MemoryCache } from '../helpers/memoryCache';

const signToken = (userId: string, role?: string, secret = 'test-secret') =>
  new SignJWT(role ? { app_metadata: { role } } : {})
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(userId)
    .setIssuer('https://parks.test/auth/v1')
    .setIssuedAt()
    .setExpirationTime('1h')
    .sign(new TextEncoder().encode(secret));

describe('API Integration Tests', () => {
  let app: Express;
  let ownerToken: string;
  let otherToken: string;
  let adminToken: string;

  beforeAll(async () => {
    ownerToken = await signToken(OWNER_ID);
    otherToken = await signToken(OTHER_ID);
    adminToken = await signToken(ADMIN_ID, 'admin');
  });

  beforeEach(() => {
    app = createApp(createServices(new MemoryStore(), new MemoryCache()));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const submitPark = async (): Promise<string> => {
    const response = await request(app)
      .post('/v1/parks')
      .set('Authorization', `Bearer ${ownerToken}`)
      .send(parkInput());
    expect(response.status).toBe(201);
    return response.body.data.id;
  };

  const submitApprovedPark = async (): Promise<string> => {
    const parkId = await submitPark();
    const response = await request(app)
      .patch(`/v1/parks/${parkId}/status`)
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ status: 'approved' });
    expect(response.status).toBe(200);
    return parkId;
  };

  it('reports health', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.env).toBe('test');
  });

  it('returns 404 for unknown routes', async () => {
    const response = await request(app).get('/v1/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.code).toBe('ROUTE_NOT_FOUND');
  });

  describe('POST /v1/parks', () => {
    it('requires a bearer token', async () => {
      const response = await request(app).post('/v1/parks').send(parkInput());

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('UNAUTHORIZED');
    });

    it('rejects a token signed with another secret', async () => {
      const forged = await signToken(OWNER_ID, undefined, 'other-secret');

      const response = await request(app)
        .post('/v1/parks')
        .set('Authorization', `Bearer ${forged}`)
        .send(parkInput());

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('INVALID_TOKEN');
    });

    it('creates a pending park owned by the caller', async () => {
      const response = await request(app)
        .post('/v1/parks')
        .set('Authorization', `Bearer ${ownerToken}`)
        .send(parkInput({ name: 'Riverside' }));

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({
        name: 'Riverside',
        status: 'pending',
        created_by: OWNER_ID,
        upvotes: 0,
        downvotes: 0,
      });
    });

    it('validates coordinates', async () => {
      const response = await request(app)
        .post('/v1/parks')
        .set('Authorization', `Bearer ${ownerToken}`)
        .send(parkInput({ latitude: 91 }));

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /v1/parks', () => {
    it('hides pending parks from anonymous callers', async () => {
      await submitPark();

      const anonymous = await request(app).get('/v1/parks');
      const owner = await request(app).get('/v1/parks').set('Authorization', `Bearer ${ownerToken}`);

      expect(anonymous.status).toBe(200);
      expect(anonymous.body.count).toBe(0);
      expect(owner.body.count).toBe(1);
    });

    it('answers a hidden park with 404', async () => {
      const parkId = await submitPark();

      const response = await request(app).get(`/v1/parks/${parkId}`);

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('NOT_FOUND');
    });
  });

  describe('POST /v1/parks/:id/votes', () => {
    it('records a vote and updates the tally', async () => {
      const parkId = await submitPark();

      const response = await request(app)
        .post(`/v1/parks/${parkId}/votes`)
        .set('Authorization', `Bearer ${ownerToken}`)
        .send({ direction: 'up' });

      expect(response.status).toBe(201);
      expect(response.body.data.vote).toMatchObject({ park_id: parkId, user_id: OWNER_ID, vote_type: true });
      expect(response.body.data.park).toMatchObject({ upvotes: 1, downvotes: 0, status: 'pending' });
    });

    it('hides the park in the result when the voter cannot see it', async () => {
      const parkId = await submitPark();

      const response = await request(app)
        .post(`/v1/parks/${parkId}/votes`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ direction: 'down' });

      expect(response.status).toBe(201);
      expect(response.body.data.park).toBeNull();
    });

    it('rejects a second vote with 409', async () => {
      const parkId = await submitPark();
      await request(app)
        .post(`/v1/parks/${parkId}/votes`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ direction: 'up' });

      const response = await request(app)
        .post(`/v1/parks/${parkId}/votes`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ direction: 'down' });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe('DUPLICATE_VOTE');
    });

    it('rejects votes on unknown parks with 404', async () => {
      const response = await request(app)
        .post(`/v1/parks/${MISSING_ID}/votes`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ direction: 'up' });

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('UNKNOWN_SUBMISSION');
    });

    it('validates the direction', async () => {
      const parkId = await submitPark();

      const response = await request(app)
        .post(`/v1/parks/${parkId}/votes`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ direction: 'sideways' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it("returns the caller's own vote", async () => {
      const parkId = await submitPark();
      await request(app)
        .post(`/v1/parks/${parkId}/votes`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ direction: 'down' });

      const response = await request(app)
        .get(`/v1/parks/${parkId}/votes/me`)
        .set('Authorization', `Bearer ${otherToken}`);

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({ user_id: OTHER_ID, vote_type: false });
    });
  });

  describe('moderation', () => {
    it('lets an admin approve a park for everyone', async () => {
      const parkId = await submitPark();

      const forbidden = await request(app)
        .patch(`/v1/parks/${parkId}/status`)
        .set('Authorization', `Bearer ${ownerToken}`)
        .send({ status: 'approved' });
      const approved = await request(app)
        .patch(`/v1/parks/${parkId}/status`)
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ status: 'approved' });
      const visible = await request(app).get(`/v1/parks/${parkId}`);

      expect(forbidden.status).toBe(403);
      expect(approved.status).toBe(200);
      expect(visible.status).toBe(200);
      expect(visible.body.data.status).toBe('approved');
    });

    it('lets an admin delete a park', async () => {
      const parkId = await submitPark();

      const response = await request(app)
        .delete(`/v1/parks/${parkId}`)
        .set('Authorization', `Bearer ${adminToken}`);
      const after = await request(app).get(`/v1/parks/${parkId}`).set('Authorization', `Bearer ${adminToken}`);

      expect(response.status).toBe(204);
      expect(after.status).toBe(404);
    });
  });
  describe('authentication', () => {
    it('rejects an invalid token on read routes too', async () => {
      const forged = await signToken(OWNER_ID, undefined, 'other-secret');

      const response = await request(app).get('/v1/parks').set('Authorization', `Bearer ${forged}`);

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('INVALID_TOKEN');
    });

    it('rejects a token whose subject is not a user id', async () => {
      const token = await signToken('service-account');

      const response = await request(app)
        .post('/v1/parks')
        .set('Authorization', `Bearer ${token}`)
        .send(parkInput());

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('INVALID_TOKEN');
    });
  });

  describe('request validation', () => {
    it('rejects a park id that is not a UUID', async () => {
      const response = await request(app).get('/v1/parks/abc');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('rejects an unknown status filter', async () => {
      const response = await request(app).get('/v1/parks?status=weird');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('filters the listing by status', async () => {
      const approvedId = await submitApprovedPark();
      await submitPark();

      const response = await request(app)
        .get('/v1/parks?status=approved')
        .set('Authorization', `Bearer ${adminToken}`);

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(1);
      expect(response.body.data[0].id).toBe(approvedId);
    });

    it('rejects a park name over 120 characters', async () => {
      const response = await request(app)
        .post('/v1/parks')
        .set('Authorization', `Bearer ${ownerToken}`)
        .send(parkInput({ name: 'x'.repeat(121) }));

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('photos', () => {
    const addPhoto = (parkId: string, url: string) =>
      request(app)
        .post(`/v1/parks/${parkId}/photos`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ url });

    it('only accepts http(s) URLs', async () => {
      const parkId = await submitApprovedPark();

      const response = await addPhoto(parkId, 'ftp://img.test/1.jpg');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('shows a photo to everyone once an admin approves it', async () => {
      const parkId = await submitApprovedPark();
      const created = await addPhoto(parkId, 'https://img.test/1.jpg');
      const photoId: string = created.body.data.id;

      const hidden = await request(app).get(`/v1/parks/${parkId}/photos`);
      const approved = await request(app)
        .patch(`/v1/photos/${photoId}/approval`)
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ approved: true });
      const visible = await request(app).get(`/v1/photos/${photoId}`);

      expect(created.status).toBe(201);
      expect(created.body.data.is_approved).toBe(false);
      expect(hidden.body.count).toBe(0);
      expect(approved.status).toBe(200);
      expect(approved.body.data.is_approved).toBe(true);
      expect(visible.status).toBe(200);
      expect(visible.body.data.url).toBe('https://img.test/1.jpg');
    });

    it('requires a real boolean for approval', async () => {
      const parkId = await submitApprovedPark();
      const created = await addPhoto(parkId, 'https://img.test/2.jpg');

      const response = await request(app)
        .patch(`/v1/photos/${created.body.data.id}/approval`)
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ approved: 'false' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('lets only admins approve or delete photos', async () => {
      const parkId = await submitApprovedPark();
      const created = await addPhoto(parkId, 'https://img.test/3.jpg');
      const photoId: string = created.body.data.id;

      const approval = await request(app)
        .patch(`/v1/photos/${photoId}/approval`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ approved: true });
      const forbidden = await request(app).delete(`/v1/photos/${photoId}`).set('Authorization', `Bearer ${otherToken}`);
      const deleted = await request(app).delete(`/v1/photos/${photoId}`).set('Authorization', `Bearer ${adminToken}`);
      const after = await request(app).get(`/v1/photos/${photoId}`).set('Authorization', `Bearer ${adminToken}`);

      expect(approval.status).toBe(403);
      expect(forbidden.status).toBe(403);
      expect(deleted.status).toBe(204);
      expect(after.status).toBe(404);
    });
  });

  describe('comments', () => {
    const addComment = (parkId: string, content: string) =>
      request(app)
        .post(`/v1/parks/${parkId}/comments`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ content });

    it('rejects comments over 1000 characters', async () => {
      const parkId = await submitApprovedPark();

      const response = await addComment(parkId, 'x'.repeat(1001));

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('hides a reported comment from anonymous readers but not from its author', async () => {
      const parkId = await submitApprovedPark();
      const created = await addComment(parkId, '  Great rings  ');
      const commentId: string = created.body.data.id;

      const reported = await request(app)
        .patch(`/v1/comments/${commentId}/report`)
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ reported: true });
      const anonymous = await request(app).get(`/v1/comments/${commentId}`);
      const author = await request(app).get(`/v1/comments/${commentId}`).set('Authorization', `Bearer ${otherToken}`);
      const listed = await request(app).get(`/v1/parks/${parkId}/comments`);

      expect(created.status).toBe(201);
      expect(created.body.data.content).toBe('Great rings');
      expect(reported.status).toBe(200);
      expect(reported.body.data.is_reported).toBe(true);
      expect(anonymous.status).toBe(404);
      expect(author.status).toBe(200);
      expect(listed.body.count).toBe(0);
    });

    it('lets only admins report or delete comments', async () => {
      const parkId = await submitApprovedPark();
      const created = await addComment(parkId, 'Nice spot');
      const commentId: string = created.body.data.id;

      const report = await request(app)
        .patch(`/v1/comments/${commentId}/report`)
        .set('Authorization', `Bearer ${ownerToken}`)
        .send({ reported: true });
      const forbidden = await request(app).delete(`/v1/comments/${commentId}`).set('Authorization', `Bearer ${otherToken}`);
      const deleted = await request(app).delete(`/v1/comments/${commentId}`).set('Authorization', `Bearer ${adminToken}`);
      const listed = await request(app).get(`/v1/parks/${parkId}/comments`);

      expect(report.status).toBe(403);
      expect(forbidden.status).toBe(403);
      expect(deleted.status).toBe(204);
      expect(listed.body.count).toBe(0);
    });
  });

  describe('tags', () => {
    const addTag = (parkId: string, tag: string) =>
      request(app)
        .post(`/v1/parks/${parkId}/tags`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ tag });

    it('rejects tags over 40 characters', async () => {
      const parkId = await submitApprovedPark();

      const response = await addTag(parkId, 'x'.repeat(41));

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('stores tags trimmed and lower-cased', async () => {
      const parkId = await submitApprovedPark();

      const created = await addTag(parkId, ' Rings ');
      const listed = await request(app).get(`/v1/parks/${parkId}/tags`);

      expect(created.status).toBe(201);
      expect(created.body.data.tag).toBe('rings');
      expect(listed.body.data.map((tag: { tag: string }) => tag.tag)).toEqual(['rings']);
    });

    it('lets only admins delete tags', async () => {
      const parkId = await submitApprovedPark();
      const created = await addTag(parkId, 'bars');
      const tagId: string = created.body.data.id;

      const forbidden = await request(app).delete(`/v1/tags/${tagId}`).set('Authorization', `Bearer ${otherToken}`);
      const deleted = await request(app).delete(`/v1/tags/${tagId}`).set('Authorization', `Bearer ${adminToken}`);
      const listed = await request(app).get(`/v1/parks/${parkId}/tags`);

      expect(forbidden.status).toBe(403);
      expect(deleted.status).toBe(204);
      expect(listed.body.count).toBe(0);
    });
  });
});
