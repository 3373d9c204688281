import type { NextFunction, Request, Response } from 'express';
import { jwtVerify, type JWTPayload } from 'jose';
import { validate as isUuid } from 'uuid';
import { config } from '../../config/index.js';
import { ANONYMOUS, type Caller } from '../../types/caller.js';

// Augment Express Request type with the resolved caller
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      caller?: Caller;
    }
  }
}

// Verify token using the JWT secret (Legacy HS256)
function getSharedSecret(): Uint8Array {
  const secret = config.supabase.jwtSecret;
  if (!secret) {
    throw new Error('SUPABASE_JWT_SECRET not configured');
  }
  return new TextEncoder().encode(secret);
}

async function verifyToken(token: string): Promise<JWTPayload> {
  try {
    const secret = getSharedSecret();
    const { payload } = await jwtVerify(token, secret, {
      issuer: `${config.supabase.url}/auth/v1`,
    });
    return payload;
  } catch (err) {
    throw new Error(`Token verification failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Admins carry the configured role in Supabase's `app_metadata`, which only
 * the service role can write.
 */
export function isAdminClaim(payload: JWTPayload): boolean {
  const appMetadata = payload.app_metadata;
  return isRecord(appMetadata) && appMetadata.role === config.auth.adminRole;
}

/**
 * Owner columns are uuids, so a subject that is not one cannot own anything.
 */
export function callerFromPayload(payload: JWTPayload): Caller | null {
  const userId = payload.sub;
  if (!userId || !isUuid(userId)) {
    return null;
  }
  return { id: userId, isAdmin: isAdminClaim(payload) };
}

function bearerToken(req: Request): string | null {
  const authHeader = req.header('authorization');
  if (!authHeader?.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.substring('Bearer '.length).trim();
}

/**
 * Resolves the caller when a token is present and lets anonymous requests
 * through. A token that fails verification is still rejected.
 */
export async function optionalAuth(req: Request, res: Response, next: NextFunction) {
  const token = bearerToken(req);
  if (!token) {
    req.caller = ANONYMOUS;
    return next();
  }
  try {
    const caller = callerFromPayload(await verifyToken(token));
    if (!caller) {
      return res.status(401).json({ error: 'Unauthorized: invalid token subject', code: 'INVALID_TOKEN' });
    }
    req.caller = caller;
    return next();
  } catch (err) {
    console.warn('Auth error:', err instanceof Error ? err.message : err);
    return res.status(401).json({ error: 'Unauthorized: invalid token', code: 'INVALID_TOKEN' });
  }
}

export async function requireAuth(req: Request, res: Response, next: NextFunction) {
  const token = bearerToken(req);
  if (!token) {
    return res.status(401).json({ error: 'Unauthorized: missing bearer token', code: 'UNAUTHORIZED' });
  }
  return optionalAuth(req, res, next);
}

export function getCaller(req: Request): Caller {
  return req.caller ?? ANONYMOUS;
}
