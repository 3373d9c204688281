/**
 * Identity of whoever is making a request, as resolved from the bearer token.
 * `id` is null for anonymous callers. Every service call takes one of these
 * explicitly.
 */
export interface Caller {
  id: string | null;
  isAdmin: boolean;
}

export const ANONYMOUS: Caller = Object.freeze({ id: null, isAdmin: false });

export const userCaller = (id: string): Caller => ({ id, isAdmin: false });

export const adminCaller = (id: string): Caller => ({ id, isAdmin: true });
