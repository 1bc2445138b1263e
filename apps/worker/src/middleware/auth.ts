import { createMiddleware } from 'hono/factory';
import { timingSafeEqual } from 'hono/utils/buffer';

import type { Env } from '../env';
import { AppError } from './errors';

const BEARER = /^Bearer\s+(.+)$/i;

// Open when RUN_TOKEN is unset; otherwise a matching bearer token is required.
export const requireRunToken = createMiddleware<{ Bindings: Env }>(async (c, next) => {
  const expected = c.env.RUN_TOKEN?.trim();
  if (!expected) {
    await next();
    return;
  }

  const token = BEARER.exec(c.req.header('authorization') ?? '')?.[1]?.trim() ?? '';
  if (!token || !(await timingSafeEqual(token, expected))) {
    throw new AppError(401, 'UNAUTHORIZED', 'Unauthorized');
  }

  await next();
});
