import { Hono } from 'hono';

import type { Env } from '../env';
import { requireRunToken } from '../middleware/auth';
import { runScheduledTick } from '../scheduler/scheduled';

export const runRoutes = new Hono<{ Bindings: Env }>();

runRoutes.use('*', requireRunToken);

runRoutes.post('/run', async (c) => {
  const report = await runScheduledTick(c.env);
  return c.json(report.body, report.statusCode);
});
