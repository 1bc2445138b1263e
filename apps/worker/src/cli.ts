import { serve } from '@hono/node-server';

import app from './index';
import { loadWorkerEnv } from './load-env';
import { readPort } from './settings';
import { runScheduledTick } from './scheduler/scheduled';

async function runOnce(): Promise<void> {
  const report = await runScheduledTick(process.env);
  console.log(JSON.stringify(report.body, null, 2));
  process.exitCode = report.statusCode === 200 ? 0 : 1;
}

function startServer(): void {
  const port = readPort(process.env);
  serve({ fetch: (req) => app.fetch(req, process.env), port }, (info) => {
    console.log(`serve: listening on http://localhost:${info.port}`);
  });
}

loadWorkerEnv();

const [command = 'run'] = process.argv.slice(2);

if (command === 'serve') {
  startServer();
} else if (command === 'run') {
  runOnce().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
} else {
  console.error(`usage: url-pinger [run|serve] (unknown command "${command}")`);
  process.exitCode = 2;
}
