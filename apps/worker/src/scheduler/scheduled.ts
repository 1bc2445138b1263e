import type { Env } from '../env';
import { loadTargetUrls } from '../config/targets';
import { openSqliteFlagStore } from '../flags/sqlite';
import { AppError, toErrorMessage } from '../middleware/errors';
import { createProbe } from '../monitor/http';
import { createNotifier } from '../notify';
import { readSettings, type RunSettings } from '../settings';
import { failedRunReport, runChecks, type RunReport } from './run';

/**
 * One run: settings, then the URL list, then every target in order.
 * Precondition failures come back as a 500 report before any target is touched.
 */
export async function runScheduledTick(env: Env): Promise<RunReport> {
  let urls: string[];
  let settings: RunSettings;
  try {
    settings = readSettings(env);
    urls = await loadTargetUrls(settings.configSource);
  } catch (err) {
    if (err instanceof AppError) {
      console.error(`config: ${err.message}`);
      return failedRunReport(err.code, err.message);
    }
    throw err;
  }

  console.log(`run: loaded ${urls.length} url(s) from ${settings.configSource}`);

  let flags: ReturnType<typeof openSqliteFlagStore>;
  try {
    flags = openSqliteFlagStore(settings.flags.dbPath, settings.flags.namespace);
  } catch (err) {
    const message = `Unable to open flag store at ${settings.flags.dbPath}: ${toErrorMessage(err)}`;
    console.error(`run: ${message}`);
    return failedRunReport('FLAG_STORE_UNAVAILABLE', message);
  }

  try {
    return await runChecks(urls, {
      flagStore: flags.store,
      notifier: createNotifier(settings.notify),
      probe: createProbe({ timeoutMs: settings.probeTimeoutMs }),
    });
  } finally {
    flags.close();
  }
}
