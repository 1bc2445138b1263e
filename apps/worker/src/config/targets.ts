import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { fetchWithTimeout } from '../monitor/http';
import { ConfigurationError, toErrorMessage } from '../middleware/errors';
import { hasHttpScheme } from '../monitor/targets';
import { parseJsonDocument } from './json';

const SOURCE_TIMEOUT_MS = 10_000;

const targetsDocumentSchema = z
  .object({
    urls: z.array(z.string().trim().min(1, 'url must not be empty')),
  })
  .strict();

async function readSource(source: string): Promise<string> {
  if (hasHttpScheme(source)) {
    let res: Response;
    try {
      res = await fetchWithTimeout(source, SOURCE_TIMEOUT_MS, {
        method: 'GET',
        headers: { Accept: 'application/json' },
      });
    } catch (err) {
      throw new ConfigurationError(`Unable to fetch ${source}: ${toErrorMessage(err)}`);
    }

    if (!res.ok) {
      await res.body?.cancel().catch(() => undefined);
      throw new ConfigurationError(`Unable to fetch ${source}: HTTP ${res.status}`);
    }

    try {
      return await res.text();
    } catch (err) {
      throw new ConfigurationError(`Unable to fetch ${source}: ${toErrorMessage(err)}`);
    }
  }

  try {
    return await readFile(source, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Unable to read ${source}: ${toErrorMessage(err)}`);
  }
}

/** Ordered URL list from a local JSON file or an http(s) location. */
export async function loadTargetUrls(source: string): Promise<string[]> {
  const text = await readSource(source);
  const doc = parseJsonDocument(targetsDocumentSchema, text, { field: source });
  return doc.urls;
}
