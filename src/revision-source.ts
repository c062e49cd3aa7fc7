/**
 * Page source retrieval for a single wiki revision
 */

import { z } from 'zod';
import { readFileSync } from 'fs';
import { RevisionError } from './errors';

export const DEFAULT_API_URL = 'https://minecraft.wiki/api.php';

/**
 * Zod schema for the parts of a MediaWiki `action=query&prop=revisions`
 * response that are read
 */
const RevisionSlotSchema = z.object({
  '*': z.string().describe('Wikitext of the slot')
});

const RevisionSchema = z.object({
  revid: z.number().int().optional(),
  slots: z.object({ main: RevisionSlotSchema })
});

const RevisionResponseSchema = z.object({
  query: z.object({
    pages: z.record(
      z.string(),
      z.object({
        title: z.string().optional(),
        revisions: z.array(RevisionSchema).optional()
      })
    )
  })
});

export interface RevisionSourceOptions {
  apiUrl?: string;
  fetch?: typeof fetch;
}

export function revisionUrl(revisionId: number, apiUrl: string = DEFAULT_API_URL): string {
  const url = new URL(apiUrl);
  url.search = new URLSearchParams({
    action: 'query',
    format: 'json',
    prop: 'revisions',
    rvslots: '*',
    rvprop: 'content',
    revids: String(revisionId)
  }).toString();
  return url.toString();
}

/**
 * Fetch the full page source of one revision
 */
export async function fetchRevision(revisionId: number, options: RevisionSourceOptions = {}): Promise<string> {
  const doFetch = options.fetch ?? fetch;
  const url = revisionUrl(revisionId, options.apiUrl);

  let response: Response;
  try {
    response = await doFetch(url);
  } catch (error) {
    throw new RevisionError(`Request for revision ${revisionId} failed: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!response.ok) {
    throw new RevisionError(`Request for revision ${revisionId} failed with HTTP ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new RevisionError(`Response for revision ${revisionId} is not JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = RevisionResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new RevisionError(`Unexpected API response for revision ${revisionId}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  for (const page of Object.values(parsed.data.query.pages)) {
    const revision = page.revisions?.[0];
    if (revision) {
      return revision.slots.main['*'];
    }
  }

  throw new RevisionError(`Revision ${revisionId} not found`);
}

export function readRevisionFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new RevisionError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
