import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'url';
import { RevisionError } from '../errors';
import { fetchRevision, readRevisionFile, revisionUrl } from '../revision-source';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const REVISION_BODY = {
  batchcomplete: '',
  query: {
    pages: {
      '4242': {
        pageid: 4242,
        title: 'Protocol',
        revisions: [{ revid: 1001, slots: { main: { contentmodel: 'wikitext', '*': '== Play ==\ntext' } } }]
      }
    }
  }
};

describe('revisionUrl', () => {
  it('builds a revision content query', () => {
    expect(revisionUrl(1001, 'https://wiki.example.org/api.php')).toBe(
      'https://wiki.example.org/api.php?action=query&format=json&prop=revisions&rvslots=*&rvprop=content&revids=1001'
    );
  });
});

describe('fetchRevision', () => {
  it('returns the main slot content', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => jsonResponse(REVISION_BODY));

    const source = await fetchRevision(1001, { apiUrl: 'https://wiki.example.org/api.php', fetch: fetchMock });

    expect(source).toBe('== Play ==\ntext');
    expect(fetchMock).toHaveBeenCalledWith(revisionUrl(1001, 'https://wiki.example.org/api.php'));
  });

  it('fails on HTTP errors', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => new Response('unavailable', { status: 503 }));

    await expect(fetchRevision(1001, { fetch: fetchMock }))
      .rejects.toThrow('Request for revision 1001 failed with HTTP 503');
  });

  it('fails when the request cannot be made', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request): Promise<Response> => {
      throw new TypeError('fetch failed');
    });

    await expect(fetchRevision(1001, { fetch: fetchMock }))
      .rejects.toThrow('Request for revision 1001 failed: fetch failed');
  });

  it('fails on unexpected response bodies', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => jsonResponse({ error: { code: 'badrevids' } }));

    await expect(fetchRevision(1001, { fetch: fetchMock })).rejects.toThrow(RevisionError);
  });

  it('fails on bodies that are not JSON', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => new Response('<html>maintenance</html>', { status: 200 }));

    const pending = fetchRevision(7, { fetch: fetchMock });
    await expect(pending).rejects.toBeInstanceOf(RevisionError);
    await expect(pending).rejects.toThrow('Response for revision 7 is not JSON');
  });

  it('fails when no page holds the revision', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) =>
      jsonResponse({ query: { pages: { '-1': { title: 'Protocol' } } } })
    );

    await expect(fetchRevision(5, { fetch: fetchMock })).rejects.toThrow('Revision 5 not found');
  });
});

describe('readRevisionFile', () => {
  it('reads local markup', () => {
    const source = readRevisionFile(fileURLToPath(new URL('./fixtures/protocol-page.wiki', import.meta.url)));

    expect(source.startsWith('Intro text about the page.\n')).toBe(true);
  });

  it('fails on missing files', () => {
    expect(() => readRevisionFile('/nonexistent/page.wiki')).toThrow(RevisionError);
  });
});
