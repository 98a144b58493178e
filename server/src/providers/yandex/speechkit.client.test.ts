import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Headers, Response } from 'undici';
import { SpeechKitClient, SPEECHKIT_URL } from './speechkit.client.js';
import { createFakeFetcher, requestBody } from '../../../tests/helpers/fake-fetcher.js';

const OPTIONS = { apiKey: 'test-secret', voice: 'john', lang: 'en-US', timeoutMs: 1000 };

describe('SpeechKitClient', () => {
  it('posts the text as a form and returns the audio bytes', async () => {
    const { fetcher, requests } = createFakeFetcher(() => new Response(Buffer.from('mp3-bytes')));
    const client = new SpeechKitClient({ ...OPTIONS, folderId: 'test-folder', fetcher });

    const audio = await client.synthesize('Hello & welcome');

    assert.equal(audio?.toString(), 'mp3-bytes');
    assert.equal(requests[0]?.url, SPEECHKIT_URL);
    assert.equal(new Headers(requests[0]?.init.headers).get('authorization'), 'Api-Key test-secret');

    const form = new URLSearchParams(requestBody(requests[0]));
    assert.equal(form.get('text'), 'Hello & welcome');
    assert.equal(form.get('format'), 'mp3');
    assert.equal(form.get('voice'), 'john');
    assert.equal(form.get('folderId'), 'test-folder');
  });

  it('returns null on HTTP errors', async () => {
    const { fetcher } = createFakeFetcher(() => new Response('quota exceeded', { status: 429 }));
    const client = new SpeechKitClient({ ...OPTIONS, fetcher });

    assert.equal(await client.synthesize('Hello'), null);
  });

  it('returns null when the request throws', async () => {
    const { fetcher } = createFakeFetcher(() => {
      throw new Error('timeout');
    });
    const client = new SpeechKitClient({ ...OPTIONS, fetcher });

    assert.equal(await client.synthesize('Hello'), null);
  });
});
