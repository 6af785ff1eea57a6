import { ActionError } from '@/common/errors/engagement.errors';
import { FakeXApi, apiError } from '@test/fake-x-api';
import { TwitterActionBackend } from './twitter.action-backend';
import { TwitterSession } from './twitter-session';

describe('TwitterActionBackend', () => {
  let backend: TwitterActionBackend;
  let api: FakeXApi;
  let session: TwitterSession;

  beforeEach(() => {
    backend = new TwitterActionBackend();
    api = new FakeXApi();
    session = new TwitterSession('acct-1', { id: '100', username: 'me' }, api);
  });

  it('acts as the signed-in user', async () => {
    await backend.like(session, 't1');
    await backend.repost(session, 't2');
    await backend.reply(session, 't3', 'nice thread');

    expect(api.calls).toEqual([
      { method: 'like', args: ['100', 't1'] },
      { method: 'retweet', args: ['100', 't2'] },
      { method: 'reply', args: ['nice thread', 't3'] },
    ]);
  });

  it('maps 401 to an invalid session', async () => {
    api.failOn('like', apiError(401));

    await expect(backend.like(session, 't1')).rejects.toMatchObject({
      reason: 'session-invalid',
      message: 'like t1: X API 401: test failure',
    });
  });

  it('maps 429 to rate limiting and keeps the reset hint', async () => {
    api.failOn('retweet', apiError(429, 90_000));

    const error = await backend.repost(session, 't1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ActionError);
    expect(error).toMatchObject({ reason: 'rate-limited', retryAfterMs: 90_000 });
  });

  it('treats other failures as skippable', async () => {
    api.failOn('reply', apiError(403));

    await expect(backend.reply(session, 't1', 'hello')).rejects.toMatchObject({ reason: 'other' });
  });

  it('refuses empty or oversized replies without calling X', async () => {
    await expect(backend.reply(session, 't1', '   ')).rejects.toMatchObject({ reason: 'other' });
    await expect(backend.reply(session, 't1', 'x'.repeat(281))).rejects.toMatchObject({
      reason: 'other',
    });
    expect(api.calls).toEqual([]);
  });

  it('counts characters rather than UTF-16 units', async () => {
    await backend.reply(session, 't1', '🚀'.repeat(280));

    await expect(backend.reply(session, 't1', '🚀'.repeat(281))).rejects.toMatchObject({
      reason: 'other',
      message: 'reply to t1 must be 1-280 characters',
    });
    expect(api.calls).toEqual([{ method: 'reply', args: ['🚀'.repeat(280), 't1'] }]);
  });

  it('refuses a foreign session handle', async () => {
    await expect(backend.like({ accountId: 'acct-1' }, 't1')).rejects.toMatchObject({
      reason: 'session-invalid',
    });
  });
});
