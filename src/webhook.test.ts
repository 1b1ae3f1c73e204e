import { describe, it, expect } from 'vitest';
import { createAuthenticator } from './auth';
import { FakeExchange, position, rejected, silentLogger } from './testing/fakeExchange';
import { createDispatcher } from './trading/dispatcher';
import type { DispatchRequest } from './trading/dispatcher';
import { PositionManager } from './trading/positionManager';
import type { ResponseEnvelope } from './trading/types';
import { createWebhookHandler } from './webhook';

const authenticator = createAuthenticator(
  { webhookPassword: 'test-secret', allowedSourceIps: ['52.89.214.238'] },
  silentLogger,
);

function handlerFor(exchange: FakeExchange) {
  const manager = new PositionManager(exchange, { integerAssets: [], logger: silentLogger });
  return createWebhookHandler({ authenticator, dispatcher: createDispatcher(manager, silentLogger), logger: silentLogger });
}

function recordingHandler(reply: ResponseEnvelope) {
  const seen: DispatchRequest[] = [];
  const handler = createWebhookHandler({
    authenticator,
    dispatcher: {
      async dispatch(request) {
        seen.push(request);
        return reply;
      },
    },
    logger: silentLogger,
  });
  return { handler, seen };
}

describe('WebhookHandler', () => {
  it('should close everything on a close signal with no positions', async () => {
    const res = await handlerFor(new FakeExchange())({
      body: JSON.stringify({ password: 'test-secret', action: 'close' }),
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(JSON.parse(res.body)).toEqual({
      status: 'success',
      message: 'No open positions to close',
      closed_positions: [],
      failed_positions: [],
    });
  });

  it('should open a position from a JSON string body', async () => {
    const exchange = new FakeExchange();
    const res = await handlerFor(exchange)({
      body: '{"password":"test-secret","action":"long","ticker":"BTC","amountPercent":10}',
      sourceAddress: '52.89.214.238',
    });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({
      status: 'success',
      message: 'Successfully opened long position for BTC',
      details: { asset: 'BTC', side: 'long', size: '0.04', leverage: 20, usd_value: '2000' },
    });
  });

  it('should accept an already decoded body', async () => {
    const res = await handlerFor(new FakeExchange())({ body: { password: 'test-secret', action: 'close' } });
    expect(res.statusCode).toBe(200);
  });

  it('should reject malformed JSON with 400', async () => {
    const res = await handlerFor(new FakeExchange())({ body: '{"password": ' });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({ status: 'error', message: 'Invalid JSON in request body' });
  });

  it('should reject a JSON array with 400', async () => {
    const res = await handlerFor(new FakeExchange())({ body: '[1,2]' });
    expect(res.statusCode).toBe(400);
  });

  it('should answer 403 on a bad password without touching the exchange', async () => {
    const exchange = new FakeExchange();
    const res = await handlerFor(exchange)({ body: JSON.stringify({ password: 'wrong', action: 'close' }) });

    expect(res.statusCode).toBe(403);
    expect(JSON.parse(res.body)).toEqual({ status: 'error', message: 'Unauthorized' });
    expect(exchange.calls).toEqual([]);
  });

  it('should answer 403 to a caller outside the allow-list', async () => {
    const res = await handlerFor(new FakeExchange())({
      body: JSON.stringify({ password: 'test-secret', action: 'close' }),
      sourceAddress: '198.51.100.7',
    });
    expect(res.statusCode).toBe(403);
  });

  it('should default the ticker and percent and coerce a numeric string', async () => {
    const { handler, seen } = recordingHandler({ status: 'success', message: 'ok' });

    await handler({ body: JSON.stringify({ password: 'test-secret', action: 'close' }) });
    await handler({ body: JSON.stringify({ password: 'test-secret', action: 'long', ticker: 'ETH', amountPercent: '25' }) });

    expect(seen).toEqual([
      { action: 'close', ticker: '', amountPercent: 5 },
      { action: 'long', ticker: 'ETH', amountPercent: 25 },
    ]);
  });

  it('should reject a signal without an action', async () => {
    const { handler, seen } = recordingHandler({ status: 'success', message: 'ok' });
    const res = await handler({ body: JSON.stringify({ password: 'test-secret', ticker: 'BTC' }) });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({ status: 'error', message: 'Invalid signal: action is required' });
    expect(seen).toEqual([]);
  });

  it('should map envelope status to the HTTP status', async () => {
    const partial = recordingHandler({ status: 'partial', message: 'Closed 1 positions, 1 failed' });
    const failed = recordingHandler({ status: 'error', message: 'Unknown action: buy' });
    const body = JSON.stringify({ password: 'test-secret', action: 'close' });

    expect((await partial.handler({ body })).statusCode).toBe(200);
    expect((await failed.handler({ body })).statusCode).toBe(400);
  });

  it('should answer 200 with a partial envelope when a flip closes but the open is rejected', async () => {
    const exchange = new FakeExchange({
      positions: [position('BTC', '-0.5')],
      orderResult: rejected('Insufficient margin'),
    });
    const res = await handlerFor(exchange)({
      body: JSON.stringify({ password: 'test-secret', action: 'long', ticker: 'BTC', amountPercent: 10 }),
    });
    const envelope = JSON.parse(res.body);

    expect(res.statusCode).toBe(200);
    expect(envelope.status).toBe('partial');
    expect(envelope.closed_positions).toEqual([{ asset: 'BTC', size: '0.5', side: 'short' }]);
    expect(exchange.positions).toEqual([]);
  });

  it('should report a partial close in the body', async () => {
    const exchange = new FakeExchange({
      positions: [position('BTC', '0.1'), position('ETH', '-1')],
      closeResults: { ETH: new Error('boom') },
    });
    const res = await handlerFor(exchange)({ body: JSON.stringify({ password: 'test-secret', action: 'close' }) });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).status).toBe('partial');
  });
});
