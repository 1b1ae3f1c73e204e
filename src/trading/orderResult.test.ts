import { describe, it, expect } from 'vitest';
import { interpretOrderResult } from './orderResult';

describe('interpretOrderResult', () => {
  it('should accept an ok reply with no statuses', () => {
    expect(interpretOrderResult({ status: 'ok', statuses: [], raw: {} }, 'x')).toEqual({ ok: true, value: {} });
  });

  it('should accept a resting order without fill details', () => {
    const result = interpretOrderResult({ status: 'ok', statuses: [{ kind: 'resting', oid: 7 }], raw: {} }, 'x');
    expect(result).toEqual({ ok: true, value: {} });
  });

  it('should take fill details from the first filled status', () => {
    const result = interpretOrderResult(
      {
        status: 'ok',
        statuses: [
          { kind: 'filled', totalSz: '1.5', avgPx: '2000.1', oid: 11 },
          { kind: 'filled', totalSz: '9', avgPx: '1', oid: 12 },
        ],
        raw: {},
      },
      'x',
    );
    expect(result).toEqual({ ok: true, value: { fill: { size: '1.5', average_price: '2000.1', order_id: 11 } } });
  });

  it('should fail on any rejected status even when another filled', () => {
    const raw = { status: 'ok' };
    const result = interpretOrderResult(
      {
        status: 'ok',
        statuses: [
          { kind: 'filled', totalSz: '1', avgPx: '1', oid: 1 },
          { kind: 'error', message: 'Order has invalid size.' },
        ],
        raw,
      },
      'Failed to open position',
    );
    expect(result).toEqual({
      ok: false,
      error: { kind: 'exchange', message: 'Failed to open position: Order has invalid size.', detail: raw },
    });
  });

  it('should fail on a top-level error', () => {
    const result = interpretOrderResult({ status: 'err', message: 'Vault not registered', raw: 'r' }, 'Failed to close BTC position');
    expect(result).toEqual({
      ok: false,
      error: { kind: 'exchange', message: 'Failed to close BTC position: Vault not registered', detail: 'r' },
    });
  });
});
