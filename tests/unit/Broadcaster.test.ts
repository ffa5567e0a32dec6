import { Broadcaster } from '../../src/server/services/delivery/Broadcaster';
import { DeliveryReport } from '../../src/server/services/delivery/DeliveryReport';
import { PeerRpcError, PeerUnavailableError } from '../../src/shared/errors';
import { buildMessage } from '../../src/shared/utils/envelope';
import { FakeTransport, never, noSleep } from '../helpers/fakeTransport';

const announcement = () =>
  buildMessage('ROUND_ANNOUNCEMENT', 'league_manager', {
    league_id: 'lg',
    round_id: 1,
    matches: [],
  });

const policy = { timeoutMs: 1000, maxRetries: 2, backoffMs: 500 };

describe('Broadcaster', () => {
  it('reports one unreachable recipient out of three after all retries', async () => {
    const transport = new FakeTransport()
      .on('http://a.test/mcp', () => ({ acknowledged: true }))
      .on('http://b.test/mcp', () => ({ acknowledged: true }))
      .on('http://x.test/mcp', () => {
        throw new PeerUnavailableError('http://x.test/mcp', 'connection refused');
      });
    const sleep = jest.fn(noSleep);
    const broadcaster = new Broadcaster(transport, policy, { sleep });

    const report = await broadcaster.broadcast(
      [
        { id: 'A', endpoint: 'http://a.test/mcp' },
        { id: 'X', endpoint: 'http://x.test/mcp' },
        { id: 'B', endpoint: 'http://b.test/mcp' },
      ],
      announcement()
    );

    expect(report.toJSON()).toEqual({
      total: 3,
      successful: 2,
      failed: 1,
      failed_ids: ['X'],
      errors: { X: 'Peer http://x.test/mcp unavailable: connection refused' },
      success_rate: '66.7%',
    });
    expect(report.isSettled).toBe(true);
    expect(transport.callsTo('http://x.test/mcp')).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[500], [1000]]);
  });

  it('calls the method mapped to the message type with the message as params', async () => {
    const transport = new FakeTransport().on('http://a.test/mcp', () => ({ ok: true }));
    const message = announcement();

    const result = await new Broadcaster(transport, policy, { sleep: noSleep }).deliver(
      { id: 'A', endpoint: 'http://a.test/mcp' },
      message
    );

    expect(result).toEqual({ ok: true, attempts: 1, response: { ok: true } });
    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0]).toMatchObject({
      method: 'notify_round_announcement',
      timeoutMs: 1000,
      params: { message_type: 'ROUND_ANNOUNCEMENT', round_id: 1, sender: 'league_manager' },
    });
  });

  it('succeeds on a later attempt', async () => {
    let calls = 0;
    const transport = new FakeTransport().on('http://a.test/mcp', () => {
      calls++;
      if (calls === 1) throw new PeerUnavailableError('http://a.test/mcp', 'HTTP 503');
      return { acknowledged: true };
    });

    const result = await new Broadcaster(transport, policy, { sleep: noSleep }).deliver(
      { id: 'A', endpoint: 'http://a.test/mcp' },
      announcement()
    );

    expect(result).toEqual({ ok: true, attempts: 2, response: { acknowledged: true } });
  });

  it('does not retry a JSON-RPC error reply', async () => {
    const transport = new FakeTransport().on('http://a.test/mcp', () => {
      throw new PeerRpcError('http://a.test/mcp', 'Method not found', -32601);
    });

    const result = await new Broadcaster(transport, policy, { sleep: noSleep }).deliver(
      { id: 'A', endpoint: 'http://a.test/mcp' },
      announcement()
    );

    expect(result).toEqual({
      ok: false,
      attempts: 1,
      error: 'Peer http://a.test/mcp returned an error: Method not found',
    });
  });

  it('fails a recipient without an endpoint without calling out', async () => {
    const transport = new FakeTransport();

    const result = await new Broadcaster(transport, policy, { sleep: noSleep }).deliver(
      { id: 'A', endpoint: null },
      announcement()
    );

    expect(result).toEqual({ ok: false, attempts: 0, error: 'No endpoint registered' });
    expect(transport.calls).toHaveLength(0);
  });

  it('treats an unanswered attempt as a timeout', async () => {
    const transport = new FakeTransport().on('http://slow.test/mcp', () => never());

    const result = await new Broadcaster(
      transport,
      { timeoutMs: 20, maxRetries: 1, backoffMs: 0 },
      { sleep: noSleep }
    ).deliver({ id: 'S', endpoint: 'http://slow.test/mcp' }, announcement());

    expect(result).toEqual({ ok: false, attempts: 2, error: 'Timed out after 20ms' });
  });
});

describe('DeliveryReport', () => {
  it('starts unsettled and reports 0% for an empty broadcast', () => {
    const report = new DeliveryReport(2);
    expect(report.isSettled).toBe(false);
    report.recordSuccess();
    report.recordFailure('P2', 'boom');
    expect(report.isSettled).toBe(true);
    expect(report.successRate).toBe(0.5);

    expect(new DeliveryReport(0).toJSON().success_rate).toBe('0.0%');
  });
});
