import type { DeliveryResult } from '../../src/server/services/delivery/Broadcaster';
import { MatchOrchestrator } from '../../src/server/services/referee/MatchOrchestrator';
import type { OutboundMessage } from '../../src/server/rpc/methods';
import type { MatchAssignment } from '../../src/shared/types/league';
import { FakeTransport, type FakeHandler, deferred, flush, never } from '../helpers/fakeTransport';

const A = 'http://pa.test/mcp';
const B = 'http://pb.test/mcp';

const assignment: MatchAssignment = {
  matchId: 'lg_R1_M001',
  roundId: 1,
  leagueId: 'lg',
  playerAId: 'P01',
  playerBId: 'P02',
  playerAEndpoint: A,
  playerBEndpoint: B,
};

const player =
  (choice: unknown, overrides: Partial<Record<string, () => unknown>> = {}): FakeHandler =>
  (method) => {
    const override = overrides[method];
    if (override) return override();
    if (method === 'handle_game_invitation') return { accept: true };
    if (method === 'choose_parity') return { parity_choice: choice };
    return { acknowledged: true };
  };

function setup(
  handlerA: FakeHandler,
  handlerB: FakeHandler,
  options: { drawn?: number; reportOk?: boolean; timeoutMs?: number } = {}
) {
  const transport = new FakeTransport().on(A, handlerA).on(B, handlerB);
  const reports: OutboundMessage[] = [];
  const reporter = {
    report: jest.fn(async (message: OutboundMessage): Promise<DeliveryResult> => {
      reports.push(message);
      return options.reportOk === false
        ? { ok: false, attempts: 3, error: 'Timed out after 5000ms' }
        : { ok: true, attempts: 1, response: { acknowledged: true } };
    }),
  };
  const timeoutMs = options.timeoutMs ?? 200;
  const orchestrator = new MatchOrchestrator({
    refereeId: 'REF01',
    authToken: 'test-token',
    transport,
    reporter,
    timeouts: { invitationTimeoutMs: timeoutMs, choiceTimeoutMs: timeoutMs, notifyTimeoutMs: timeoutMs },
    standings: async () => [
      { player_id: 'P01', rank: 1, points: 3, wins: 1, losses: 0, ties: 0 },
      { player_id: 'P02', rank: 2, points: 0, wins: 0, losses: 1, ties: 0 },
    ],
    drawNumber: () => options.drawn ?? 4,
  });
  return { transport, reports, reporter, orchestrator };
}

const states = (history: readonly { state: string }[]) => history.map((h) => h.state);

describe('MatchOrchestrator', () => {
  it('runs a full match and reports the winner', async () => {
    const { transport, reports, orchestrator } = setup(player('even'), player('odd'), {
      drawn: 4,
    });

    const outcome = await orchestrator.run(assignment);

    expect(outcome).toMatchObject({
      matchId: 'lg_R1_M001',
      status: 'COMPLETED',
      reported: true,
      result: {
        status: 'WIN',
        winnerPlayerId: 'P01',
        drawnNumber: 4,
        numberParity: 'even',
        choices: { P01: 'even', P02: 'odd' },
        scores: { P01: 3, P02: 0 },
      },
    });
    expect(states(outcome.history)).toEqual([
      'WAITING_FOR_PLAYERS',
      'COLLECTING_CHOICES',
      'DRAWING_NUMBER',
      'EVALUATING',
      'FINISHED',
    ]);

    expect(transport.calls.map((c) => `${c.endpoint} ${c.method}`)).toEqual([
      `${A} handle_game_invitation`,
      `${B} handle_game_invitation`,
      `${A} choose_parity`,
      `${B} choose_parity`,
      `${A} notify_match_result`,
      `${B} notify_match_result`,
    ]);
    expect(transport.callsTo(B, 'handle_game_invitation')[0].params).toMatchObject({
      message_type: 'GAME_INVITATION',
      sender: 'referee:REF01',
      conversation_id: 'match_lg_R1_M001',
      opponent_id: 'P01',
      role: 'PLAYER_B',
    });
    expect(transport.callsTo(A, 'choose_parity')[0].params).toMatchObject({
      player_id: 'P01',
      context: {
        opponent_id: 'P02',
        standings: [
          { player_id: 'P01', rank: 1, points: 3, wins: 1, losses: 0, ties: 0 },
          { player_id: 'P02', rank: 2, points: 0, wins: 0, losses: 1, ties: 0 },
        ],
      },
    });
    expect(transport.callsTo(B, 'notify_match_result')[0].params).toMatchObject({
      message_type: 'GAME_OVER',
      game_result: {
        status: 'WIN',
        winner_player_id: 'P01',
        drawn_number: 4,
        number_parity: 'even',
      },
    });

    expect(reports).toHaveLength(1);
    expect(reports[0]).toMatchObject({
      message_type: 'MATCH_RESULT_REPORT',
      sender: 'referee:REF01',
      match_id: 'lg_R1_M001',
      round_id: 1,
      league_id: 'lg',
      auth_token: 'test-token',
      result: {
        status: 'COMPLETED',
        winner: 'P01',
        score: { P01: 3, P02: 0 },
        details: { drawn_number: 4, choices: { P01: 'even', P02: 'odd' } },
      },
    });
  });

  it('reports a draw when nobody matches the drawn parity', async () => {
    const { reports, orchestrator } = setup(player('even'), player('even'), { drawn: 7 });

    const outcome = await orchestrator.run(assignment);

    expect(outcome.result).toMatchObject({
      status: 'DRAW',
      winnerPlayerId: null,
      scores: { P01: 0, P02: 0 },
    });
    expect(reports[0]).toMatchObject({ result: { status: 'COMPLETED', winner: null } });
  });

  it('gives the win to player A when both pick the drawn parity', async () => {
    const { orchestrator } = setup(player('odd'), player('odd'), { drawn: 9 });

    const outcome = await orchestrator.run(assignment);

    expect(outcome.result?.winnerPlayerId).toBe('P01');
  });

  it('aborts and still reports when a player never answers the invitation', async () => {
    const { transport, reports, orchestrator } = setup(
      player('even'),
      player('odd', { handle_game_invitation: () => never() }),
      { timeoutMs: 20 }
    );

    const outcome = await orchestrator.run(assignment);

    expect(outcome).toMatchObject({
      status: 'ABORTED',
      reason: 'P02: invitation timed out after 20ms',
      reported: true,
    });
    expect(states(outcome.history)).toEqual(['WAITING_FOR_PLAYERS', 'ABORTED']);
    expect(transport.calls.filter((c) => c.method === 'choose_parity')).toHaveLength(0);
    expect(reports[0]).toMatchObject({
      message_type: 'MATCH_RESULT_REPORT',
      result: { status: 'ABORTED', reason: 'P02: invitation timed out after 20ms' },
    });
  });

  it('aborts when a player declines', async () => {
    const { orchestrator } = setup(
      player('even', { handle_game_invitation: () => ({ accept: false }) }),
      player('odd')
    );

    const outcome = await orchestrator.run(assignment);

    expect(outcome.reason).toBe('P01: declined the invitation');
  });

  it('aborts on a malformed invitation response', async () => {
    const { orchestrator } = setup(
      player('even', { handle_game_invitation: () => ({ status: 'ok' }) }),
      player('odd')
    );

    const outcome = await orchestrator.run(assignment);

    expect(outcome.reason).toBe('P01: malformed invitation response');
  });

  it('aborts on an illegal parity choice', async () => {
    const { orchestrator } = setup(player('even'), player('maybe'));

    const outcome = await orchestrator.run(assignment);

    expect(outcome).toMatchObject({
      status: 'ABORTED',
      reason: 'P02: Invalid parity choice from P02: "maybe"',
    });
    expect(states(outcome.history)).toEqual([
      'WAITING_FOR_PLAYERS',
      'COLLECTING_CHOICES',
      'ABORTED',
    ]);
  });

  it('aborts when a choice does not arrive in time', async () => {
    const { orchestrator } = setup(
      player('even', { choose_parity: () => never() }),
      player('odd'),
      { timeoutMs: 20 }
    );

    const outcome = await orchestrator.run(assignment);

    expect(outcome.reason).toBe('P01: choice timed out after 20ms');
  });

  it('invites the second player while the first has not answered', async () => {
    const invitation = deferred<unknown>();
    const { transport, orchestrator } = setup(
      player('even', { handle_game_invitation: () => invitation.promise }),
      player('odd'),
      { timeoutMs: 1000 }
    );

    const running = orchestrator.run(assignment);
    await flush();

    expect(transport.callsTo(A, 'handle_game_invitation')).toHaveLength(1);
    expect(transport.callsTo(B, 'handle_game_invitation')).toHaveLength(1);
    expect(transport.callsTo(B, 'choose_parity')).toHaveLength(0);

    invitation.resolve({ accept: true });
    await expect(running).resolves.toMatchObject({ status: 'COMPLETED' });
  });

  it('asks the second player for a choice while the first has not answered', async () => {
    const choice = deferred<unknown>();
    const { transport, orchestrator } = setup(
      player('even', { choose_parity: () => choice.promise }),
      player('odd'),
      { timeoutMs: 1000 }
    );

    const running = orchestrator.run(assignment);
    await flush();

    expect(transport.callsTo(A, 'choose_parity')).toHaveLength(1);
    expect(transport.callsTo(B, 'choose_parity')).toHaveLength(1);
    expect(transport.callsTo(A, 'notify_match_result')).toHaveLength(0);

    choice.resolve({ parity_choice: 'even' });
    await expect(running).resolves.toMatchObject({
      status: 'COMPLETED',
      result: { winnerPlayerId: 'P01' },
    });
  });

  it('completes even if a game over notification fails', async () => {
    const { orchestrator } = setup(
      player('even', {
        notify_match_result: () => {
          throw new Error('connection reset');
        },
      }),
      player('odd')
    );

    const outcome = await orchestrator.run(assignment);

    expect(outcome).toMatchObject({ status: 'COMPLETED', reported: true });
  });

  it('marks the outcome unreported when the report cannot be delivered', async () => {
    const { orchestrator, reporter } = setup(player('even'), player('odd'), { reportOk: false });

    const outcome = await orchestrator.run(assignment);

    expect(outcome.status).toBe('COMPLETED');
    expect(outcome.reported).toBe(false);
    expect(reporter.report).toHaveBeenCalledTimes(1);
  });
});
