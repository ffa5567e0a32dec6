import type { DeliveryResult } from '../../src/server/services/delivery/Broadcaster';
import { PlayerService } from '../../src/server/services/player/PlayerService';
import {
  FixedParityStrategy,
  RandomParityStrategy,
  createStrategy,
  type ChoiceContext,
  type ParityStrategy,
} from '../../src/server/services/player/strategies';
import type { GameOverInput } from '../../src/shared/validation/protocolSchemas';

const LEAGUE = 'http://league.test/mcp';

function setup(
  strategy: ParityStrategy = new FixedParityStrategy('odd'),
  delivery: DeliveryResult = {
    ok: true,
    attempts: 1,
    response: { status: 'ACCEPTED', agent_id: 'P01', auth_token: 'test-token', league_id: 'lg' },
  }
) {
  const broadcaster = { deliver: jest.fn(async (): Promise<DeliveryResult> => delivery) };
  const player = new PlayerService({
    settings: {
      displayName: 'Alice',
      endpoint: 'http://p01.test/mcp',
      leagueEndpoint: LEAGUE,
      version: '1.0.0',
    },
    broadcaster,
    strategy,
    now: () => new Date('2026-01-01T10:00:00.000Z'),
  });
  return { player, broadcaster };
}

const gameOver = (matchId: string, winner: string | null, p02Choice: 'even' | 'odd'): GameOverInput => ({
  match_id: matchId,
  game_result: {
    status: winner ? 'WIN' : 'DRAW',
    winner_player_id: winner,
    drawn_number: 7,
    number_parity: 'odd',
    choices: { P01: 'odd', P02: p02Choice },
    scores: { P01: winner === 'P01' ? 3 : 0, P02: winner === 'P02' ? 3 : 0 },
  },
});

describe('PlayerService', () => {
  it('registers with the league and keeps the assigned id', async () => {
    const { player, broadcaster } = setup();

    await expect(player.register()).resolves.toBe(true);

    expect(player.id).toBe('P01');
    expect(broadcaster.deliver).toHaveBeenCalledWith(
      { id: 'league_manager', endpoint: LEAGUE },
      expect.objectContaining({
        message_type: 'LEAGUE_REGISTER_REQUEST',
        sender: 'player:unregistered',
        player_meta: {
          display_name: 'Alice',
          contact_endpoint: 'http://p01.test/mcp',
          version: '1.0.0',
          game_types: ['even_odd'],
        },
      })
    );
  });

  it('reports a failed registration', async () => {
    const { player } = setup(undefined, { ok: false, attempts: 3, error: 'connect ECONNREFUSED' });

    await expect(player.register()).resolves.toBe(false);
    expect(player.id).toBeNull();
  });

  it('accepts every invitation', async () => {
    const { player } = setup();
    await player.register();

    const ack = player.handleInvitation({
      match_id: 'lg_R1_M001',
      round_id: 1,
      opponent_id: 'P02',
      role: 'PLAYER_A',
      conversation_id: 'match_lg_R1_M001',
    });

    expect(ack).toMatchObject({
      message_type: 'GAME_JOIN_ACK',
      sender: 'player:P01',
      conversation_id: 'match_lg_R1_M001',
      match_id: 'lg_R1_M001',
      player_id: 'P01',
      accept: true,
      arrival_timestamp: '2026-01-01T10:00:00.000Z',
    });
  });

  it('answers a choice request with its strategy and the opponent history', async () => {
    const seen: ChoiceContext[] = [];
    const strategy: ParityStrategy = {
      name: 'recording',
      choose: (context) => {
        seen.push(context);
        return 'even';
      },
    };
    const { player } = setup(strategy);
    await player.register();
    player.recordResult(gameOver('lg_R1_M001', 'P01', 'even'));

    const response = await player.chooseParity({
      match_id: 'lg_R2_M001',
      player_id: 'P01',
      context: { opponent_id: 'P02', standings: [] },
    });

    expect(response).toMatchObject({
      message_type: 'CHOOSE_PARITY_RESPONSE',
      match_id: 'lg_R2_M001',
      player_id: 'P01',
      parity_choice: 'even',
    });
    expect(seen).toHaveLength(1);
    expect(seen[0].opponentId).toBe('P02');
    expect(seen[0].opponentHistory).toEqual([
      {
        matchId: 'lg_R1_M001',
        drawnNumber: 7,
        ownChoice: 'odd',
        opponentChoice: 'even',
        outcome: 'WIN',
      },
    ]);
  });

  it('tracks wins, losses and draws per opponent', async () => {
    const { player } = setup();
    await player.register();

    player.recordResult(gameOver('lg_R1_M001', 'P01', 'even'));
    player.recordResult(gameOver('lg_R2_M001', 'P02', 'odd'));
    player.recordResult(gameOver('lg_R3_M001', null, 'odd'));

    expect(player.historyAgainst('P02').map((r) => r.outcome)).toEqual(['WIN', 'LOSS', 'DRAW']);
    expect(player.summary()).toEqual({ player_id: 'P01', played: 3, wins: 1, losses: 1, draws: 1 });
  });

  it('acknowledges a result that does not name it without recording it', async () => {
    const { player } = setup();

    expect(player.recordResult(gameOver('lg_R1_M001', 'P01', 'even'))).toEqual({
      acknowledged: true,
    });
    expect(player.summary().played).toBe(0);
  });
});

describe('strategies', () => {
  const context: ChoiceContext = {
    matchId: 'lg_R1_M001',
    opponentId: 'P02',
    opponentHistory: [],
    standings: [],
  };

  it('fixed strategy always returns its choice', () => {
    const strategy = new FixedParityStrategy('even');
    expect(strategy.name).toBe('always_even');
    expect([strategy.choose(), strategy.choose()]).toEqual(['even', 'even']);
  });

  it('random strategy maps the drawn index onto a parity', () => {
    expect(new RandomParityStrategy(() => 0).choose()).toBe('even');
    expect(new RandomParityStrategy(() => 1).choose()).toBe('odd');
  });

  it('random strategy only ever answers even or odd', () => {
    const strategy = new RandomParityStrategy();
    for (let i = 0; i < 20; i++) {
      expect(['even', 'odd']).toContain(strategy.choose());
    }
  });

  it('creates strategies by name', async () => {
    expect(createStrategy('random').name).toBe('random');
    expect(createStrategy('always_odd').name).toBe('always_odd');
    await expect(Promise.resolve(createStrategy('always_even').choose(context))).resolves.toBe('even');
  });
});
