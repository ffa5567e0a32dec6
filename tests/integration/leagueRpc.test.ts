import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../src/server/app';
import { leagueRpcMethods } from '../../src/server/routes/leagueRoutes';
import { Broadcaster } from '../../src/server/services/delivery/Broadcaster';
import { AgentRegistry } from '../../src/server/services/league/AgentRegistry';
import { LeagueService } from '../../src/server/services/league/LeagueService';
import { LeagueStore } from '../../src/server/services/league/LeagueStore';
import { FakeTransport, noSleep } from '../helpers/fakeTransport';

const P1 = 'http://p01.test/mcp';
const P2 = 'http://p02.test/mcp';
const P3 = 'http://p03.test/mcp';
const P4 = 'http://p04.test/mcp';
const REF = 'http://ref01.test/mcp';

describe('League manager JSON-RPC surface', () => {
  let dataDir: string;
  let transport: FakeTransport;
  let league: LeagueService;
  let app: Express;
  let nextId = 1;

  const rpc = (method: string, params?: Record<string, unknown>) =>
    request(app)
      .post('/mcp')
      .send({ jsonrpc: '2.0', method, params, id: nextId++ });

  const registerAll = async (): Promise<string> => {
    await rpc('register_player', { player_meta: { display_name: 'Alice', contact_endpoint: P1 } });
    await rpc('register_player', { player_meta: { display_name: 'Bob', contact_endpoint: P2 } });
    const referee = await rpc('register_referee', {
      referee_meta: { display_name: 'Ref', contact_endpoint: REF, max_concurrent_matches: 2 },
    });
    return referee.body.result.auth_token;
  };

  const registerFour = async (): Promise<string> => {
    const players: Array<[string, string]> = [
      ['Alice', P1],
      ['Bob', P2],
      ['Carol', P3],
      ['Dave', P4],
    ];
    for (const [name, endpoint] of players) {
      await rpc('register_player', { player_meta: { display_name: name, contact_endpoint: endpoint } });
    }
    const referee = await rpc('register_referee', {
      referee_meta: { display_name: 'Ref', contact_endpoint: REF, max_concurrent_matches: 2 },
    });
    return referee.body.result.auth_token;
  };

  const reportWin = (
    authToken: string,
    matchId: string,
    roundId: number,
    [winner, loser]: [string, string]
  ) =>
    rpc('report_match_result', {
      sender: 'referee:REF01',
      match_id: matchId,
      round_id: roundId,
      league_id: 'lg',
      auth_token: authToken,
      result: {
        status: 'COMPLETED',
        winner,
        score: { [winner]: 3, [loser]: 0 },
        details: { drawn_number: 4, choices: { [winner]: 'even', [loser]: 'odd' } },
      },
    });

  const pointsOf = async (): Promise<Array<[string, number]>> => {
    const res = await rpc('get_standings');
    return res.body.result.standings.map((s: { player_id: string; points: number }) => [
      s.player_id,
      s.points,
    ]);
  };

  const report = (authToken: string, sender = 'referee:REF01') =>
    rpc('report_match_result', {
      sender,
      match_id: 'lg_R1_M001',
      round_id: 1,
      league_id: 'lg',
      auth_token: authToken,
      result: {
        status: 'COMPLETED',
        winner: 'P01',
        score: { P01: 3, P02: 0 },
        details: { drawn_number: 4, choices: { P01: 'even', P02: 'odd' } },
      },
    });

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'league-rpc-'));
    const ack = () => ({ acknowledged: true });
    transport = new FakeTransport()
      .on(P1, ack)
      .on(P2, ack)
      .on(P3, ack)
      .on(P4, ack)
      .on(REF, () => ({ accepted: true }));
    league = new LeagueService({
      leagueId: 'lg',
      registry: new AgentRegistry({ maxPlayers: 10, maxReferees: 4 }),
      store: new LeagueStore(dataDir, 'lg'),
      broadcaster: new Broadcaster(
        transport,
        { timeoutMs: 1000, maxRetries: 0, backoffMs: 0 },
        { sleep: noSleep }
      ),
    });
    app = createApp(leagueRpcMethods(league), {
      role: 'league_manager',
      agentId: () => 'league_manager',
      version: '1.0.0',
    });
  });

  afterEach(async () => {
    await league.whenIdle();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('transport', () => {
    it('serves /health', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'ok',
        role: 'league_manager',
        agent_id: 'league_manager',
        version: '1.0.0',
      });
    });

    it('answers unknown routes with 404', async () => {
      const res = await request(app).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('NOT_FOUND');
    });

    it('rejects a body that is not JSON with a parse error', async () => {
      const res = await request(app)
        .post('/mcp')
        .set('Content-Type', 'application/json')
        .send('{"jsonrpc": "2.0", "method": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32700, message: 'Parse error' },
      });
    });

    it('rejects a request without the 2.0 version tag', async () => {
      const res = await request(app).post('/mcp').send({ method: 'get_standings', id: 1 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe(-32600);
    });

    it('reports unknown methods', async () => {
      const res = await rpc('play_chess');

      expect(res.status).toBe(200);
      expect(res.body.error).toEqual({ code: -32601, message: 'Method not found: play_chess' });
    });

    it('lists its methods', async () => {
      const res = await rpc('tools/list');

      const names = res.body.result.tools.map((tool: { name: string }) => tool.name);
      expect(names).toEqual([
        'register_player',
        'register_referee',
        'start_league',
        'report_match_result',
        'get_standings',
        'league_query',
        'get_assigned_matches',
      ]);
    });

    it('echoes the request id', async () => {
      const res = await request(app)
        .post('/mcp')
        .send({ jsonrpc: '2.0', method: 'get_standings', id: 'abc-1' });

      expect(res.body).toEqual({ jsonrpc: '2.0', id: 'abc-1', result: { standings: [] } });
    });
  });

  describe('registration', () => {
    it('issues sequential ids and tokens', async () => {
      const first = await rpc('register_player', {
        sender: 'player:unregistered',
        player_meta: { display_name: 'Alice', contact_endpoint: P1 },
      });
      const second = await rpc('register_player', {
        player_meta: { display_name: 'Bob', contact_endpoint: P2 },
      });

      expect(first.body.result).toMatchObject({
        message_type: 'LEAGUE_REGISTER_RESPONSE',
        sender: 'league_manager',
        status: 'ACCEPTED',
        agent_id: 'P01',
        league_id: 'lg',
      });
      expect(first.body.result.auth_token).toMatch(/^tok_pp01_[a-z0-9]{16}$/);
      expect(second.body.result.agent_id).toBe('P02');
    });

    it('rejects a registration without a contact endpoint', async () => {
      const res = await rpc('register_player', { player_meta: { display_name: 'Ghost' } });

      expect(res.body.result).toMatchObject({
        status: 'REJECTED',
        agent_id: null,
        auth_token: null,
      });
    });

    it('validates params', async () => {
      const res = await rpc('register_referee', { referee_meta: { display_name: '' } });

      expect(res.body.error.code).toBe(-32602);
      expect(res.body.error.data.issues[0].path).toBe('referee_meta.display_name');
    });

    it('lists registrations', async () => {
      await registerAll();

      const res = await rpc('league_query', { query_type: 'GET_REGISTRATIONS' });

      expect(res.body.result).toEqual({
        players: [
          { player_id: 'P01', display_name: 'Alice', contact_endpoint: P1, healthy: true },
          { player_id: 'P02', display_name: 'Bob', contact_endpoint: P2, healthy: true },
        ],
        referees: [
          {
            referee_id: 'REF01',
            display_name: 'Ref',
            contact_endpoint: REF,
            max_concurrent_matches: 2,
            healthy: true,
          },
        ],
      });
    });
  });

  describe('league run', () => {
    it('refuses results before the league starts', async () => {
      const res = await report('test-secret');

      expect(res.body.error.code).toBe(-32000);
      expect(res.body.error.data.code).toBe('LEAGUE_NOT_STARTED');
    });

    it('refuses to start without a referee and keeps registration open', async () => {
      await rpc('register_player', { player_meta: { display_name: 'Alice', contact_endpoint: P1 } });
      await rpc('register_player', { player_meta: { display_name: 'Bob', contact_endpoint: P2 } });

      const res = await rpc('start_league');
      const late = await rpc('register_referee', {
        referee_meta: { display_name: 'Ref', contact_endpoint: REF },
      });

      expect(res.body.error.code).toBe(-32000);
      expect(res.body.error.data.code).toBe('CONFIG_SCHEDULE_INPUT');
      expect(late.body.result).toMatchObject({ status: 'ACCEPTED', agent_id: 'REF01' });
    });

    it('starts the league and dispatches the first round', async () => {
      await registerAll();

      const res = await rpc('start_league');

      expect(res.body.result).toEqual({
        league_id: 'lg',
        total_rounds: 1,
        total_matches: 1,
        player_count: 2,
        referee_count: 1,
      });
      const [assignment] = transport.callsTo(REF, 'start_match');
      expect(assignment.params).toMatchObject({
        message_type: 'MATCH_ASSIGNMENT',
        match_id: 'lg_R1_M001',
        player_A_id: 'P01',
        player_B_id: 'P02',
        player_A_endpoint: P1,
        player_B_endpoint: P2,
      });
      expect(transport.callsTo(P1).map((call) => call.method)).toEqual([
        'notify_tournament_start',
        'notify_round_announcement',
      ]);

      const again = await rpc('start_league');
      expect(again.body.error.data.code).toBe('LEAGUE_ALREADY_STARTED');
    });

    it('rejects a report carrying the wrong token', async () => {
      await registerAll();
      await rpc('start_league');

      const res = await report('test-secret');

      expect(res.body.error.code).toBe(-32000);
      expect(res.body.error.data.code).toBe('AGENT_UNAUTHORIZED');
      const standings = await rpc('get_standings');
      expect(standings.body.result.standings.map((s: { points: number }) => s.points)).toEqual([0, 0]);
    });

    it('records a result, closes the round and ends the tournament', async () => {
      const token = await registerAll();
      await rpc('start_league');

      const res = await report(token);
      await league.whenIdle();

      expect(res.body.result).toMatchObject({
        message_type: 'MATCH_RESULT_ACK',
        acknowledged: true,
        match_id: 'lg_R1_M001',
        round_complete: true,
      });

      const standings = await rpc('get_standings');
      expect(standings.body.result.standings).toEqual([
        { player_id: 'P01', rank: 1, points: 3, wins: 1, losses: 0, ties: 0 },
        { player_id: 'P02', rank: 2, points: 0, wins: 0, losses: 1, ties: 0 },
      ]);

      expect(transport.callsTo(P2).map((call) => call.method)).toEqual([
        'notify_tournament_start',
        'notify_round_announcement',
        'notify_round_completed',
        'notify_standings_update',
        'notify_tournament_end',
      ]);

      const status = await rpc('league_query', { query_type: 'GET_ROUND_STATUS' });
      expect(status.body.result).toMatchObject({ total_rounds: 1, stage: 'COMPLETED' });
    });

    it('acknowledges a duplicate report without scoring it twice', async () => {
      const token = await registerAll();
      await rpc('start_league');
      await report(token);
      await league.whenIdle();

      const res = await report(token);

      expect(res.body.result).toMatchObject({ acknowledged: true, duplicate: true, round_complete: false });
      const standings = await rpc('get_standings');
      expect(standings.body.result.standings[0].points).toBe(3);
    });

    it('rejects a result for a round that has not started and changes nothing', async () => {
      const token = await registerFour();
      await rpc('start_league');

      const early = await reportWin(token, 'lg_R2_M001', 2, ['P01', 'P03']);

      expect(early.body.error).toMatchObject({
        code: -32000,
        message: 'Round 2 has not been started',
        data: { code: 'ROUND_INVALID_STATE' },
      });
      expect(await pointsOf()).toEqual([
        ['P01', 0],
        ['P02', 0],
        ['P03', 0],
        ['P04', 0],
      ]);
      const matches = await rpc('league_query', { query_type: 'GET_MATCHES' });
      const roundTwo = matches.body.result.matches.find(
        (m: { match_id: string }) => m.match_id === 'lg_R2_M001'
      );
      expect(roundTwo.status).toBe('PENDING');

      await reportWin(token, 'lg_R1_M001', 1, ['P01', 'P02']);
      await reportWin(token, 'lg_R1_M002', 1, ['P03', 'P04']);
      await league.whenIdle();

      const real = await reportWin(token, 'lg_R2_M001', 2, ['P03', 'P01']);

      expect(real.body.result).toMatchObject({ acknowledged: true, match_id: 'lg_R2_M001' });
      expect(real.body.result.duplicate).toBeUndefined();
      expect(await pointsOf()).toEqual([
        ['P03', 6],
        ['P01', 3],
        ['P02', 0],
        ['P04', 0],
      ]);
    });

    it('closes a round exactly once when its reports race', async () => {
      const token = await registerFour();
      await rpc('start_league');

      const acks = await Promise.all([
        reportWin(token, 'lg_R1_M001', 1, ['P01', 'P02']),
        reportWin(token, 'lg_R1_M002', 1, ['P03', 'P04']),
      ]);
      await league.whenIdle();

      expect(acks.map((res) => res.body.result.acknowledged)).toEqual([true, true]);
      expect(acks.filter((res) => res.body.result.round_complete === true)).toHaveLength(1);
      for (const endpoint of [P1, P2, P3, P4]) {
        expect(transport.callsTo(endpoint, 'notify_round_completed')).toHaveLength(1);
      }
    });

    it('lists the matches assigned to a referee', async () => {
      await registerAll();
      await rpc('start_league');

      const res = await rpc('get_assigned_matches', { referee_id: 'REF01' });
      const missing = await rpc('get_assigned_matches', { referee_id: 'REF09' });

      expect(res.body.result).toEqual({
        referee_id: 'REF01',
        matches: [
          {
            match_id: 'lg_R1_M001',
            round_id: 1,
            player_A_id: 'P01',
            player_B_id: 'P02',
            referee_id: 'REF01',
            status: 'IN_PROGRESS',
          },
        ],
      });
      expect(missing.body.error.data.code).toBe('REFEREE_NOT_FOUND');
    });
  });
});
