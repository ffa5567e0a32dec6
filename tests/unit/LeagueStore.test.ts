import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { LeagueStore } from '../../src/server/services/league/LeagueStore';
import { StandingsEngine } from '../../src/server/services/league/StandingsEngine';
import type { Match } from '../../src/shared/types/league';

const match = (id: string, round: number, a: string, b: string): Match => ({
  matchId: id,
  roundNumber: round,
  playerAId: a,
  playerBId: b,
  refereeId: 'REF01',
  status: 'PENDING',
});

describe('LeagueStore', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'league-store-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('keeps files under leagues/<league id>', () => {
    expect(new LeagueStore(dataDir, 'lg').directory).toBe(path.join(dataDir, 'leagues', 'lg'));
  });

  it('returns null before anything was written', async () => {
    const store = new LeagueStore(dataDir, 'lg');
    await expect(store.loadSchedule()).resolves.toBeNull();
    await expect(store.loadAgents()).resolves.toBeNull();
  });

  it('saves a schedule and updates one match status in place', async () => {
    const store = new LeagueStore(dataDir, 'lg');
    await store.saveSchedule('lg', [
      [match('lg_R1_M001', 1, 'P01', 'P02')],
      [match('lg_R2_M001', 2, 'P01', 'P03'), match('lg_R2_M002', 2, 'P02', 'P04')],
    ]);

    await store.updateMatchStatus(1, 1, 'COMPLETED');

    const schedule = await store.loadSchedule();
    expect(schedule?.league_id).toBe('lg');
    expect(schedule?.rounds.map((round) => round.map((m) => m.status))).toEqual([
      ['PENDING'],
      ['PENDING', 'COMPLETED'],
    ]);
    expect(schedule?.rounds[1][1]).toMatchObject({
      match_id: 'lg_R2_M002',
      round_number: 2,
      player_A_id: 'P02',
      player_B_id: 'P04',
      referee_id: 'REF01',
    });

    const files = await fs.readdir(store.directory);
    expect(files).toEqual(['schedule.json']);
  });

  it('refuses to update a match that is not stored', async () => {
    const store = new LeagueStore(dataDir, 'lg');
    await expect(store.updateMatchStatus(0, 0, 'ABORTED')).rejects.toThrow(RangeError);

    await store.saveSchedule('lg', [[match('lg_R1_M001', 1, 'P01', 'P02')]]);
    await expect(store.updateMatchStatus(0, 3, 'ABORTED')).rejects.toThrow(
      'No stored match at round 0, position 3'
    );
  });

  it('writes the ranked standings table', async () => {
    const store = new LeagueStore(dataDir, 'lg');
    const engine = new StandingsEngine();
    engine.addPlayer('P01', 'One');
    engine.addPlayer('P02', 'Two');
    engine.recordMatchResult('lg_R1_M001', 'P01', 'P02', 'P02');

    await store.saveStandings(engine.snapshot());

    const text = await fs.readFile(path.join(store.directory, 'standings.json'), 'utf8');
    const rows: Array<{ playerId: string; points: number }> = JSON.parse(text).standings;
    expect(rows.map((row) => [row.playerId, row.points])).toEqual([
      ['P02', 3],
      ['P01', 0],
    ]);
  });

  it('rejects a corrupted agents document', async () => {
    const store = new LeagueStore(dataDir, 'lg');
    await fs.mkdir(store.directory, { recursive: true });
    await fs.writeFile(path.join(store.directory, 'agents.json'), '{"players": "nope"}');

    await expect(store.loadAgents()).rejects.toThrow();
  });
});
