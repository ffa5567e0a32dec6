import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Match, MatchStatus } from '../../../shared/types/league';
import type { RegistrySnapshot } from './AgentRegistry';
import type { StandingsSnapshot } from './StandingsEngine';

const MatchStatusSchema = z.enum(['PENDING', 'IN_PROGRESS', 'COMPLETED', 'ABORTED']);

const StoredMatchSchema = z.object({
  match_id: z.string(),
  round_number: z.number().int(),
  player_A_id: z.string(),
  player_B_id: z.string(),
  referee_id: z.string(),
  status: MatchStatusSchema,
});

const StoredScheduleSchema = z.object({
  league_id: z.string(),
  updated_at: z.string(),
  rounds: z.array(z.array(StoredMatchSchema)),
});

const StoredAgentBase = {
  agentId: z.string(),
  displayName: z.string(),
  endpoint: z.string(),
  authToken: z.string(),
  version: z.string(),
  gameTypes: z.array(z.string()),
  registeredAt: z.string(),
  healthy: z.boolean(),
};

const StoredAgentsSchema = z.object({
  players: z.array(z.object({ ...StoredAgentBase, kind: z.literal('player') })),
  referees: z.array(
    z.object({
      ...StoredAgentBase,
      kind: z.literal('referee'),
      maxConcurrentMatches: z.number().int(),
    })
  ),
});

export type StoredSchedule = z.infer<typeof StoredScheduleSchema>;

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

function toStoredMatch(match: Match) {
  return {
    match_id: match.matchId,
    round_number: match.roundNumber,
    player_A_id: match.playerAId,
    player_B_id: match.playerBId,
    referee_id: match.refereeId,
    status: match.status,
  };
}

/**
 * Whole-document JSON files under `<dataDir>/leagues/<leagueId>/`. Every
 * write replaces the file through a temp file and rename.
 */
export class LeagueStore {
  readonly directory: string;

  constructor(dataDir: string, leagueId: string) {
    this.directory = path.join(dataDir, 'leagues', leagueId);
  }

  private get schedulePath(): string {
    return path.join(this.directory, 'schedule.json');
  }

  private get standingsPath(): string {
    return path.join(this.directory, 'standings.json');
  }

  private get agentsPath(): string {
    return path.join(this.directory, 'agents.json');
  }

  async saveSchedule(leagueId: string, rounds: readonly (readonly Match[])[]): Promise<void> {
    const document: StoredSchedule = {
      league_id: leagueId,
      updated_at: new Date().toISOString(),
      rounds: rounds.map((round) => round.map(toStoredMatch)),
    };
    await this.writeJson(this.schedulePath, document);
  }

  async loadSchedule(): Promise<StoredSchedule | null> {
    const raw = await this.readJson(this.schedulePath);
    return raw === null ? null : StoredScheduleSchema.parse(raw);
  }

  /**
   * Read-modify-write of one match's status. `roundIndex` and `matchIndex`
   * are zero-based.
   */
  async updateMatchStatus(roundIndex: number, matchIndex: number, status: MatchStatus): Promise<void> {
    const schedule = await this.loadSchedule();
    const match = schedule?.rounds[roundIndex]?.[matchIndex];
    if (!schedule || !match) {
      throw new RangeError(`No stored match at round ${roundIndex}, position ${matchIndex}`);
    }
    match.status = status;
    schedule.updated_at = new Date().toISOString();
    await this.writeJson(this.schedulePath, schedule);
  }

  async saveStandings(snapshot: StandingsSnapshot): Promise<void> {
    await this.writeJson(this.standingsPath, snapshot);
  }

  async saveAgents(snapshot: RegistrySnapshot): Promise<void> {
    await this.writeJson(this.agentsPath, snapshot);
  }

  async loadAgents(): Promise<RegistrySnapshot | null> {
    const raw = await this.readJson(this.agentsPath);
    return raw === null ? null : StoredAgentsSchema.parse(raw);
  }

  private async readJson(filePath: string): Promise<unknown> {
    try {
      const text = await fs.readFile(filePath, 'utf8');
      return JSON.parse(text);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  private async writeJson(filePath: string, document: unknown): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
    await fs.rename(tempPath, filePath);
  }
}
