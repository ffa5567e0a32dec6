import { PlayerNotFoundError } from '../../../shared/errors';
import type { PlayerStanding } from '../../../shared/types/league';
import type { StandingSummary, WireStanding } from '../../../shared/types/protocol';
import { WIN_POINTS } from '../../../shared/engine/parityGame';

export const TIE_POINTS = 1;

/** Ranked table as written to standings.json. */
export interface StandingsSnapshot {
  standings: PlayerStanding[];
}

function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

/**
 * Win/loss/tie accounting and ranked leaderboard.
 *
 * Ordering is (points desc, tiebreak asc, playerId asc). Head-to-head only
 * breaks a tie between exactly two players on the same points; larger
 * groups fall back to player id.
 */
export class StandingsEngine {
  private readonly players = new Map<string, PlayerStanding>();
  private readonly headToHead = new Map<string, string | null>();
  private readonly recorded = new Set<string>();

  addPlayer(playerId: string, displayName: string = playerId): void {
    if (this.players.has(playerId)) {
      return;
    }
    this.players.set(playerId, {
      playerId,
      displayName,
      wins: 0,
      losses: 0,
      ties: 0,
      points: 0,
      matchesPlayed: 0,
      rank: 0,
    });
  }

  /**
   * Apply one match outcome. `winnerId` null means a tie. A match id that
   * was already applied is ignored and false is returned.
   */
  recordMatchResult(
    matchId: string,
    playerAId: string,
    playerBId: string,
    winnerId: string | null
  ): boolean {
    if (this.recorded.has(matchId)) {
      return false;
    }

    const a = this.require(playerAId, matchId);
    const b = this.require(playerBId, matchId);
    if (winnerId !== null && winnerId !== playerAId && winnerId !== playerBId) {
      throw new PlayerNotFoundError(winnerId, { matchId, reason: 'winner is not in this match' });
    }

    a.matchesPlayed++;
    b.matchesPlayed++;

    if (winnerId === null) {
      a.ties++;
      b.ties++;
      a.points += TIE_POINTS;
      b.points += TIE_POINTS;
    } else {
      const winner = winnerId === playerAId ? a : b;
      const loser = winnerId === playerAId ? b : a;
      winner.wins++;
      winner.points += WIN_POINTS;
      loser.losses++;
    }

    this.headToHead.set(pairKey(playerAId, playerBId), winnerId);
    this.recorded.add(matchId);
    return true;
  }

  /**
   * 0 unless exactly one other player shares this player's points; then 0
   * for a head-to-head win (or no decisive meeting) and 1 for a loss.
   */
  tiebreakValue(playerId: string): number {
    const player = this.players.get(playerId);
    if (!player) {
      return 0;
    }

    const rivals = [...this.players.values()].filter(
      (other) => other.playerId !== playerId && other.points === player.points
    );
    if (rivals.length !== 1) {
      return 0;
    }

    const rival = rivals[0];
    const winner = this.headToHead.get(pairKey(playerId, rival.playerId));
    return winner === rival.playerId ? 1 : 0;
  }

  /**
   * Ranked copy of the table. Idempotent without new results.
   */
  getStandings(): PlayerStanding[] {
    const rows = [...this.players.values()].map((row) => ({
      row,
      tiebreak: this.tiebreakValue(row.playerId),
    }));

    rows.sort((x, y) => {
      if (x.row.points !== y.row.points) return y.row.points - x.row.points;
      if (x.tiebreak !== y.tiebreak) return x.tiebreak - y.tiebreak;
      return x.row.playerId < y.row.playerId ? -1 : x.row.playerId > y.row.playerId ? 1 : 0;
    });

    return rows.map(({ row }, index) => {
      row.rank = index + 1;
      return { ...row };
    });
  }

  snapshot(): StandingsSnapshot {
    return { standings: this.getStandings() };
  }

  private require(playerId: string, matchId: string): PlayerStanding {
    const standing = this.players.get(playerId);
    if (!standing) {
      throw new PlayerNotFoundError(playerId, { matchId });
    }
    return standing;
  }
}

export function toWireStanding(standing: PlayerStanding): WireStanding {
  return {
    player_id: standing.playerId,
    display_name: standing.displayName,
    rank: standing.rank,
    points: standing.points,
    wins: standing.wins,
    losses: standing.losses,
    ties: standing.ties,
    matches_played: standing.matchesPlayed,
  };
}

export function toStandingSummary(standing: PlayerStanding): StandingSummary {
  return {
    player_id: standing.playerId,
    rank: standing.rank,
    points: standing.points,
    wins: standing.wins,
    losses: standing.losses,
    ties: standing.ties,
  };
}
