import { ConfigurationError } from '../errors';
import type { Match, Pairing, RefereeDescriptor } from '../types/league';

/**
 * Number of rounds in a single round-robin over `playerCount` players:
 * n-1 for even n, n for odd n (one player sits out each round).
 */
export function expectedRoundCount(playerCount: number): number {
  return playerCount % 2 === 0 ? playerCount - 1 : playerCount;
}

export function formatMatchId(leagueId: string, round: number, sequence: number): string {
  return `${leagueId}_R${round}_M${String(sequence).padStart(3, '0')}`;
}

/** All C(n,2) unordered pairs, in list order. */
export function enumeratePairs(playerIds: readonly string[]): Pairing[] {
  const pairs: Pairing[] = [];
  for (let i = 0; i < playerIds.length; i++) {
    for (let j = i + 1; j < playerIds.length; j++) {
      pairs.push({ playerAId: playerIds[i], playerBId: playerIds[j] });
    }
  }
  return pairs;
}

function assertSchedulable(playerIds: readonly string[]): void {
  if (playerIds.length < 2) {
    throw new ConfigurationError('At least 2 players are required to build a schedule', {
      playerCount: playerIds.length,
    });
  }
  if (new Set(playerIds).size !== playerIds.length) {
    throw new ConfigurationError('Player ids must be unique', { playerIds: [...playerIds] });
  }
}

/**
 * First-fit placement: each pair goes into the earliest round where neither
 * player already appears. Returns null if some pair cannot be placed within
 * the round budget.
 */
function greedyRounds(pairs: readonly Pairing[], roundCount: number): Pairing[][] | null {
  const rounds: Pairing[][] = Array.from({ length: roundCount }, () => []);
  const busy: Array<Set<string>> = Array.from({ length: roundCount }, () => new Set<string>());

  for (const pair of pairs) {
    const index = busy.findIndex(
      (players) => !players.has(pair.playerAId) && !players.has(pair.playerBId)
    );
    if (index === -1) {
      return null;
    }
    rounds[index].push(pair);
    busy[index].add(pair.playerAId);
    busy[index].add(pair.playerBId);
  }
  return rounds;
}

/**
 * Circle method: fix the first seat and rotate the rest. Always yields a
 * complete schedule in exactly `expectedRoundCount` rounds.
 */
function circleRounds(playerIds: readonly string[]): Pairing[][] {
  const order = new Map(playerIds.map((id, index) => [id, index]));
  const seats: Array<string | null> = [...playerIds];
  if (seats.length % 2 === 1) {
    seats.push(null);
  }

  const seatCount = seats.length;
  const rounds: Pairing[][] = [];

  for (let r = 0; r < seatCount - 1; r++) {
    const round: Pairing[] = [];
    for (let i = 0; i < seatCount / 2; i++) {
      const a = seats[i];
      const b = seats[seatCount - 1 - i];
      if (a === null || b === null) continue;
      const aFirst = (order.get(a) ?? 0) < (order.get(b) ?? 0);
      round.push(aFirst ? { playerAId: a, playerBId: b } : { playerAId: b, playerBId: a });
    }
    rounds.push(round);

    const last = seats[seatCount - 1];
    seats.splice(seatCount - 1, 1);
    seats.splice(1, 0, last);
  }

  return rounds;
}

/**
 * Build the full round list for a single round-robin. Every unordered pair
 * appears exactly once and no player appears twice in a round.
 */
export function buildRoundRobin(playerIds: readonly string[]): Pairing[][] {
  assertSchedulable(playerIds);

  const roundCount = expectedRoundCount(playerIds.length);
  return greedyRounds(enumeratePairs(playerIds), roundCount) ?? circleRounds(playerIds);
}

/**
 * Visit matches in (round, position) order and give each to the least-loaded
 * referee, ties broken by input order. Workload is local to the call.
 */
export function assignReferees(
  leagueId: string,
  rounds: readonly Pairing[][],
  referees: readonly RefereeDescriptor[]
): Match[][] {
  if (referees.length === 0) {
    throw new ConfigurationError('At least 1 referee is required to build a schedule');
  }

  const workload = new Map<string, number>(referees.map((r) => [r.refereeId, 0]));

  return rounds.map((pairs, roundIndex) =>
    pairs.map((pair, position) => {
      let chosen = referees[0].refereeId;
      let lowest = Number.POSITIVE_INFINITY;
      for (const referee of referees) {
        const load = workload.get(referee.refereeId) ?? 0;
        if (load < lowest) {
          lowest = load;
          chosen = referee.refereeId;
        }
      }
      workload.set(chosen, lowest + 1);

      const roundNumber = roundIndex + 1;
      return {
        matchId: formatMatchId(leagueId, roundNumber, position + 1),
        roundNumber,
        playerAId: pair.playerAId,
        playerBId: pair.playerBId,
        refereeId: chosen,
        status: 'PENDING',
      };
    })
  );
}
