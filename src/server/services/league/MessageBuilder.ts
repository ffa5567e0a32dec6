import type { Match, PlayerStanding } from '../../../shared/types/league';
import type {
  MatchAssignmentPayload,
  MatchResultAckPayload,
  RegisterResponsePayload,
  RoundAnnouncementPayload,
  RoundCompletedPayload,
  StandingsUpdatePayload,
  TournamentEndPayload,
  TournamentStartPayload,
} from '../../../shared/types/protocol';
import { LEAGUE_MANAGER_SENDER, buildMessage } from '../../../shared/utils/envelope';
import { toWireStanding } from './StandingsEngine';

export type EndpointLookup = (agentId: string) => string | null;

/**
 * league.v2 messages sent by the league manager. Conversation ids are
 * derived from the league and round so related messages correlate.
 */
export class MessageBuilder {
  constructor(private readonly leagueId: string) {}

  tournamentStart(totalRounds: number, totalMatches: number, playerCount: number) {
    return buildMessage(
      'TOURNAMENT_START',
      LEAGUE_MANAGER_SENDER,
      {
        league_id: this.leagueId,
        total_rounds: totalRounds,
        total_matches: totalMatches,
        player_count: playerCount,
      } satisfies TournamentStartPayload,
      `league_${this.leagueId}_start`
    );
  }

  roundAnnouncement(roundNumber: number, matches: readonly Match[], refereeEndpoint: EndpointLookup) {
    return buildMessage(
      'ROUND_ANNOUNCEMENT',
      LEAGUE_MANAGER_SENDER,
      {
        league_id: this.leagueId,
        round_id: roundNumber,
        matches: matches.map((match) => ({
          match_id: match.matchId,
          player_A_id: match.playerAId,
          player_B_id: match.playerBId,
          referee_endpoint: refereeEndpoint(match.refereeId),
        })),
      } satisfies RoundAnnouncementPayload,
      this.roundConversation(roundNumber)
    );
  }

  matchAssignment(match: Match, playerAEndpoint: string, playerBEndpoint: string) {
    return buildMessage(
      'MATCH_ASSIGNMENT',
      LEAGUE_MANAGER_SENDER,
      {
        match_id: match.matchId,
        round_id: match.roundNumber,
        league_id: this.leagueId,
        player_A_id: match.playerAId,
        player_B_id: match.playerBId,
        player_A_endpoint: playerAEndpoint,
        player_B_endpoint: playerBEndpoint,
      } satisfies MatchAssignmentPayload,
      `match_${match.matchId}`
    );
  }

  roundCompleted(roundNumber: number, matchesCompleted: number, nextRoundId: number | null) {
    return buildMessage(
      'ROUND_COMPLETED',
      LEAGUE_MANAGER_SENDER,
      {
        league_id: this.leagueId,
        round_id: roundNumber,
        matches_completed: matchesCompleted,
        next_round_id: nextRoundId,
      } satisfies RoundCompletedPayload,
      this.roundConversation(roundNumber)
    );
  }

  standingsUpdate(roundNumber: number, standings: readonly PlayerStanding[]) {
    return buildMessage(
      'LEAGUE_STANDINGS_UPDATE',
      LEAGUE_MANAGER_SENDER,
      {
        league_id: this.leagueId,
        round_id: roundNumber,
        standings: standings.map(toWireStanding),
      } satisfies StandingsUpdatePayload,
      this.roundConversation(roundNumber)
    );
  }

  tournamentEnd(totalRounds: number, totalMatches: number, finalStandings: readonly PlayerStanding[]) {
    const wire = finalStandings.map(toWireStanding);
    return buildMessage(
      'TOURNAMENT_END',
      LEAGUE_MANAGER_SENDER,
      {
        league_id: this.leagueId,
        total_rounds: totalRounds,
        total_matches: totalMatches,
        champion: wire.find((standing) => standing.rank === 1) ?? null,
        final_standings: wire,
      } satisfies TournamentEndPayload,
      `league_${this.leagueId}_end`
    );
  }

  registerResponse(
    kind: 'player' | 'referee',
    payload: Omit<RegisterResponsePayload, 'league_id'>,
    conversationId?: string
  ) {
    return buildMessage(
      kind === 'player' ? 'LEAGUE_REGISTER_RESPONSE' : 'REFEREE_REGISTER_RESPONSE',
      LEAGUE_MANAGER_SENDER,
      { ...payload, league_id: this.leagueId } satisfies RegisterResponsePayload,
      conversationId
    );
  }

  matchResultAck(payload: MatchResultAckPayload, conversationId?: string) {
    return buildMessage('MATCH_RESULT_ACK', LEAGUE_MANAGER_SENDER, payload, conversationId);
  }

  private roundConversation(roundNumber: number): string {
    return `league_${this.leagueId}_r${roundNumber}`;
  }
}
