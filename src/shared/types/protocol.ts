/**
 * Wire-level message types exchanged between peers.
 *
 * Field names follow the snake_case protocol on the wire; every message
 * carries the common envelope.
 */

import type { ParityChoice } from './league';

export const PROTOCOL_VERSION = 'league.v2';

export type MessageType =
  | 'REFEREE_REGISTER_REQUEST'
  | 'REFEREE_REGISTER_RESPONSE'
  | 'LEAGUE_REGISTER_REQUEST'
  | 'LEAGUE_REGISTER_RESPONSE'
  | 'TOURNAMENT_START'
  | 'ROUND_ANNOUNCEMENT'
  | 'MATCH_ASSIGNMENT'
  | 'GAME_INVITATION'
  | 'GAME_JOIN_ACK'
  | 'CHOOSE_PARITY_CALL'
  | 'CHOOSE_PARITY_RESPONSE'
  | 'GAME_OVER'
  | 'MATCH_RESULT_REPORT'
  | 'MATCH_RESULT_ACK'
  | 'ROUND_COMPLETED'
  | 'LEAGUE_STANDINGS_UPDATE'
  | 'TOURNAMENT_END'
  | 'LEAGUE_QUERY'
  | 'LEAGUE_QUERY_RESPONSE';

export interface Envelope {
  protocol: string;
  message_type: MessageType;
  sender: string;
  timestamp: string;
  conversation_id: string;
}

export type ProtocolMessage<T> = Envelope & T;

export interface WireStanding {
  player_id: string;
  display_name: string;
  rank: number;
  points: number;
  wins: number;
  losses: number;
  ties: number;
  matches_played: number;
}

/** The exact field set returned by `get_standings`. */
export interface StandingSummary {
  player_id: string;
  rank: number;
  points: number;
  wins: number;
  losses: number;
  ties: number;
}

export interface GameInvitationPayload {
  match_id: string;
  round_id: number;
  opponent_id: string;
  role: 'PLAYER_A' | 'PLAYER_B';
}

export interface ChooseParityPayload {
  match_id: string;
  player_id: string;
  context: {
    opponent_id: string;
    standings: StandingSummary[];
  };
  deadline: string;
}

export interface WireGameResult {
  status: 'WIN' | 'DRAW';
  winner_player_id: string | null;
  drawn_number: number;
  number_parity: ParityChoice;
  choices: Record<string, ParityChoice>;
  scores: Record<string, number>;
}

export interface GameOverPayload {
  match_id: string;
  game_result: WireGameResult;
}

export interface CompletedMatchResult {
  status: 'COMPLETED';
  winner: string | null;
  score: Record<string, number>;
  details: {
    drawn_number: number;
    choices: Record<string, ParityChoice>;
  };
}

export interface AbortedMatchResult {
  status: 'ABORTED';
  reason: string;
}

export type MatchReportResult = CompletedMatchResult | AbortedMatchResult;

export interface MatchResultReportPayload {
  match_id: string;
  round_id: number;
  league_id: string;
  auth_token?: string;
  result: MatchReportResult;
}

export interface MatchResultAckPayload {
  acknowledged: boolean;
  match_id: string;
  round_complete: boolean;
  duplicate?: boolean;
  reason?: string;
}

export interface RoundAnnouncementPayload {
  league_id: string;
  round_id: number;
  matches: Array<{
    match_id: string;
    player_A_id: string;
    player_B_id: string;
    referee_endpoint: string | null;
  }>;
}

export interface RoundCompletedPayload {
  league_id: string;
  round_id: number;
  matches_completed: number;
  next_round_id: number | null;
}

export interface TournamentStartPayload {
  league_id: string;
  total_rounds: number;
  total_matches: number;
  player_count: number;
}

export interface StandingsUpdatePayload {
  league_id: string;
  round_id: number;
  standings: WireStanding[];
}

export interface TournamentEndPayload {
  league_id: string;
  total_rounds: number;
  total_matches: number;
  champion: WireStanding | null;
  final_standings: WireStanding[];
}

export interface MatchAssignmentPayload {
  match_id: string;
  round_id: number;
  league_id: string;
  player_A_id: string;
  player_B_id: string;
  player_A_endpoint: string;
  player_B_endpoint: string;
}

export interface RegisterResponsePayload {
  status: 'ACCEPTED' | 'REJECTED';
  agent_id: string | null;
  auth_token: string | null;
  league_id: string;
  reason?: string;
}
