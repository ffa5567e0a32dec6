import type { GameResult, MatchAssignment } from '../../../shared/types/league';
import type {
  ChooseParityPayload,
  GameInvitationPayload,
  GameOverPayload,
  MatchReportResult,
  MatchResultReportPayload,
  StandingSummary,
} from '../../../shared/types/protocol';
import { buildMessage, refereeSender } from '../../../shared/utils/envelope';

/**
 * Messages a referee sends while running one match. All share the match's
 * conversation id.
 */
export class MatchMessages {
  private readonly sender: string;
  private readonly conversationId: string;

  constructor(
    refereeId: string,
    private readonly assignment: MatchAssignment
  ) {
    this.sender = refereeSender(refereeId);
    this.conversationId = `match_${assignment.matchId}`;
  }

  invitation(playerId: string) {
    const isA = playerId === this.assignment.playerAId;
    return buildMessage(
      'GAME_INVITATION',
      this.sender,
      {
        match_id: this.assignment.matchId,
        round_id: this.assignment.roundId,
        opponent_id: isA ? this.assignment.playerBId : this.assignment.playerAId,
        role: isA ? 'PLAYER_A' : 'PLAYER_B',
      } satisfies GameInvitationPayload,
      this.conversationId
    );
  }

  choiceRequest(playerId: string, standings: StandingSummary[], deadline: Date) {
    const opponentId =
      playerId === this.assignment.playerAId ? this.assignment.playerBId : this.assignment.playerAId;
    return buildMessage(
      'CHOOSE_PARITY_CALL',
      this.sender,
      {
        match_id: this.assignment.matchId,
        player_id: playerId,
        context: { opponent_id: opponentId, standings },
        deadline: deadline.toISOString(),
      } satisfies ChooseParityPayload,
      this.conversationId
    );
  }

  gameOver(result: GameResult) {
    return buildMessage(
      'GAME_OVER',
      this.sender,
      {
        match_id: this.assignment.matchId,
        game_result: {
          status: result.status,
          winner_player_id: result.winnerPlayerId,
          drawn_number: result.drawnNumber,
          number_parity: result.numberParity,
          choices: result.choices,
          scores: result.scores,
        },
      } satisfies GameOverPayload,
      this.conversationId
    );
  }

  resultReport(result: MatchReportResult, authToken: string | undefined) {
    return buildMessage(
      'MATCH_RESULT_REPORT',
      this.sender,
      {
        match_id: this.assignment.matchId,
        round_id: this.assignment.roundId,
        league_id: this.assignment.leagueId,
        auth_token: authToken,
        result,
      } satisfies MatchResultReportPayload,
      this.conversationId
    );
  }
}

export function completedReport(result: GameResult): MatchReportResult {
  return {
    status: 'COMPLETED',
    winner: result.winnerPlayerId,
    score: result.scores,
    details: {
      drawn_number: result.drawnNumber,
      choices: result.choices,
    },
  };
}
