import type { ParityChoice } from '../../../shared/types/league';
import { buildMessage, playerSender } from '../../../shared/utils/envelope';
import {
  RegisterResponseSchema,
  type ChooseParityInput,
  type GameInvitationInput,
  type GameOverInput,
} from '../../../shared/validation/protocolSchemas';
import { createComponentLogger } from '../../utils/logger';
import type { Broadcaster } from '../delivery/Broadcaster';
import type { MatchOutcomeForPlayer, OpponentRecord, ParityStrategy } from './strategies';

export interface PlayerSettings {
  displayName: string;
  endpoint: string;
  leagueEndpoint: string;
  version: string;
}

export interface PlayerServiceDeps {
  settings: PlayerSettings;
  broadcaster: Pick<Broadcaster, 'deliver'>;
  strategy: ParityStrategy;
  now?: () => Date;
}

export interface PlayerRecordSummary {
  player_id: string | null;
  played: number;
  wins: number;
  losses: number;
  draws: number;
}

const UNREGISTERED = 'unregistered';

const log = createComponentLogger('PlayerService');

/**
 * Player peer. Always accepts invitations, delegates the parity decision
 * to its strategy and keeps a per-opponent record of past matches.
 */
export class PlayerService {
  private playerId: string | null = null;
  private authToken: string | null = null;
  private readonly history = new Map<string, OpponentRecord[]>();
  private readonly now: () => Date;

  constructor(private readonly deps: PlayerServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get id(): string | null {
    return this.playerId;
  }

  private get sender(): string {
    return playerSender(this.playerId ?? UNREGISTERED);
  }

  async register(): Promise<boolean> {
    const { settings } = this.deps;
    const message = buildMessage('LEAGUE_REGISTER_REQUEST', this.sender, {
      player_meta: {
        display_name: settings.displayName,
        contact_endpoint: settings.endpoint,
        version: settings.version,
        game_types: ['even_odd'],
      },
    });

    const delivery = await this.deps.broadcaster.deliver(
      { id: 'league_manager', endpoint: settings.leagueEndpoint },
      message
    );
    if (!delivery.ok) {
      log.error('Registration with league manager failed', { error: delivery.error });
      return false;
    }

    const response = RegisterResponseSchema.safeParse(delivery.response);
    if (!response.success || response.data.status !== 'ACCEPTED' || !response.data.agent_id) {
      log.error('Registration rejected by league manager', {
        reason: response.success ? response.data.reason : 'malformed response',
      });
      return false;
    }

    this.playerId = response.data.agent_id;
    this.authToken = response.data.auth_token;
    log.info('Registered with league manager', {
      playerId: this.playerId,
      auth_token: this.authToken,
    });
    return true;
  }

  handleInvitation(input: GameInvitationInput) {
    log.info('Game invitation accepted', {
      matchId: input.match_id,
      roundId: input.round_id,
      opponentId: input.opponent_id,
      role: input.role,
    });
    return buildMessage(
      'GAME_JOIN_ACK',
      this.sender,
      {
        match_id: input.match_id,
        player_id: this.playerId,
        accept: true,
        arrival_timestamp: this.now().toISOString(),
      },
      input.conversation_id
    );
  }

  async chooseParity(input: ChooseParityInput) {
    const opponentId = input.context.opponent_id;
    const choice: ParityChoice = await this.deps.strategy.choose({
      matchId: input.match_id,
      opponentId,
      opponentHistory: this.historyAgainst(opponentId),
      standings: input.context.standings,
    });
    log.debug('Parity chosen', {
      matchId: input.match_id,
      strategy: this.deps.strategy.name,
      choice,
    });
    return buildMessage(
      'CHOOSE_PARITY_RESPONSE',
      this.sender,
      {
        match_id: input.match_id,
        player_id: input.player_id,
        parity_choice: choice,
      },
      input.conversation_id
    );
  }

  recordResult(input: GameOverInput): { acknowledged: true } {
    const result = input.game_result;
    const selfId = this.playerId;
    const participants = Object.keys(result.choices);
    const opponentId = participants.find((id) => id !== selfId);

    if (!selfId || !participants.includes(selfId) || !opponentId) {
      log.warn('Match result does not name this player', {
        matchId: input.match_id,
        playerId: selfId,
        participants,
      });
      return { acknowledged: true };
    }

    let outcome: MatchOutcomeForPlayer = 'DRAW';
    if (result.winner_player_id === selfId) {
      outcome = 'WIN';
    } else if (result.winner_player_id !== null) {
      outcome = 'LOSS';
    }

    const records = this.history.get(opponentId) ?? [];
    records.push({
      matchId: input.match_id,
      drawnNumber: result.drawn_number,
      ownChoice: result.choices[selfId] ?? null,
      opponentChoice: result.choices[opponentId] ?? null,
      outcome,
    });
    this.history.set(opponentId, records);

    log.info('Match result recorded', { matchId: input.match_id, opponentId, outcome });
    return { acknowledged: true };
  }

  acknowledge(messageType: string, params: Record<string, unknown>): { acknowledged: true } {
    log.info('League notification received', {
      messageType,
      roundId: params.round_id,
      leagueId: params.league_id,
    });
    return { acknowledged: true };
  }

  historyAgainst(opponentId: string): readonly OpponentRecord[] {
    return this.history.get(opponentId) ?? [];
  }

  summary(): PlayerRecordSummary {
    const summary: PlayerRecordSummary = {
      player_id: this.playerId,
      played: 0,
      wins: 0,
      losses: 0,
      draws: 0,
    };
    for (const records of this.history.values()) {
      for (const record of records) {
        summary.played++;
        if (record.outcome === 'WIN') summary.wins++;
        else if (record.outcome === 'LOSS') summary.losses++;
        else summary.draws++;
      }
    }
    return summary;
  }
}
