import {
  ChooseParitySchema,
  GameInvitationSchema,
  GameOverSchema,
} from '../../shared/validation/protocolSchemas';
import type { RpcMethodTable } from '../rpc/rpcRouter';
import type { PlayerService } from '../services/player/PlayerService';

const LEAGUE_NOTIFICATIONS = {
  notify_tournament_start: 'TOURNAMENT_START',
  notify_round_announcement: 'ROUND_ANNOUNCEMENT',
  notify_round_completed: 'ROUND_COMPLETED',
  notify_standings_update: 'LEAGUE_STANDINGS_UPDATE',
  notify_tournament_end: 'TOURNAMENT_END',
} as const;

export function playerRpcMethods(player: PlayerService): RpcMethodTable {
  const methods: RpcMethodTable = {
    handle_game_invitation: {
      description: 'Accept an invitation to a match',
      handler: (params) => player.handleInvitation(GameInvitationSchema.parse(params)),
    },
    choose_parity: {
      description: 'Choose even or odd for a match',
      handler: (params) => player.chooseParity(ChooseParitySchema.parse(params)),
    },
    notify_match_result: {
      description: 'Final result of a match this player took part in',
      handler: (params) => player.recordResult(GameOverSchema.parse(params)),
    },
    get_player_summary: {
      description: 'Win, loss and draw totals for this player',
      handler: () => player.summary(),
    },
  };

  for (const [method, messageType] of Object.entries(LEAGUE_NOTIFICATIONS)) {
    methods[method] = {
      description: `${messageType} broadcast from the league manager`,
      handler: (params) => player.acknowledge(messageType, params),
    };
  }

  return methods;
}
