import {
  AssignedMatchesQuerySchema,
  LeagueQuerySchema,
  MatchResultReportSchema,
  RegisterPlayerSchema,
  RegisterRefereeSchema,
} from '../../shared/validation/protocolSchemas';
import type { RpcMethodTable } from '../rpc/rpcRouter';
import type { LeagueService } from '../services/league/LeagueService';

/**
 * JSON-RPC methods served by the league manager.
 */
export function leagueRpcMethods(league: LeagueService): RpcMethodTable {
  return {
    register_player: {
      description: 'Register a player and issue its auth token',
      handler: (params) => league.registerPlayer(RegisterPlayerSchema.parse(params)),
    },
    register_referee: {
      description: 'Register a referee and issue its auth token',
      handler: (params) => league.registerReferee(RegisterRefereeSchema.parse(params)),
    },
    start_league: {
      description: 'Close registration, build the schedule and start round 1',
      handler: () => league.startLeague(),
    },
    report_match_result: {
      description: 'Referee report of a completed or aborted match',
      handler: (params) => league.reportMatchResult(MatchResultReportSchema.parse(params)),
    },
    get_standings: {
      description: 'Current ranked standings',
      handler: () => league.getStandings(),
    },
    league_query: {
      description: 'Registrations, standings, round status or match list',
      handler: (params) => league.query(LeagueQuerySchema.parse(params).query_type),
    },
    get_assigned_matches: {
      description: 'Matches assigned to one referee',
      handler: (params) =>
        league.getAssignedMatches(AssignedMatchesQuerySchema.parse(params).referee_id),
    },
  };
}
