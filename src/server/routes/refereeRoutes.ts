import { MatchAssignmentSchema } from '../../shared/validation/protocolSchemas';
import type { RpcMethodTable } from '../rpc/rpcRouter';
import type { RefereeService } from '../services/referee/RefereeService';

export function refereeRpcMethods(referee: RefereeService): RpcMethodTable {
  return {
    start_match: {
      description: 'Accept a match assignment from the league manager',
      handler: (params) => referee.startMatch(MatchAssignmentSchema.parse(params)),
    },
    get_active_matches: {
      description: 'Matches currently running or queued on this referee',
      handler: () => referee.activeMatches(),
    },
  };
}
