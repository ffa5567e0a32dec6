import { z } from 'zod';

// JSON-RPC 2.0 envelopes
export const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
  id: JsonRpcIdSchema.optional(),
});

export type JsonRpcRequestInput = z.infer<typeof JsonRpcRequestSchema>;

export const JsonRpcErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

// Error branch first: `result: unknown` would also accept an error reply.
export const JsonRpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal('2.0'),
    id: JsonRpcIdSchema,
    error: JsonRpcErrorObjectSchema,
  }),
  z.object({
    jsonrpc: z.literal('2.0'),
    id: JsonRpcIdSchema,
    result: z.unknown(),
  }),
]);

export type JsonRpcResponseInput = z.infer<typeof JsonRpcResponseSchema>;

// Envelope fields are optional on the way in: peers are identified by
// sender where present, but the payload is what the core acts on.
const EnvelopeFields = {
  protocol: z.string().optional(),
  message_type: z.string().optional(),
  sender: z.string().optional(),
  timestamp: z.string().optional(),
  conversation_id: z.string().optional(),
};

export const ParityChoiceSchema = z.enum(['even', 'odd']);

const EndpointSchema = z.string().url();

// Registration
export const RegisterPlayerSchema = z
  .object({
    ...EnvelopeFields,
    player_meta: z.object({
      display_name: z.string().min(1).max(64),
      contact_endpoint: EndpointSchema.optional(),
      version: z.string().optional(),
      game_types: z.array(z.string()).optional(),
    }),
  })
  .passthrough();

export type RegisterPlayerInput = z.infer<typeof RegisterPlayerSchema>;

export const RegisterRefereeSchema = z
  .object({
    ...EnvelopeFields,
    referee_meta: z.object({
      display_name: z.string().min(1).max(64),
      contact_endpoint: EndpointSchema.optional(),
      version: z.string().optional(),
      game_types: z.array(z.string()).optional(),
      max_concurrent_matches: z.number().int().min(1).max(32).optional(),
    }),
  })
  .passthrough();

export type RegisterRefereeInput = z.infer<typeof RegisterRefereeSchema>;

export const RegisterResponseSchema = z
  .object({
    status: z.enum(['ACCEPTED', 'REJECTED']),
    agent_id: z.string().nullable(),
    auth_token: z.string().nullable(),
    league_id: z.string(),
    reason: z.string().optional(),
  })
  .passthrough();

// Match results
export const MatchReportResultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('COMPLETED'),
    winner: z.string().nullable(),
    score: z.record(z.number()),
    details: z.object({
      drawn_number: z.number().int().min(1).max(10),
      choices: z.record(ParityChoiceSchema),
    }),
  }),
  z.object({
    status: z.literal('ABORTED'),
    reason: z.string(),
  }),
]);

export const MatchResultReportSchema = z
  .object({
    ...EnvelopeFields,
    match_id: z.string().min(1),
    round_id: z.number().int().min(1),
    league_id: z.string().optional(),
    auth_token: z.string().optional(),
    result: MatchReportResultSchema,
  })
  .passthrough();

export type MatchResultReportInput = z.infer<typeof MatchResultReportSchema>;

// Referee-side inputs
export const MatchAssignmentSchema = z
  .object({
    ...EnvelopeFields,
    match_id: z.string().min(1),
    round_id: z.number().int().min(1),
    league_id: z.string().min(1),
    player_A_id: z.string().min(1),
    player_B_id: z.string().min(1),
    player_A_endpoint: EndpointSchema,
    player_B_endpoint: EndpointSchema,
  })
  .passthrough();

export type MatchAssignmentInput = z.infer<typeof MatchAssignmentSchema>;

export const InvitationResponseSchema = z
  .object({
    accept: z.boolean(),
  })
  .passthrough();

export const ChoiceResponseSchema = z
  .object({
    parity_choice: z.unknown(),
  })
  .passthrough();

// Player-side inputs
export const GameInvitationSchema = z
  .object({
    ...EnvelopeFields,
    match_id: z.string().min(1),
    round_id: z.number().int().min(1),
    opponent_id: z.string().min(1),
    role: z.enum(['PLAYER_A', 'PLAYER_B']),
  })
  .passthrough();

export type GameInvitationInput = z.infer<typeof GameInvitationSchema>;

export const StandingSummarySchema = z.object({
  player_id: z.string(),
  rank: z.number().int(),
  points: z.number().int(),
  wins: z.number().int(),
  losses: z.number().int(),
  ties: z.number().int(),
});

export const StandingsResponseSchema = z.object({
  standings: z.array(StandingSummarySchema),
});

export const ChooseParitySchema = z
  .object({
    ...EnvelopeFields,
    match_id: z.string().min(1),
    player_id: z.string().min(1),
    context: z.object({
      opponent_id: z.string().min(1),
      standings: z.array(StandingSummarySchema).default([]),
    }),
    deadline: z.string().optional(),
  })
  .passthrough();

export type ChooseParityInput = z.infer<typeof ChooseParitySchema>;

export const GameOverSchema = z
  .object({
    ...EnvelopeFields,
    match_id: z.string().min(1),
    game_result: z.object({
      status: z.enum(['WIN', 'DRAW']),
      winner_player_id: z.string().nullable(),
      drawn_number: z.number().int(),
      number_parity: ParityChoiceSchema,
      choices: z.record(ParityChoiceSchema),
      scores: z.record(z.number()),
    }),
  })
  .passthrough();

export type GameOverInput = z.infer<typeof GameOverSchema>;

// Queries
export const LeagueQuerySchema = z
  .object({
    ...EnvelopeFields,
    query_type: z.enum(['GET_REGISTRATIONS', 'GET_STANDINGS', 'GET_ROUND_STATUS', 'GET_MATCHES']),
  })
  .passthrough();

export const AssignedMatchesQuerySchema = z
  .object({
    ...EnvelopeFields,
    referee_id: z.string().min(1),
  })
  .passthrough();
