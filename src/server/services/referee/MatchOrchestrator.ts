import { z } from 'zod';
import { drawNumber as secureDraw, determineWinner } from '../../../shared/engine/parityGame';
import { InvalidChoiceError, describeError } from '../../../shared/errors';
import { GameSession, type MatchTransition } from '../../../shared/stateMachines/matchSession';
import type { GameResult, MatchAssignment, ParityChoice } from '../../../shared/types/league';
import type { StandingSummary } from '../../../shared/types/protocol';
import { runWithTimeout } from '../../../shared/utils/timeout';
import {
  ChoiceResponseSchema,
  InvitationResponseSchema,
  ParityChoiceSchema,
} from '../../../shared/validation/protocolSchemas';
import type { OutboundMessage } from '../../rpc/methods';
import { rpcMethodFor } from '../../rpc/methods';
import type { RpcTransport } from '../../rpc/RpcClient';
import { createComponentLogger } from '../../utils/logger';
import type { DeliveryResult } from '../delivery/Broadcaster';
import { getMetricsService } from '../MetricsService';
import { MatchMessages, completedReport } from './matchMessages';

export interface OrchestratorTimeouts {
  invitationTimeoutMs: number;
  choiceTimeoutMs: number;
  notifyTimeoutMs: number;
}

/** Delivers the final report upstream, retrying on its own. */
export interface ResultReporter {
  report(message: OutboundMessage): Promise<DeliveryResult>;
}

export interface MatchOrchestratorDeps {
  refereeId: string;
  authToken?: string;
  transport: RpcTransport;
  reporter: ResultReporter;
  timeouts: OrchestratorTimeouts;
  standings?: () => Promise<StandingSummary[]>;
  drawNumber?: () => number;
  now?: () => number;
}

export interface MatchOutcome {
  matchId: string;
  status: 'COMPLETED' | 'ABORTED';
  result?: GameResult;
  reason?: string;
  history: readonly MatchTransition[];
  reported: boolean;
}

type PlayerCallResult<T> = { ok: true; value: T } | { ok: false; reason: string };

interface Seat {
  playerId: string;
  endpoint: string;
}

const log = createComponentLogger('MatchOrchestrator');

/**
 * Drives one match: invite, collect choices, draw and evaluate, notify,
 * report. Each call to `run` owns a fresh GameSession. Failures inside a
 * match never escape `run`; they become an ABORTED report.
 */
export class MatchOrchestrator {
  private readonly draw: () => number;
  private readonly now: () => number;

  constructor(private readonly deps: MatchOrchestratorDeps) {
    this.draw = deps.drawNumber ?? secureDraw;
    this.now = deps.now ?? Date.now;
  }

  async run(assignment: MatchAssignment): Promise<MatchOutcome> {
    const session = new GameSession(assignment.matchId, this.now);
    const messages = new MatchMessages(this.deps.refereeId, assignment);
    const seats: [Seat, Seat] = [
      { playerId: assignment.playerAId, endpoint: assignment.playerAEndpoint },
      { playerId: assignment.playerBId, endpoint: assignment.playerBEndpoint },
    ];
    const startedAt = this.now();

    log.info('Match started', {
      matchId: assignment.matchId,
      playerA: assignment.playerAId,
      playerB: assignment.playerBId,
    });

    try {
      // 1. Invite both players at once.
      const invitations = await this.callBoth(
        seats,
        'invitation',
        this.deps.timeouts.invitationTimeoutMs,
        (seat) => messages.invitation(seat.playerId),
        (raw) => InvitationResponseSchema.parse(raw).accept
      );
      const inviteFailure = this.firstFailure(seats, invitations, (accepted) =>
        accepted ? null : 'declined the invitation'
      );
      if (inviteFailure) {
        return await this.abort(session, messages, assignment, inviteFailure, startedAt);
      }
      session.transition('COLLECTING_CHOICES');

      // 2. Request both choices at once.
      const standings = await this.loadStandings(assignment.matchId);
      const deadline = new Date(this.now() + this.deps.timeouts.choiceTimeoutMs);
      const choices = await this.callBoth(
        seats,
        'choice',
        this.deps.timeouts.choiceTimeoutMs,
        (seat) => messages.choiceRequest(seat.playerId, standings, deadline),
        (raw, seat) => this.parseChoice(raw, seat.playerId, assignment.matchId)
      );
      const choiceFailure = this.firstFailure(seats, choices, () => null);
      if (choiceFailure) {
        return await this.abort(session, messages, assignment, choiceFailure, startedAt);
      }

      const choiceMap = new Map<string, ParityChoice>();
      seats.forEach((seat, index) => {
        const outcome = choices[index];
        if (outcome.ok) {
          choiceMap.set(seat.playerId, outcome.value);
        }
      });

      // 3. Draw and evaluate.
      session.transition('DRAWING_NUMBER');
      const drawn = this.draw();
      session.transition('EVALUATING');
      const outcome = determineWinner(drawn, choiceMap);
      session.transition('FINISHED');

      if (outcome.collision) {
        log.warn('Both players chose the same parity', {
          matchId: assignment.matchId,
          choice_collision: true,
          choice: choiceMap.get(assignment.playerAId),
          drawnNumber: drawn,
          winner: outcome.winnerId,
        });
      }

      const result: GameResult = {
        status: outcome.winnerId ? 'WIN' : 'DRAW',
        winnerPlayerId: outcome.winnerId,
        drawnNumber: drawn,
        numberParity: outcome.parity,
        choices: Object.fromEntries(choiceMap),
        scores: outcome.scores,
      };

      // 4. Notify both players; failures are logged only.
      await this.notifyPlayers(seats, messages, result, assignment.matchId);

      // 5. Report upstream.
      const reported = await this.report(
        messages.resultReport(completedReport(result), this.deps.authToken),
        assignment.matchId
      );

      getMetricsService().recordMatch('completed', (this.now() - startedAt) / 1000);
      log.info('Match finished', {
        matchId: assignment.matchId,
        winner: result.winnerPlayerId,
        drawnNumber: drawn,
        reported,
      });

      return {
        matchId: assignment.matchId,
        status: 'COMPLETED',
        result,
        history: session.history,
        reported,
      };
    } catch (error) {
      log.error('Match failed unexpectedly', {
        matchId: assignment.matchId,
        state: session.state,
        error: describeError(error),
      });
      return this.abort(
        session,
        messages,
        assignment,
        `internal error: ${describeError(error)}`,
        startedAt
      );
    }
  }

  /**
   * Dispatch to both seats before awaiting either reply.
   */
  private async callBoth<T>(
    seats: [Seat, Seat],
    phase: 'invitation' | 'choice',
    timeoutMs: number,
    build: (seat: Seat) => OutboundMessage,
    parse: (raw: unknown, seat: Seat) => T
  ): Promise<[PlayerCallResult<T>, PlayerCallResult<T>]> {
    const call = async (seat: Seat): Promise<PlayerCallResult<T>> => {
      const message = build(seat);
      try {
        const outcome = await runWithTimeout(
          () => this.deps.transport.call(seat.endpoint, rpcMethodFor(message), message, { timeoutMs }),
          { timeoutMs }
        );
        if (outcome.kind === 'timeout') {
          return { ok: false, reason: `${phase} timed out after ${timeoutMs}ms` };
        }
        return { ok: true, value: parse(outcome.value, seat) };
      } catch (error) {
        const reason =
          error instanceof z.ZodError ? `malformed ${phase} response` : describeError(error);
        log.warn('Player call failed', {
          conversationId: message.conversation_id,
          phase,
          playerId: seat.playerId,
          error: reason,
        });
        return { ok: false, reason };
      }
    };

    const first = call(seats[0]);
    const second = call(seats[1]);
    return Promise.all([first, second]);
  }

  private parseChoice(raw: unknown, playerId: string, matchId: string): ParityChoice {
    const { parity_choice } = ChoiceResponseSchema.parse(raw);
    const parsed = ParityChoiceSchema.safeParse(parity_choice);
    if (!parsed.success) {
      throw new InvalidChoiceError(playerId, parity_choice, { matchId });
    }
    return parsed.data;
  }

  private firstFailure<T>(
    seats: [Seat, Seat],
    results: [PlayerCallResult<T>, PlayerCallResult<T>],
    reject: (value: T) => string | null
  ): string | null {
    for (let i = 0; i < seats.length; i++) {
      const result = results[i];
      const reason = result.ok ? reject(result.value) : result.reason;
      if (reason !== null) {
        return `${seats[i].playerId}: ${reason}`;
      }
    }
    return null;
  }

  private async loadStandings(matchId: string): Promise<StandingSummary[]> {
    if (!this.deps.standings) {
      return [];
    }
    try {
      return await this.deps.standings();
    } catch (error) {
      log.debug('Standings unavailable for choice context', { matchId, error: describeError(error) });
      return [];
    }
  }

  private async notifyPlayers(
    seats: [Seat, Seat],
    messages: MatchMessages,
    result: GameResult,
    matchId: string
  ): Promise<void> {
    const message = messages.gameOver(result);
    const method = rpcMethodFor(message);
    const timeoutMs = this.deps.timeouts.notifyTimeoutMs;

    const settled = await Promise.allSettled(
      seats.map((seat) =>
        runWithTimeout(() => this.deps.transport.call(seat.endpoint, method, message, { timeoutMs }), {
          timeoutMs,
        })
      )
    );

    settled.forEach((outcome, index) => {
      const failure =
        outcome.status === 'rejected'
          ? describeError(outcome.reason)
          : outcome.value.kind === 'timeout'
            ? `timed out after ${timeoutMs}ms`
            : null;
      if (failure) {
        log.warn('Game over notification not delivered', {
          matchId,
          playerId: seats[index].playerId,
          error: failure,
        });
      }
    });
  }

  private async report(message: OutboundMessage, matchId: string): Promise<boolean> {
    const delivery = await this.deps.reporter.report(message);
    if (!delivery.ok) {
      log.error('Match result could not be reported', {
        matchId,
        attempts: delivery.attempts,
        error: delivery.error,
      });
    }
    return delivery.ok;
  }

  private async abort(
    session: GameSession,
    messages: MatchMessages,
    assignment: MatchAssignment,
    reason: string,
    startedAt: number
  ): Promise<MatchOutcome> {
    if (session.canAbort) {
      session.transition('ABORTED');
    }

    log.warn('Match aborted', { matchId: assignment.matchId, state: session.state, reason });

    let reported = false;
    try {
      reported = await this.report(
        messages.resultReport({ status: 'ABORTED', reason }, this.deps.authToken),
        assignment.matchId
      );
    } catch (error) {
      log.error('Abort report failed', { matchId: assignment.matchId, error: describeError(error) });
    }

    getMetricsService().recordMatch('aborted', (this.now() - startedAt) / 1000);

    return {
      matchId: assignment.matchId,
      status: 'ABORTED',
      reason,
      history: session.history,
      reported,
    };
  }
}
