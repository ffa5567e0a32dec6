import { RegistrationRejectedError } from '../../../shared/errors';
import { createComponentLogger, redactToken } from '../../utils/logger';
import { AgentKind, generateAuthToken, tokensMatch } from './authTokens';

export interface AgentRecord {
  agentId: string;
  kind: AgentKind;
  displayName: string;
  endpoint: string;
  authToken: string;
  version: string;
  gameTypes: string[];
  registeredAt: string;
  healthy: boolean;
}

export interface RefereeRecord extends AgentRecord {
  kind: 'referee';
  maxConcurrentMatches: number;
}

export interface PlayerRecord extends AgentRecord {
  kind: 'player';
}

export interface AgentRegistration {
  displayName: string;
  endpoint?: string;
  version?: string;
  gameTypes?: string[];
}

export interface RefereeRegistration extends AgentRegistration {
  maxConcurrentMatches?: number;
}

export interface RegistryLimits {
  maxPlayers: number;
  maxReferees: number;
}

export interface RegistrySnapshot {
  players: PlayerRecord[];
  referees: RefereeRecord[];
}

export interface RegistrationOutcome<T extends AgentRecord> {
  record: T;
  /** False when an agent re-registers from an endpoint already on file. */
  created: boolean;
}

const DEFAULT_GAME_TYPES = ['even_odd'];
const DEFAULT_REFEREE_CONCURRENCY = 2;

const log = createComponentLogger('AgentRegistry');

/**
 * Players and referees known to the league, in registration order.
 */
export class AgentRegistry {
  private readonly players = new Map<string, PlayerRecord>();
  private readonly referees = new Map<string, RefereeRecord>();
  private closed = false;

  constructor(private readonly limits: RegistryLimits) {}

  /** Refuse new registrations once the league has started. */
  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  registerPlayer(registration: AgentRegistration): RegistrationOutcome<PlayerRecord> {
    const endpoint = this.requireEndpoint(registration);
    const existing = this.findByEndpoint(this.players, endpoint);
    if (existing) {
      return { record: existing, created: false };
    }

    this.assertOpen();
    if (this.players.size >= this.limits.maxPlayers) {
      throw new RegistrationRejectedError(
        `League full: maximum ${this.limits.maxPlayers} players allowed`
      );
    }

    const agentId = `P${String(this.players.size + 1).padStart(2, '0')}`;
    const record: PlayerRecord = {
      ...this.baseRecord(agentId, 'player', registration, endpoint),
      kind: 'player',
    };
    this.players.set(agentId, record);

    log.info('Player registered', {
      agentId,
      displayName: record.displayName,
      token: redactToken(record.authToken),
    });
    return { record, created: true };
  }

  registerReferee(registration: RefereeRegistration): RegistrationOutcome<RefereeRecord> {
    const endpoint = this.requireEndpoint(registration);
    const existing = this.findByEndpoint(this.referees, endpoint);
    if (existing) {
      return { record: existing, created: false };
    }

    this.assertOpen();
    if (this.referees.size >= this.limits.maxReferees) {
      throw new RegistrationRejectedError(
        `Maximum ${this.limits.maxReferees} referees allowed`
      );
    }

    const agentId = `REF${String(this.referees.size + 1).padStart(2, '0')}`;
    const record: RefereeRecord = {
      ...this.baseRecord(agentId, 'referee', registration, endpoint),
      kind: 'referee',
      maxConcurrentMatches: registration.maxConcurrentMatches ?? DEFAULT_REFEREE_CONCURRENCY,
    };
    this.referees.set(agentId, record);

    log.info('Referee registered', {
      agentId,
      displayName: record.displayName,
      token: redactToken(record.authToken),
    });
    return { record, created: true };
  }

  getPlayer(playerId: string): PlayerRecord | undefined {
    return this.players.get(playerId);
  }

  getReferee(refereeId: string): RefereeRecord | undefined {
    return this.referees.get(refereeId);
  }

  listPlayers(): PlayerRecord[] {
    return [...this.players.values()];
  }

  listReferees(): RefereeRecord[] {
    return [...this.referees.values()];
  }

  get playerCount(): number {
    return this.players.size;
  }

  get refereeCount(): number {
    return this.referees.size;
  }

  /**
   * True iff `token` is the one issued to this referee.
   */
  verifyRefereeToken(refereeId: string, token: string | undefined): boolean {
    const referee = this.referees.get(refereeId);
    if (!referee || token === undefined) {
      return false;
    }
    return tokensMatch(referee.authToken, token);
  }

  /** Returns true if the health flag changed. */
  setHealth(agentId: string, healthy: boolean): boolean {
    const record = this.players.get(agentId) ?? this.referees.get(agentId);
    if (!record || record.healthy === healthy) {
      return false;
    }
    record.healthy = healthy;
    return true;
  }

  snapshot(): RegistrySnapshot {
    return {
      players: this.listPlayers().map((p) => ({ ...p, gameTypes: [...p.gameTypes] })),
      referees: this.listReferees().map((r) => ({ ...r, gameTypes: [...r.gameTypes] })),
    };
  }

  /** Replace the current contents with a persisted snapshot. */
  restore(snapshot: RegistrySnapshot): void {
    this.players.clear();
    this.referees.clear();
    for (const player of snapshot.players) {
      this.players.set(player.agentId, { ...player });
    }
    for (const referee of snapshot.referees) {
      this.referees.set(referee.agentId, { ...referee });
    }
  }

  private baseRecord(
    agentId: string,
    kind: AgentKind,
    registration: AgentRegistration,
    endpoint: string
  ): AgentRecord {
    return {
      agentId,
      kind,
      displayName: registration.displayName,
      endpoint,
      authToken: generateAuthToken(kind, agentId),
      version: registration.version ?? '1.0.0',
      gameTypes: registration.gameTypes ?? [...DEFAULT_GAME_TYPES],
      registeredAt: new Date().toISOString(),
      healthy: true,
    };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new RegistrationRejectedError('Registration is closed: the league has started');
    }
  }

  private requireEndpoint(registration: AgentRegistration): string {
    if (!registration.endpoint) {
      throw new RegistrationRejectedError('contact_endpoint is required');
    }
    return registration.endpoint;
  }

  private findByEndpoint<T extends AgentRecord>(
    records: Map<string, T>,
    endpoint: string
  ): T | undefined {
    for (const record of records.values()) {
      if (record.endpoint === endpoint) {
        return record;
      }
    }
    return undefined;
  }
}
