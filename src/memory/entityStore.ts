import type { KnownRole, PlayerRole, PlayerStatus } from '../types.js';
import { type Claim, SelfState } from './selfState.js';

export interface PlayerState {
  name: string;
  suspectedRole: PlayerRole;
  status: PlayerStatus;
  claims: Claim[];
  votesCast: string[];
  votesReceived: string[];
  // Higher means more suspicious. Unbounded on purpose.
  suspicionScore: number;
  protectedByDoctor: boolean;
  investigatedBySeer: boolean;
}

export interface EntityStoreOptions {
  /**
   * Participants who are tracked like everyone else but never count as contenders (the
   * moderator): they are left out of the alive and suspicion rankings.
   */
  observerNames?: readonly string[];
  now?: () => Date;
}

function createPlayer(name: string): PlayerState {
  return {
    name,
    suspectedRole: 'unknown',
    status: 'alive',
    claims: [],
    votesCast: [],
    votesReceived: [],
    suspicionScore: 0,
    protectedByDoctor: false,
    investigatedBySeer: false,
  };
}

/**
 * Per-player memory plus the game clock and the agent's own role.
 *
 * Every operation that names a player silently does nothing when the player is not
 * registered: the classifiers run over partial, late-arriving state and must not fail.
 */
export class EntityStore {
  readonly selfName: string;
  readonly self: SelfState;

  dayCount = 0;
  nightCount = 0;
  isNight = false;
  claimedRole: PlayerRole = 'unknown';

  private currentRole: PlayerRole = 'unknown';
  private readonly players = new Map<string, PlayerState>();
  private readonly observers: ReadonlySet<string>;
  private readonly now: () => Date;

  constructor(selfName: string, opts?: EntityStoreOptions) {
    this.selfName = selfName;
    this.now = opts?.now ?? (() => new Date());
    this.observers = new Set(opts?.observerNames ?? []);
    this.self = new SelfState(this.now);
  }

  get myRole(): PlayerRole {
    return this.currentRole;
  }

  /** One-way: only succeeds while the role is still unknown. */
  assignRole(role: KnownRole): boolean {
    if (this.currentRole !== 'unknown') return false;
    this.currentRole = role;
    return true;
  }

  registerPlayer(name: string): void {
    if (name === this.selfName || this.players.has(name)) return;
    this.players.set(name, createPlayer(name));
  }

  hasPlayer(name: string): boolean {
    return this.players.has(name);
  }

  isObserver(name: string): boolean {
    return this.observers.has(name);
  }

  getPlayer(name: string): Readonly<PlayerState> | undefined {
    return this.players.get(name);
  }

  /** Registered players in first-seen order, dead ones included. */
  allPlayers(): ReadonlyArray<Readonly<PlayerState>> {
    return Array.from(this.players.values());
  }

  /**
   * Map a (possibly lowercased) token from message text back to the registered spelling.
   * Unknown tokens come back unchanged.
   */
  resolveName(token: string): string {
    if (this.players.has(token)) return token;
    const lowered = token.toLowerCase();
    for (const name of this.players.keys()) {
      if (name.toLowerCase() === lowered) return name;
    }
    return token;
  }

  recordClaim(player: string, content: string, channel: string): void {
    this.players.get(player)?.claims.push({ timestamp: this.now(), content, channel });
  }

  claimsOf(player: string): readonly Claim[] {
    return this.players.get(player)?.claims ?? [];
  }

  // The two halves are independent: a vote for an unknown target still lands on the voter.
  recordVote(voter: string, target: string): void {
    this.players.get(voter)?.votesCast.push(target);
    this.players.get(target)?.votesReceived.push(voter);
  }

  markDead(player: string): void {
    const state = this.players.get(player);
    if (state) state.status = 'dead';
  }

  adjustSuspicion(player: string, delta: number): void {
    const state = this.players.get(player);
    if (state) state.suspicionScore += delta;
  }

  multiplySuspicion(player: string, factor: number): void {
    const state = this.players.get(player);
    if (state) state.suspicionScore *= factor;
  }

  setSuspectedRole(player: string, role: PlayerRole): void {
    const state = this.players.get(player);
    if (state) state.suspectedRole = role;
  }

  // Observers are never night targets.
  markProtected(player: string): void {
    const state = this.players.get(player);
    if (state && !this.observers.has(player)) state.protectedByDoctor = true;
  }

  markInvestigated(player: string): void {
    const state = this.players.get(player);
    if (state && !this.observers.has(player)) state.investigatedBySeer = true;
  }

  resetCycleFlags(): void {
    for (const state of this.players.values()) {
      state.protectedByDoctor = false;
      state.investigatedBySeer = false;
    }
  }

  aliveOrdered(): string[] {
    return Array.from(this.players.values())
      .filter(p => p.status === 'alive' && !this.observers.has(p.name))
      .map(p => p.name);
  }

  /** Alive players by score, highest first; ties keep first-seen order (sort is stable). */
  topSuspicious(count = 3): string[] {
    return Array.from(this.players.values())
      .filter(p => p.status === 'alive' && !this.observers.has(p.name))
      .sort((a, b) => b.suspicionScore - a.suspicionScore)
      .slice(0, Math.max(0, count))
      .map(p => p.name);
  }
}
