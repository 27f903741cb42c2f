import type { PlayerRole } from '../types.js';

export interface Claim {
  timestamp: Date;
  content: string;
  channel: string;
}

export interface ReasoningEntry {
  timestamp: Date;
  thought: string;
}

export type KeyEventType =
  | 'elimination'
  | 'phase_change'
  | 'role_assignment'
  | 'investigation_result'
  | 'elimination_target'
  | 'injection_attempt';

export interface KeyEvent {
  timestamp: Date;
  type: KeyEventType;
  details: string;
  players: string[];
}

export interface BehavioralNote {
  timestamp: Date;
  observation: string;
}

export interface VoteJustification {
  timestamp: Date;
  justification: string;
}

/** Read-only view handed to prompt builders. */
export interface SelfStateSnapshot {
  claims: readonly Claim[];
  alliances: ReadonlyMap<string, number>;
  enemies: ReadonlyMap<string, string>;
  strategy: string;
  roleRevealed: boolean;
  protectedPlayers: readonly string[];
  investigations: ReadonlyMap<string, PlayerRole>;
  packMembers: readonly string[];
  thoughts: readonly ReasoningEntry[];
  keyEvents: readonly KeyEvent[];
  voteJustifications: ReadonlyMap<string, VoteJustification>;
  behavioralNotes: ReadonlyMap<string, readonly BehavioralNote[]>;
}

/**
 * Everything the agent knows about itself: what it said, whom it trusts, what its role
 * let it learn, and the running log of its own reasoning.
 *
 * Not safe for concurrent mutation. One agent instance owns one SelfState and handles
 * messages one at a time; any future concurrent host must serialise access per agent.
 */
export class SelfState {
  private readonly now: () => Date;

  private readonly claims: Claim[] = [];
  // Trust is expected in [0, 1] but deliberately not clamped here.
  private readonly alliances = new Map<string, number>();
  private readonly enemies = new Map<string, string>();
  private strategy = 'observe';
  private roleRevealed = false;
  private readonly protectedPlayers: string[] = [];
  private readonly investigations = new Map<string, PlayerRole>();
  private readonly packMembers: string[] = [];
  private readonly thoughts: ReasoningEntry[] = [];
  private readonly keyEvents: KeyEvent[] = [];
  private readonly voteJustifications = new Map<string, VoteJustification>();
  private readonly behavioralNotes = new Map<string, BehavioralNote[]>();

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  recordOwnClaim(content: string, channel: string): void {
    this.claims.push({ timestamp: this.now(), content, channel });
  }

  setTrust(player: string, level: number): void {
    this.alliances.set(player, level);
  }

  setEnmity(player: string, reason: string): void {
    this.enemies.set(player, reason);
  }

  setStrategy(label: string): void {
    this.strategy = label;
  }

  markRoleRevealed(): void {
    this.roleRevealed = true;
  }

  recordProtection(player: string): void {
    this.protectedPlayers.push(player);
  }

  recordInvestigation(player: string, discovered: PlayerRole = 'unknown'): void {
    // A later result must not be downgraded back to unknown by a repeat pick.
    const previous = this.investigations.get(player);
    if (discovered === 'unknown' && previous !== undefined) return;
    this.investigations.set(player, discovered);
  }

  addPackMember(player: string): void {
    if (!this.packMembers.includes(player)) this.packMembers.push(player);
  }

  addThought(thought: string): void {
    this.thoughts.push({ timestamp: this.now(), thought });
  }

  recordKeyEvent(type: KeyEventType, details: string, players: string[] = []): void {
    this.keyEvents.push({ timestamp: this.now(), type, details, players: [...players] });
  }

  recordVoteJustification(target: string, justification: string): void {
    this.voteJustifications.set(target, { timestamp: this.now(), justification });
  }

  addBehavioralNote(player: string, observation: string): void {
    const notes = this.behavioralNotes.get(player) ?? [];
    notes.push({ timestamp: this.now(), observation });
    this.behavioralNotes.set(player, notes);
  }

  trustOf(player: string): number | undefined {
    return this.alliances.get(player);
  }

  investigatedRoleOf(player: string): PlayerRole | undefined {
    return this.investigations.get(player);
  }

  isPackMember(player: string): boolean {
    return this.packMembers.includes(player);
  }

  notesFor(player: string): readonly BehavioralNote[] {
    return this.behavioralNotes.get(player) ?? [];
  }

  snapshot(): SelfStateSnapshot {
    return {
      claims: this.claims,
      alliances: this.alliances,
      enemies: this.enemies,
      strategy: this.strategy,
      roleRevealed: this.roleRevealed,
      protectedPlayers: this.protectedPlayers,
      investigations: this.investigations,
      packMembers: this.packMembers,
      thoughts: this.thoughts,
      keyEvents: this.keyEvents,
      voteJustifications: this.voteJustifications,
      behavioralNotes: this.behavioralNotes,
    };
  }
}

export function recentKeyEvents(snapshot: SelfStateSnapshot, count = 3): readonly KeyEvent[] {
  return snapshot.keyEvents.slice(-count);
}
