import type { KnownRole, PlayerRole } from './types.js';

export type RoleTeam = 'village' | 'werewolves';

export interface RoleDefinition {
  role: KnownRole;
  team: RoleTeam;
  /** Persona prompt prefixed to every reasoning request made while holding this role. */
  persona: string;
}

export const ROLE_DEFINITIONS: Record<KnownRole, RoleDefinition> = {
  werewolf: {
    role: 'werewolf',
    team: 'werewolves',
    persona: `You are a werewolf in a game of Werewolf. Your goal is to eliminate villagers without being detected. Consider the following:
1. Blend in with villagers during day discussions.
2. Coordinate with other werewolves to choose a target.
3. Pay attention to the seer and doctor's potential actions.
4. Defend yourself if accused, but don't be too aggressive.`,
  },
  villager: {
    role: 'villager',
    team: 'village',
    persona: `You are a villager in a game of Werewolf. Your goal is to identify and eliminate the werewolves. Consider the following:
1. Observe player behavior and voting patterns.
2. Share your suspicions and listen to others.
3. Be cautious of false accusations.
4. Try to identify the seer and doctor to protect them.`,
  },
  seer: {
    role: 'seer',
    team: 'village',
    persona: `You are the seer in a game of Werewolf. Your ability is to learn one player's true identity each night. Consider the following:
1. Use your knowledge wisely without revealing your role.
2. Keep track of the information you gather each night.
3. Guide village discussions subtly.
4. Be prepared to reveal your role if it can save the village.`,
  },
  doctor: {
    role: 'doctor',
    team: 'village',
    persona: `You are the doctor in a game of Werewolf. Your ability is to protect one player from elimination each night. Consider the following:
1. Decide whether to protect yourself or others.
2. Try to identify key players to protect (like the seer).
3. Vary your protection pattern to avoid being predictable.
4. Participate in discussions without revealing your role.`,
  },
};

/** Until the moderator tells us otherwise we reason as a plain villager. */
export function personaFor(role: PlayerRole): string {
  return ROLE_DEFINITIONS[role === 'unknown' ? 'villager' : role].persona;
}

export type FlowKind = 'investigate' | 'protect' | 'eliminate' | 'discuss';

export interface FlowDefinition {
  kind: FlowKind;
  /** Noun phrase used in the extraction prompt ("Provide only your final ..."). */
  actionType: string;
  strategy: string;
  guidingQuestions: string;
}

export const FLOW_DEFINITIONS: Record<FlowKind, FlowDefinition> = {
  investigate: {
    kind: 'investigate',
    actionType: 'investigation target',
    strategy: 'investigate',
    guidingQuestions: `Think through your investigation choice:
1. Who remains uninvestigated among suspicious players?
2. Which player's role would provide the most valuable information?
3. How can you use this information to guide the village?
4. Should you reveal your role based on what you discover?`,
  },
  protect: {
    kind: 'protect',
    actionType: 'protection target',
    strategy: 'protect',
    guidingQuestions: `Consider your protection choice:
1. Who faces the highest risk tonight?
2. Have you protected yourself recently?
3. Which players seem most valuable to the village?
4. How can you avoid predictable protection patterns?`,
  },
  eliminate: {
    kind: 'eliminate',
    actionType: 'elimination target',
    strategy: 'hunt',
    guidingQuestions: `Plan your elimination target:
1. Who poses the biggest threat to the werewolves?
2. Which elimination would cause maximum confusion?
3. How can we coordinate with other wolves?
4. Which target would least expose our identities?`,
  },
  discuss: {
    kind: 'discuss',
    actionType: 'discussion contribution or vote',
    strategy: 'discuss',
    guidingQuestions: `Consider for your response:
1. What patterns have emerged in recent discussions?
2. Which players' behaviors seem most suspicious?
3. How can you contribute valuable insights?
4. What evidence supports your suspicions?
5. How should you position yourself in the discussion?`,
  },
};
