import { type AgentConfig, type InboundMessage, type KnownRole, isKnownRole } from './types.js';
import { logger } from './logger.js';
import { describeError } from './utils.js';
import { EntityStore } from './memory/entityStore.js';
import { GameHistory } from './memory/gameHistory.js';
import type { Oracle } from './oracle/oracle.js';
import { InjectionSanitizer } from './security/injectionSanitizer.js';
import { BehaviorClassifier } from './analysis/behaviorClassifier.js';
import { PhaseEventTracker, type PhaseUpdate } from './analysis/phaseEventTracker.js';
import { FALLBACK_RESPONSE, ReasoningPipeline } from './reasoning/reasoningPipeline.js';
import { inferRole } from './reasoning/roleInference.js';
import { ActionRouter } from './routing/actionRouter.js';
import { ROLE_DEFINITIONS } from './roles.js';

const ROLE_CLAIM_PATTERN = /\bi(?: am|'m) (?:the |a |an )?(villager|werewolf|seer|doctor)\b/;

export interface WerewolfAgentOptions {
  oracle?: Oracle;
  now?: () => Date;
}

/**
 * One game participant. The host delivers every message to `notify` and, when it wants
 * an answer, the same message to `respond`.
 *
 * Handles one call at a time: the host must await `notify` before `respond` for the same
 * message. Neither entry point ever rejects.
 */
export class WerewolfAgent {
  readonly config: AgentConfig;
  readonly store: EntityStore;
  readonly history: GameHistory;

  private readonly oracle: Oracle | undefined;
  private readonly sanitizer: InjectionSanitizer;
  private readonly classifier: BehaviorClassifier;
  private readonly tracker: PhaseEventTracker;
  private readonly pipeline: ReasoningPipeline;
  private readonly router: ActionRouter;
  // Sanitized text of the most recent `notify`; `respond` follows it for the same message.
  private lastIngested?: { key: string; text: string };

  constructor(config: AgentConfig, opts?: WerewolfAgentOptions) {
    this.config = config;
    this.oracle = opts?.oracle;
    this.store = new EntityStore(config.name, { observerNames: [config.moderator_name], now: opts?.now });
    this.history = new GameHistory(config.pack_channel);
    this.sanitizer = new InjectionSanitizer(this.store, this.oracle, {
      semanticCheck: config.sanitizer.semantic_check,
      temperature: config.sanitizer.temperature,
      maxOutputTokens: config.sanitizer.max_output_tokens,
    });
    this.classifier = new BehaviorClassifier(this.store);
    this.tracker = new PhaseEventTracker(this.store);
    this.pipeline = new ReasoningPipeline(this.store, this.oracle, {
      temperature: config.oracle.temperature,
      maxOutputTokens: config.oracle.max_output_tokens,
      logThoughts: config.log_thoughts,
    });
    this.router = new ActionRouter({
      store: this.store,
      pipeline: this.pipeline,
      history: this.history,
      channels: {
        moderatorName: config.moderator_name,
        gameChannel: config.game_channel,
        packChannel: config.pack_channel,
      },
    });

    logger.log({
      type: 'SYSTEM',
      content: `Agent ${config.name} initialized (oracle: ${this.oracle?.modelId ?? 'none'})`,
    });
  }

  get name(): string {
    return this.config.name;
  }

  get role() {
    return this.store.myRole;
  }

  async notify(message: InboundMessage): Promise<void> {
    try {
      await this.ingest(message);
    } catch (error) {
      logger.log({
        type: 'SYSTEM',
        player: this.name,
        content: `Failed to process message from ${message.sender}: ${describeError(error)}`,
        metadata: { channel: message.channel, kind: 'notify_error' },
      });
    }
  }

  async respond(message: InboundMessage): Promise<string> {
    let response: string;
    let seenText = message.text;
    try {
      seenText = await this.textAsIngested(message);
      response = await this.router.route(message);
    } catch (error) {
      logger.log({
        type: 'SYSTEM',
        player: this.name,
        content: `Failed to respond to ${message.sender}: ${describeError(error)}`,
        metadata: { channel: message.channel, kind: 'respond_error' },
      });
      response = FALLBACK_RESPONSE;
    }

    this.recordExchange(message, seenText, response);
    return response;
  }

  // A message answered without a prior `notify` still has to pass the sanitizer before it
  // reaches the history.
  private async textAsIngested(message: InboundMessage): Promise<string> {
    const last = this.lastIngested;
    if (last && last.key === messageKey(message)) return last.text;
    if (message.sender === this.name || message.sender === this.config.moderator_name) return message.text;
    return (await this.sanitizer.sanitize(message.sender, message.text)).text;
  }

  private async ingest(message: InboundMessage): Promise<void> {
    this.lastIngested = undefined;
    const { sender, channel } = message;
    const isModerator = sender === this.config.moderator_name;
    const isSelf = sender === this.name;

    this.store.registerPlayer(sender);
    if (!isSelf && !isModerator) logger.addKnownPlayer(sender);

    // Moderator and self are trusted sources; everyone else goes through the sanitizer.
    let text = message.text;
    if (isSelf) {
      this.store.self.recordOwnClaim(text, channel);
    } else {
      if (!isModerator) text = (await this.sanitizer.sanitize(sender, text)).text;
      this.store.recordClaim(sender, text, channel);
    }
    this.lastIngested = { key: messageKey(message), text };

    logger.log({
      type: 'MESSAGE',
      player: sender,
      content: text,
      metadata: { channel, channelType: message.channelType },
    });

    if (message.channelType === 'direct') {
      if (isModerator) await this.handleModeratorDirect(text);
      return;
    }

    this.classifier.classify(sender, text);
    if (isModerator) {
      for (const update of this.tracker.observeAnnouncement(text)) {
        logger.log({ type: 'EVENT', content: describePhaseUpdate(update), metadata: { kind: update.kind } });
      }
    }
    this.history.recordGroupMessage(channel, sender, text);
  }

  private async handleModeratorDirect(text: string): Promise<void> {
    if (this.store.myRole === 'unknown') {
      const role = await inferRole(this.oracle, this.name, text);
      this.assignRole(role);
      return;
    }

    if (this.store.myRole === 'seer') {
      const result = this.tracker.observeInvestigationResult(text);
      if (result) {
        logger.log({
          type: 'EVENT',
          player: this.name,
          content: `Investigation result: ${result.player} is ${result.role}`,
          metadata: { role: 'seer', target: result.player, kind: 'investigation_result' },
        });
      }
    }
  }

  private assignRole(role: KnownRole) {
    if (!this.store.assignRole(role)) return;
    this.store.self.addThought(`Assigned role: ${role}`);
    this.store.self.recordKeyEvent('role_assignment', `I am a ${role}`, []);
    logger.log({
      type: 'SYSTEM',
      player: this.name,
      content: `Role assigned to ${this.name}: ${role} (team ${ROLE_DEFINITIONS[role].team})`,
      metadata: { role, kind: 'role_assignment', visibility: 'private' },
    });
  }

  private recordExchange(message: InboundMessage, seenText: string, response: string) {
    const direct = message.channelType === 'direct';
    const me = `${this.name} (me)`;
    this.history.recordExchange({ channel: message.channel, direct, from: message.sender, to: me, text: seenText });
    this.history.recordExchange({ channel: message.channel, direct, from: me, to: message.sender, text: response });

    if (direct || message.channel !== this.config.game_channel) return;

    this.store.self.recordOwnClaim(response, message.channel);
    const claimed = response.toLowerCase().match(ROLE_CLAIM_PATTERN)?.[1];
    if (claimed && isKnownRole(claimed)) {
      this.store.claimedRole = claimed;
      if (claimed === this.store.myRole) this.store.self.markRoleRevealed();
    }
    logger.log({
      type: 'MESSAGE',
      player: this.name,
      content: response,
      metadata: { channel: message.channel, role: this.store.myRole },
    });
  }
}

function messageKey(message: InboundMessage): string {
  return [message.sender, message.channelType, message.channel, message.text].join('\u0000');
}

function describePhaseUpdate(update: PhaseUpdate): string {
  switch (update.kind) {
    case 'elimination':
      return `${update.player} was eliminated`;
    case 'night':
      return `Night ${update.nightCount} began`;
    case 'day':
      return `Day ${update.dayCount} began`;
  }
}
