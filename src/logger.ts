import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import chalk from 'chalk';
import type { AgentLogEntry, LogType, PlayerRole } from './types.js';
import { eventBus } from './events/index.js';
import { isTruthyFlag } from './utils.js';

const ROLE_COLORS: Record<PlayerRole, (text: string) => string> = {
  unknown: chalk.gray,
  villager: chalk.green,
  werewolf: chalk.red,
  seer: chalk.blue,
  doctor: chalk.cyan,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  MESSAGE: chalk.white,
  THOUGHT: chalk.gray.italic,
  ACTION: chalk.yellow,
  EVENT: chalk.blue,
  SECURITY: chalk.bgRed.white,
};

export class AgentLogger {
  private logFile?: string;
  private transcriptFile?: string;
  private logs: AgentLogEntry[] = [];
  private knownPlayers: Set<string> = new Set();
  private consoleOutputEnabled = true;

  constructor() {
    eventBus.subscribe((entry) => {
      this.handleEntry(entry);
    });
  }

  /**
   * Start writing `logs/agent-<ts>.json` and `logs/transcript-<ts>.txt`.
   *
   * Off by default so library use and tests leave nothing on disk.
   */
  enablePersistence(logDir = path.join(process.cwd(), 'logs')) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    fs.mkdirSync(logDir, { recursive: true });
    this.logFile = path.join(logDir, `agent-${timestamp}.json`);
    this.transcriptFile = path.join(logDir, `transcript-${timestamp}.txt`);
    this.flush();
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  addKnownPlayer(name: string) {
    this.knownPlayers.add(name);
  }

  getLogs(): AgentLogEntry[] {
    return this.logs.slice();
  }

  log(entry: Omit<AgentLogEntry, 'id' | 'timestamp'>): AgentLogEntry {
    const fullEntry: AgentLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    eventBus.emit(fullEntry);
    return fullEntry;
  }

  private handleEntry(entry: AgentLogEntry) {
    this.logs.push(entry);
    this.flush();

    if (!this.consoleOutputEnabled) return;

    if (entry.type === 'THOUGHT' && !isTruthyFlag(process.env.WEREWOLF_AGENT_PRINT_THOUGHTS)) {
      return;
    }

    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);

    let playerInfo = '';
    if (entry.player) {
      const role = entry.metadata?.role;
      const roleStr = role ? ` ${ROLE_COLORS[role](role)}` : '';
      const channel = entry.metadata?.channel ? chalk.gray(` #${entry.metadata.channel}`) : '';
      playerInfo = ` <${chalk.hex('#FFA500')(entry.player)}${roleStr}>${channel}`;
    }

    let content = entry.content.replace(/\b(villager|werewolf|seer|doctor)s?\b/gi, (match) => {
      const lower = match.toLowerCase().replace(/s$/, '');
      return lower === 'villager' || lower === 'werewolf' || lower === 'seer' || lower === 'doctor'
        ? ROLE_COLORS[lower](match)
        : match;
    });

    if (this.knownPlayers.size > 0) {
      const names = Array.from(this.knownPlayers).map(n => n.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
      const playerPattern = new RegExp(`\\b(${names.join('|')})\\b`, 'g');
      content = content.replace(playerPattern, (match) => chalk.hex('#FFA500')(match));
    }

    console.log(`${prefix} ${typeStr}${playerInfo}: ${content}`);
  }

  private flush() {
    if (!this.logFile || !this.transcriptFile) return;
    fs.writeFileSync(this.logFile, JSON.stringify(this.logs, null, 2));
    fs.writeFileSync(this.transcriptFile, this.buildTranscriptText(this.logs));
  }

  private buildTranscriptText(entries: readonly AgentLogEntry[]): string {
    const lines: string[] = [];

    for (const entry of entries) {
      // Reasoning stays out of the human-readable transcript.
      if (entry.type === 'THOUGHT') continue;

      if (entry.type === 'MESSAGE') {
        const channel = entry.metadata?.channel ? `[${entry.metadata.channel}] ` : '';
        lines.push(`${channel}${entry.player ?? 'unknown'}: ${entry.content}`);
        continue;
      }

      lines.push(`[${entry.type}] ${entry.player ? `${entry.player}: ` : ''}${entry.content}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

export const logger = new AgentLogger();
