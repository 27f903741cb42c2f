export interface HistoryEntry {
  channel: string;
  line: string;
}

/**
 * Interwoven, arrival-ordered record of what the agent has seen and said.
 *
 * Lines from the private pack channel are kept but only rendered when asked for, so the
 * public reasoning flows never see werewolf coordination.
 */
export class GameHistory {
  private readonly entries: HistoryEntry[] = [];
  private readonly privateChannel: string;

  constructor(privateChannel: string) {
    this.privateChannel = privateChannel;
  }

  recordGroupMessage(channel: string, sender: string, text: string): void {
    this.entries.push({ channel, line: `${sender}: ${text}` });
  }

  recordExchange(opts: {
    channel: string;
    direct: boolean;
    from: string;
    to: string;
    text: string;
  }): void {
    const where = opts.direct ? 'Direct Message' : `Group Message in ${opts.channel}`;
    this.entries.push({
      channel: opts.channel,
      line: `[From - ${opts.from}| To - ${opts.to}| ${where}]: ${opts.text}`,
    });
  }

  get size(): number {
    return this.entries.length;
  }

  render(opts?: { includePrivate?: boolean }): string {
    const includePrivate = opts?.includePrivate ?? false;
    return this.entries
      .filter(e => includePrivate || e.channel !== this.privateChannel)
      .map(e => e.line)
      .join('\n');
  }
}
