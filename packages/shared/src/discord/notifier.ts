import { escapeMarkdown } from "discord.js";
import { truncateText } from "../anthropic/summarize.js";
import { silentLogger, type Logger } from "../logger.js";
import type { DeliveryReceipt, Entry, Summary } from "../types.js";
import { toDeliveryError, type DirectMessageSession } from "./session.js";

/** Discord's per-message content limit */
export const DISCORD_MESSAGE_LIMIT = 2000;
const MAX_TITLE_CHARS = 256;

/**
 * Renders the DM body: bold title, summary, link (angle brackets suppress
 * the embed), and the feed name when one is configured. The summary is the
 * part that gets shortened to fit the message limit.
 */
export function formatDirectMessage(entry: Entry, summary: Summary): string {
  const title = `**${escapeMarkdown(truncateText(entry.title, MAX_TITLE_CHARS).text)}**`;
  const footer: string[] = [];
  if (entry.link) footer.push(`<${entry.link}>`);
  if (entry.source.name) footer.push(`— ${entry.source.name}`);

  const tail = footer.length > 0 ? `\n\n${footer.join("\n")}` : "";
  const budget = DISCORD_MESSAGE_LIMIT - title.length - tail.length - 1;
  const body = truncateText(summary.text, Math.max(budget, 0)).text;

  return `${title}\n${body}${tail}`;
}

export interface NotifierOptions {
  /** Discord user id that receives every summary */
  userId: string;
  logger?: Logger;
}

/**
 * Delivers summaries over an already-authenticated session. The session is
 * owned by the caller, which closes it at shutdown.
 */
export class Notifier {
  private readonly session: DirectMessageSession;
  private readonly userId: string;
  private readonly logger: Logger;

  constructor(session: DirectMessageSession, options: NotifierOptions) {
    this.session = session;
    this.userId = options.userId;
    this.logger = options.logger ?? silentLogger;
  }

  async deliver(entry: Entry, summary: Summary): Promise<DeliveryReceipt> {
    const content = formatDirectMessage(entry, summary);
    try {
      const { messageId } = await this.session.sendDirectMessage(
        this.userId,
        content,
      );
      this.logger.debug("Direct message sent", {
        entry: entry.id,
        messageId,
        length: content.length,
      });
      return {
        entryId: entry.id,
        messageId,
        deliveredAt: new Date().toISOString(),
      };
    } catch (err) {
      throw toDeliveryError(err, "direct message");
    }
  }
}
