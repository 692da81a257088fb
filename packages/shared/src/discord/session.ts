// =============================================================================
// @rss-courier/shared — Discord bot session
// =============================================================================
// Logs a discord.js client in once and exposes the single operation the
// pipeline needs: send a direct message. The client requests no gateway
// intents; the bot never listens for incoming messages.
// =============================================================================

import { Client, Events, RESTJSONErrorCodes } from "discord.js";
import { DeliveryError, errorMessage, type DeliveryFailureReason } from "../errors.js";
import { logExternalCall, silentLogger, type Logger } from "../logger.js";
import { DiscordErrorShapeSchema } from "../schemas.js";

const DEFAULT_LOGIN_TIMEOUT_MS = 30_000;

/** The messaging surface the notifier depends on. */
export interface DirectMessageSession {
  sendDirectMessage(
    userId: string,
    content: string,
  ): Promise<{ messageId: string }>;
  close(): Promise<void>;
}

export interface DiscordSession extends DirectMessageSession {
  /** e.g. "courier#0001", for logs */
  readonly botTag: string;
}

export interface ConnectDiscordOptions {
  logger?: Logger;
  loginTimeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

const RECIPIENT_ERROR_CODES = new Set<number>([
  RESTJSONErrorCodes.CannotSendMessagesToThisUser,
  RESTJSONErrorCodes.UnknownUser,
  RESTJSONErrorCodes.InvalidFormBodyOrContentType,
]);

/**
 * Classifies a discord.js failure. Unknown shapes are transport errors so
 * the entry stays unseen and is retried next run.
 */
export function toDeliveryError(error: unknown, action: string): DeliveryError {
  if (error instanceof DeliveryError) return error;

  const shape = DiscordErrorShapeSchema.safeParse(error);
  let reason: DeliveryFailureReason = "transport";
  if (shape.success) {
    const { code, status } = shape.data;
    if (status === 401 || code === "TokenInvalid" || code === "TokenMissing") {
      reason = "unauthenticated";
    } else if (typeof code === "number" && RECIPIENT_ERROR_CODES.has(code)) {
      reason = "recipient";
    }
  }

  return new DeliveryError(reason, `Discord ${action} failed: ${errorMessage(error)}`, {
    cause: error,
  });
}

// ---------------------------------------------------------------------------
// connectDiscord
// ---------------------------------------------------------------------------

/**
 * Logs in and waits for the ready event. The timer and the listener are
 * released on every outcome, including a rejected login.
 */
function loginAndWaitForReady(
  client: Client,
  token: string,
  timeoutMs: number,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      client.off(Events.ClientReady, onReady);
      reject(new Error(`not ready after ${timeoutMs}ms`));
    }, timeoutMs);

    function onReady(): void {
      clearTimeout(timer);
      resolve();
    }

    client.once(Events.ClientReady, onReady);
    client.login(token).catch((err: unknown) => {
      clearTimeout(timer);
      client.off(Events.ClientReady, onReady);
      reject(err);
    });
  });
}

/**
 * Establishes the bot session. Any failure (bad token, gateway refusal,
 * timeout) is a DeliveryError with reason "unauthenticated" and the client is
 * torn down before it is thrown.
 */
export async function connectDiscord(
  token: string,
  options: ConnectDiscordOptions = {},
): Promise<DiscordSession> {
  const logger = options.logger ?? silentLogger;
  const timeoutMs = options.loginTimeoutMs ?? DEFAULT_LOGIN_TIMEOUT_MS;
  const client = new Client({ intents: [] });
  const start = performance.now();

  try {
    await loginAndWaitForReady(client, token, timeoutMs);
  } catch (err) {
    logExternalCall(
      logger,
      "discord",
      "login",
      Math.round(performance.now() - start),
      errorMessage(err),
    );
    await client.destroy();
    throw new DeliveryError(
      "unauthenticated",
      `Discord login failed: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  logExternalCall(logger, "discord", "login", Math.round(performance.now() - start));

  const botTag = client.user?.tag ?? "unknown";
  let closed = false;

  return {
    botTag,

    async sendDirectMessage(userId, content) {
      if (closed) {
        throw new DeliveryError("unauthenticated", "Discord session is closed");
      }
      const sendStart = performance.now();
      try {
        const user = await client.users.fetch(userId);
        const message = await user.send({
          content,
          allowedMentions: { parse: [] },
        });
        logExternalCall(
          logger,
          "discord",
          "send_dm",
          Math.round(performance.now() - sendStart),
        );
        return { messageId: message.id };
      } catch (err) {
        logExternalCall(
          logger,
          "discord",
          "send_dm",
          Math.round(performance.now() - sendStart),
          errorMessage(err),
        );
        throw toDeliveryError(err, "direct message");
      }
    },

    async close() {
      if (closed) return;
      closed = true;
      await client.destroy();
    },
  };
}
