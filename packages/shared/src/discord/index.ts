export { connectDiscord, toDeliveryError } from "./session.js";
export type {
  DirectMessageSession,
  DiscordSession,
  ConnectDiscordOptions,
} from "./session.js";
export {
  Notifier,
  formatDirectMessage,
  DISCORD_MESSAGE_LIMIT,
} from "./notifier.js";
export type { NotifierOptions } from "./notifier.js";
