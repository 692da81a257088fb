// =============================================================================
// @rss-courier/shared — Zod schemas for persisted and external data
// =============================================================================

import { z } from "zod";

/** On-disk SeenSet, version 1 */
export const SeenStoreFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  ids: z.array(z.string().min(1)),
});

export type SeenStoreFile = z.infer<typeof SeenStoreFileSchema>;

/**
 * Shape of a Discord REST error as thrown by discord.js. Only the fields the
 * notifier classifies on are checked.
 */
export const DiscordErrorShapeSchema = z.object({
  code: z.union([z.number(), z.string()]).optional(),
  status: z.number().optional(),
  message: z.string().optional(),
});
