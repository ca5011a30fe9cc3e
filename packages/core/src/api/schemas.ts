/**
 * @fileoverview Daemon settings schema
 *
 * Zod schema for the payload returned by SettingsApi.fetch(). Rate limits
 * are bytes per second, null meaning unlimited.
 */

import { z } from 'zod';

export const ENCRYPTION_MODES = ['required', 'preferred', 'tolerated'] as const;

export const daemonSettingsSchema = z.object({
  utp: z.boolean(),
  dht: z.boolean(),
  lpd: z.boolean(),
  pex: z.boolean(),
  port: z.number().int().min(1).max(65535),
  portForwarding: z.boolean(),
  encryption: z.enum(ENCRYPTION_MODES),
  peerLimitGlobal: z.number().int().nonnegative(),
  peerLimitTorrent: z.number().int().nonnegative(),
  rateLimitUp: z.number().nonnegative().nullable(),
  rateLimitDown: z.number().nonnegative().nullable(),
  partFiles: z.boolean(),
  pathComplete: z.string().min(1),
  pathIncomplete: z.string().min(1),
  autostartTorrents: z.boolean(),
});

export type DaemonSettings = z.infer<typeof daemonSettingsSchema>;

export type DaemonSettingKey = keyof DaemonSettings;

/**
 * Human-readable summary of a failed parse
 */
export function formatSchemaIssues(error: z.ZodError): string {
  return error.errors
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
