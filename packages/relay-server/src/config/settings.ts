import { z } from 'zod';
import type { ConfigLoader } from './loader.js';
import { Sections, Keys } from './constants.js';

const DEFAULT_CHANNELS = 'proj-x,codex,claude';

const settingsSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  corsOrigins: z.string().min(1),
  mcpPath: z.string().regex(/^\/[^\s]*$/, { message: 'MCP path must start with "/"' }),
  channels: z
    .string()
    .transform((raw) => raw.split(',').map((c) => c.trim()).filter(Boolean)),
  maxMessagesPerChannel: z.coerce.number().int().min(0),
  log: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    file: z.string(),
    maxSize: z.string().regex(/^\d+[kmg]?$/i, { message: 'Expected a size such as 5m' }),
    backupCount: z.coerce.number().int().min(1),
  }),
});

export type RelaySettings = z.infer<typeof settingsSchema>;

type Env = Record<string, string | undefined>;

/**
 * Resolves every relay setting as: config file value, then environment
 * variable, then built-in default. Throws a ZodError on invalid values.
 */
export function resolveSettings(config: ConfigLoader, env: Env = process.env): RelaySettings {
  const pick = (section: string, key: string, envVar: string, fallback: string): string => {
    const fromEnv = env[envVar];
    return config.lookup(section, key) ?? (fromEnv ? fromEnv : fallback);
  };

  return settingsSchema.parse({
    host: pick(Sections.SERVER, Keys.HOST, 'RELAY_HOST', '127.0.0.1'),
    port: pick(Sections.SERVER, Keys.PORT, 'RELAY_PORT', '8010'),
    corsOrigins: pick(Sections.SERVER, Keys.CORS_ORIGINS, 'RELAY_CORS_ORIGINS', '*'),
    mcpPath: pick(Sections.SERVER, Keys.MCP_PATH, 'RELAY_MCP_PATH', '/mcp'),
    channels: pick(Sections.RELAY, Keys.CHANNELS, 'RELAY_CHANNELS', DEFAULT_CHANNELS),
    maxMessagesPerChannel: pick(Sections.RELAY, Keys.MAX_MESSAGES_PER_CHANNEL, 'RELAY_MAX_MESSAGES_PER_CHANNEL', '0'),
    log: {
      level: pick(Sections.LOG, Keys.LEVEL, 'RELAY_LOG_LEVEL', 'info'),
      file: pick(Sections.LOG, Keys.FILE, 'RELAY_LOG_FILE', 'relay.log'),
      maxSize: pick(Sections.LOG, Keys.MAX_SIZE, 'RELAY_LOG_MAX_SIZE', '5m'),
      backupCount: pick(Sections.LOG, Keys.BACKUP_COUNT, 'RELAY_LOG_BACKUP_COUNT', '10'),
    },
  });
}
