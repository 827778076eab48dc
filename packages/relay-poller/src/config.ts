import { z } from 'zod';

const envSchema = z.object({
  RELAY_URL: z.string().url(),
  TARGET: z.string().min(1).default('proj-x'),
  INTERVAL: z.coerce.number().positive().default(20),
  LASTFILE: z.string().min(1),
});

export interface PollerSettings {
  relayUrl: string;
  target: string;
  intervalMs: number;
  lastFile: string;
}

export function resolvePollerSettings(env: Record<string, string | undefined> = process.env): PollerSettings {
  // Empty variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.parse(present);
  return {
    relayUrl: parsed.RELAY_URL,
    target: parsed.TARGET,
    intervalMs: parsed.INTERVAL * 1000,
    lastFile: parsed.LASTFILE,
  };
}
