#!/usr/bin/env node
import { setTimeout as sleep } from 'timers/promises';
import { ZodError } from 'zod';
import { resolvePollerSettings, type PollerSettings } from './config.js';
import { RelayClient } from './relay-client.js';
import { CursorFile } from './cursor-store.js';
import { Poller } from './poller.js';
import { createLogger } from './logger.js';

const logger = createLogger();

function loadSettings(): PollerSettings {
  try {
    return resolvePollerSettings();
  } catch (err) {
    if (err instanceof ZodError) {
      const problems = err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      process.stderr.write(`[relay-poller] Invalid environment: ${problems}\n`);
      process.exit(2);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const settings = loadSettings();
  const poller = new Poller({
    source: new RelayClient({ baseUrl: settings.relayUrl }),
    cursor: new CursorFile(settings.lastFile),
    target: settings.target,
    logger,
    write: (line) => process.stdout.write(`${line}\n`),
  });

  const stopped = new AbortController();
  const stop = () => {
    poller.stop();
    stopped.abort();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
  process.on('SIGHUP', stop);

  poller.start({ pid: process.pid, ppid: process.ppid, interval: `${settings.intervalMs / 1000}s`, base: settings.relayUrl });
  await poller.checkTarget();

  while (!stopped.signal.aborted) {
    await poller.tick();
    await sleep(settings.intervalMs, undefined, { signal: stopped.signal }).catch((err: unknown) => {
      if (!stopped.signal.aborted) throw err;
    });
  }
}

main().catch((err: unknown) => {
  logger.fatal({ error: err }, 'poller crashed');
  process.exit(1);
});
