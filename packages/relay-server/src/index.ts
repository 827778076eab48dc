#!/usr/bin/env node
import { ConfigLoader, configEnvFor, resolveSettings } from './config/index.js';
import { MemoryStore } from './store/index.js';
import { initLogging, getLogger } from './logger.js';
import { postLogger } from './post-log.js';
import { createApp } from './app.js';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const settings = resolveSettings(new ConfigLoader(configEnvFor(nodeEnv)));

initLogging({
  level: settings.log.level,
  file: settings.log.file,
  maxSize: settings.log.maxSize,
  backupCount: settings.log.backupCount,
});
const logger = getLogger('server');

// One store for the life of the process; restarting clears every channel.
const store = new MemoryStore({
  channels: settings.channels,
  maxMessagesPerChannel: settings.maxMessagesPerChannel,
});
store.onPost(postLogger(getLogger('store')));

const app = createApp({
  store,
  logger,
  mcpPath: settings.mcpPath,
  corsOrigins: settings.corsOrigins,
  defaultTarget: settings.channels[0] ?? 'proj-x',
});

app.listen(settings.port, settings.host, () => {
  logger.info(
    { host: settings.host, port: settings.port, mcpPath: settings.mcpPath, channels: settings.channels, env: nodeEnv },
    'Agent relay listening',
  );
});
