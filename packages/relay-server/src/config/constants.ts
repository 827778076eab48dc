export class Sections {
  static readonly SERVER = 'server';
  static readonly RELAY = 'relay';
  static readonly LOG = 'log';
}

export class Keys {
  // server
  static readonly HOST = 'host';
  static readonly PORT = 'port';
  static readonly CORS_ORIGINS = 'cors_origins';
  static readonly MCP_PATH = 'mcp_path';
  // relay
  static readonly CHANNELS = 'channels';
  static readonly MAX_MESSAGES_PER_CHANNEL = 'max_messages_per_channel';
  // log
  static readonly LEVEL = 'level';
  static readonly FILE = 'file';
  static readonly MAX_SIZE = 'max_size';
  static readonly BACKUP_COUNT = 'backup_count';
}
