import { Channel, type ChannelDeps } from './channel.js';

export class ChannelRegistry {
  // Map iteration follows insertion order, which is the first-seen order listings need.
  private readonly channels = new Map<string, Channel>();

  constructor(private readonly deps: ChannelDeps) {}

  seed(names: readonly string[]): void {
    for (const raw of names) {
      const name = raw.trim();
      if (name) this.getOrCreate(name);
    }
  }

  get(name: string): Channel | undefined {
    return this.channels.get(name);
  }

  getOrCreate(name: string): Channel {
    let channel = this.channels.get(name);
    if (!channel) {
      channel = new Channel(name, this.deps);
      this.channels.set(name, channel);
    }
    return channel;
  }

  listNames(): string[] {
    return [...this.channels.keys()];
  }

  all(): Channel[] {
    return [...this.channels.values()];
  }
}
