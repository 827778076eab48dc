import { readFileSync, writeFileSync, mkdirSync, renameSync } from 'fs';
import { dirname } from 'path';

/** Remembers the last message id a poller has printed, across restarts. */
export class CursorFile {
  constructor(readonly path: string) {}

  // Missing or garbled files restart from the beginning of the channel.
  load(): number {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8').trim();
    } catch {
      return 0;
    }
    return /^\d+$/.test(raw) ? Number(raw) : 0;
  }

  save(lastId: number): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, `${lastId}\n`, 'utf-8');
    renameSync(tmp, this.path); // atomic on POSIX
  }
}
