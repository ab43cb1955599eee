import { Duplex } from 'stream';

/**
 * In-memory gateway socket. Each command written is recorded and answered
 * with the next scripted line; once the script runs out, commands stay
 * unanswered.
 */
export class ScriptedStream extends Duplex {
  readonly written: string[] = [];

  constructor(private readonly replies: string[] = []) {
    super();
  }

  _read() {}

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.written.push(chunk.toString());
    const reply = this.replies.shift();
    if (reply !== undefined) {
      this.push(`${reply}\n`);
    }
    callback();
  }
}
