import { createInterface, type Interface } from "readline";
import type { Readable } from "stream";
import type { UserInputPort } from "../../ports/io/UserInputPort";

/**
 * Line reader over a stream. Lines that arrive before anyone asks are
 * queued, so piped input is never dropped.
 */
export class ReadlineUserInput implements UserInputPort {
  private readonly rl: Interface;
  private readonly buffered: string[] = [];
  private readonly waiting: Array<(line: string | null) => void> = [];
  private ended = false;

  constructor(input: Readable = process.stdin) {
    this.rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.rl.on("line", (line) => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on("close", () => {
      this.ended = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve(null);
      }
    });
  }

  readLine(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  close(): void {
    this.rl.close();
  }
}
