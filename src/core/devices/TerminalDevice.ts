import type { ConsoleDevice } from "./Device";

export type OutputSink = (text: string) => void;

/**
 * In-memory console: input comes from a queue filled up front, output is kept
 * in a log and forwarded to an optional sink.
 */
export class TerminalDevice implements ConsoleDevice {
  private readonly outputBytes: number[] = [];
  private readonly inputQueue: number[] = [];
  private readonly sink: OutputSink | null;

  constructor(sink: OutputSink | null = null) {
    this.sink = sink;
  }

  readByte(): number | null {
    return this.inputQueue.shift() ?? null;
  }

  writeByte(value: number): void {
    const byte = value & 0xff;
    this.outputBytes.push(byte);
    this.sink?.(String.fromCharCode(byte));
  }

  /** Queues strings as Latin-1 bytes, or raw byte arrays as-is. */
  queueInput(...values: Array<string | ArrayLike<number>>): void {
    for (const value of values) {
      if (typeof value === "string") {
        for (let i = 0; i < value.length; i++) {
          this.inputQueue.push(value.charCodeAt(i) & 0xff);
        }
      } else {
        Array.from(value, (byte) => this.inputQueue.push(byte & 0xff));
      }
    }
  }

  getOutputBytes(): number[] {
    return [...this.outputBytes];
  }

  getOutput(): string {
    return Buffer.from(this.outputBytes).toString("latin1");
  }
}
