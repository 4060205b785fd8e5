import { readSync, writeSync } from "node:fs";

import type { ConsoleDevice } from "./Device";

const STDIN_FD = 0;
const STDOUT_FD = 1;

/**
 * Console backed by the process's standard streams. Reads block the thread until
 * a byte arrives or the stream ends.
 */
export class StdioDevice implements ConsoleDevice {
  private readonly inputFd: number;
  private readonly outputFd: number;
  private readonly scratch = Buffer.alloc(1);
  private endOfInput = false;

  constructor(inputFd = STDIN_FD, outputFd = STDOUT_FD) {
    this.inputFd = inputFd;
    this.outputFd = outputFd;
  }

  readByte(): number | null {
    if (this.endOfInput) return null;

    for (;;) {
      try {
        const count = readSync(this.inputFd, this.scratch, 0, 1, null);
        if (count === 0) {
          this.endOfInput = true;
          return null;
        }
        return this.scratch[0];
      } catch (error) {
        // Non-blocking stdin (e.g. a TTY in some environments) reports EAGAIN; retry.
        if (isErrnoException(error) && error.code === "EAGAIN") continue;
        if (isErrnoException(error) && error.code === "EOF") {
          this.endOfInput = true;
          return null;
        }
        throw error;
      }
    }
  }

  writeByte(value: number): void {
    writeSync(this.outputFd, Buffer.of(value & 0xff));
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
