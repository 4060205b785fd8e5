import type { ConsoleDevice } from "../devices/Device";
import { ARGUMENT_REGISTER, type MachineState } from "../state/MachineState";

export type SyscallImplementation = (state: MachineState) => void;

export const SYSCALL = {
  READ_CHAR: 1,
  WRITE_CHAR: 2,
  EXIT: 3,
  EXIT_LINUX: 93,
} as const;

export const END_OF_INPUT = -1;

export interface SyscallDevices {
  console?: ConsoleDevice;
}

export function createDefaultSyscallHandlers(devices: SyscallDevices = {}): Record<number, SyscallImplementation> {
  const { console: terminal } = devices;
  const exit: SyscallImplementation = (state) => state.terminate();

  return {
    [SYSCALL.READ_CHAR]: (state) => {
      const byte = requireDevice(terminal, "ConsoleDevice").readByte();
      state.setRegister(ARGUMENT_REGISTER, byte === null ? END_OF_INPUT : byte & 0xff);
    },
    [SYSCALL.WRITE_CHAR]: (state) => {
      requireDevice(terminal, "ConsoleDevice").writeByte(state.getRegister(ARGUMENT_REGISTER) & 0xff);
    },
    [SYSCALL.EXIT]: exit,
    [SYSCALL.EXIT_LINUX]: exit,
  };
}

function requireDevice<T>(device: T | undefined, name: string): T {
  if (!device) {
    throw new Error(`${name} is not available in this environment`);
  }
  return device;
}
