import { SyscallException } from "../exceptions/ExecutionExceptions";
import { SERVICE_REGISTER, type MachineState } from "../state/MachineState";
import { createDefaultSyscallHandlers, type SyscallDevices, type SyscallImplementation } from "./SyscallHandlers";

export class SyscallTable {
  private readonly handlers = new Map<number, SyscallImplementation>();

  constructor(devices: SyscallDevices = {}, handlers: Record<number, SyscallImplementation> = createDefaultSyscallHandlers(devices)) {
    Object.entries(handlers).forEach(([number, handler]) => this.register(Number(number), handler));
  }

  register(number: number, handler: SyscallImplementation): void {
    if (this.handlers.has(number)) {
      throw new Error(`Syscall already registered: ${number}`);
    }
    this.handlers.set(number, handler);
  }

  has(number: number): boolean {
    return this.handlers.has(number);
  }

  /** Dispatches on the service number held in a7. */
  dispatch(state: MachineState): void {
    this.handle(state.getRegister(SERVICE_REGISTER) >>> 0, state);
  }

  handle(number: number, state: MachineState): void {
    const handler = this.handlers.get(number);
    if (!handler) {
      throw new SyscallException(number);
    }

    handler(state);
  }
}
