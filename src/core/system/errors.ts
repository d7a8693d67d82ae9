import { hex4 } from '@utils/hex';

export type FaultKind = 'decode' | 'stack';

/**
 * Fatal condition raised while executing an instruction. Carries the
 * offending instruction word and the address it was fetched from.
 */
export abstract class MachineFault extends Error {
  abstract readonly kind: FaultKind;

  constructor(
    message: string,
    public readonly opcode: number,
    public readonly pc: number,
  ) {
    super(`${message} at $${hex4(pc)} (word $${hex4(opcode)})`);
    this.name = new.target.name;
  }
}

export class DecodeFault extends MachineFault {
  readonly kind = 'decode';

  constructor(opcode: number, pc: number) {
    super('Unknown instruction', opcode, pc);
  }
}

export type StackFaultReason = 'overflow' | 'underflow';

export class StackFault extends MachineFault {
  readonly kind = 'stack';

  constructor(
    public readonly reason: StackFaultReason,
    opcode: number,
    pc: number,
  ) {
    super(reason === 'overflow' ? 'Call stack overflow' : 'Return with empty call stack', opcode, pc);
  }
}

// Raised by the loader before any instruction runs
export class LoadFault extends Error {
  constructor(
    public readonly size: number,
    public readonly capacity: number,
  ) {
    super(`Program is ${size} bytes; at most ${capacity} fit above $0200`);
    this.name = 'LoadFault';
  }
}

export const isMachineFault = (e: unknown): e is MachineFault => e instanceof MachineFault;
