import type { ProofState } from '@aph/types';

export type ProofFlow = 'generation' | 'verification';

const TRANSITIONS: Readonly<Record<ProofState, readonly ProofState[]>> = {
  Collecting: ['Serializing', 'Rejected'],
  Serializing: ['Encrypting', 'Rejected'],
  Encrypting: ['Written', 'Rejected'],
  Written: [],
  Reading: ['Decrypting', 'Rejected'],
  Decrypting: ['Verifying', 'Rejected'],
  Verifying: ['Displayed', 'Rejected'],
  Displayed: [],
  Rejected: [],
};

const INITIAL: Readonly<Record<ProofFlow, ProofState>> = {
  generation: 'Collecting',
  verification: 'Reading',
};

export interface TransitionEvent {
  readonly flow: ProofFlow;
  readonly from: ProofState;
  readonly to: ProofState;
}

export type TransitionListener = (event: TransitionEvent) => void;

export class InvalidTransitionError extends Error {
  override readonly name = 'InvalidTransitionError';

  constructor(
    readonly from: ProofState,
    readonly to: ProofState,
  ) {
    super(`Invalid proof state transition: ${from} -> ${to}`);
  }
}

export function canTransition(from: ProofState, to: ProofState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Tracks one generation or verification run through its states. */
export class ProofStateMachine {
  private current: ProofState;

  constructor(
    readonly flow: ProofFlow,
    private readonly listener?: TransitionListener,
  ) {
    this.current = INITIAL[flow];
  }

  get state(): ProofState {
    return this.current;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(to: ProofState): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    const from = this.current;
    this.current = to;
    this.listener?.({ flow: this.flow, from, to });
  }

  /** Move to Rejected unless already terminal. */
  reject(): void {
    if (!this.terminal) this.transition('Rejected');
  }
}
