// ============================================================================
// Request Lifecycle - per-request state machine
// ============================================================================

import type { RequestState } from './types.js';

/**
 * Allowed transitions. Degraded paths jump straight to Merged.
 */
const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  Received: ['Classified', 'Merged', 'Failed'],
  Classified: ['ProviderSelected', 'Failed'],
  ProviderSelected: ['ProviderInvoked', 'Merged', 'Failed'],
  ProviderInvoked: ['ProviderInvoked', 'Merged', 'Failed'],
  Merged: ['Persisted', 'Failed'],
  Persisted: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
};

export class LifecycleError extends Error {
  constructor(
    public readonly from: RequestState,
    public readonly to: RequestState
  ) {
    super(`Illegal request transition ${from} -> ${to}`);
    this.name = 'LifecycleError';
  }
}

export type TransitionListener = (from: RequestState, to: RequestState) => void;

export class RequestLifecycle {
  private current: RequestState = 'Received';
  private readonly history: RequestState[] = ['Received'];
  private reason?: string;

  constructor(
    readonly requestId: string,
    readonly studentId: string,
    private readonly onTransition?: TransitionListener
  ) {}

  get state(): RequestState {
    return this.current;
  }

  get failureReason(): string | undefined {
    return this.reason;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(to: RequestState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new LifecycleError(this.current, to);
    }
    const from = this.current;
    this.current = to;
    this.history.push(to);
    this.onTransition?.(from, to);
  }

  /**
   * Move to Failed; a request that already finished stays as it is
   */
  fail(reason: string): void {
    if (this.isTerminal()) return;
    this.reason = reason;
    this.transition('Failed');
  }

  getHistory(): RequestState[] {
    return [...this.history];
  }
}
