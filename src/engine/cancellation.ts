/**
 * Cooperative cancellation.
 *
 * Executors read `token.canceled` at their safe points (before each
 * sub-step). The flag is read live through a getter, so a cancel issued
 * after a job started is still seen at its next safe point.
 */

export interface CancellationToken {
  readonly canceled: boolean;
  readonly reason?: string;
}

export class CancellationSource {
  private state: { canceled: boolean; reason?: string } = { canceled: false };

  readonly token: CancellationToken;

  constructor() {
    const state = this.state;
    this.token = {
      get canceled() { return state.canceled; },
      get reason() { return state.reason; },
    };
  }

  get canceled(): boolean {
    return this.state.canceled;
  }

  /** Request cancellation. Only the first reason is kept. */
  cancel(reason: string): void {
    if (this.state.canceled) return;
    this.state.canceled = true;
    this.state.reason = reason;
  }
}

/** A token that is never canceled. */
export const NEVER_CANCELED: CancellationToken = Object.freeze({ canceled: false });
