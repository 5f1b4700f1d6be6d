import { forSource } from '../logger';

const log = forSource('run-guard');

/**
 * Single-permit admission control: at most one pipeline run holds the permit.
 * Acquire is a set-if-clear on the event loop, so two requests can never both
 * observe the permit as free.
 */
export class RunGuard {
  private held = false;

  tryAcquire(): boolean {
    if (this.held) return false;
    this.held = true;
    return true;
  }

  release(): void {
    if (!this.held) {
      log.warn('release() called while no run holds the guard');
      return;
    }
    this.held = false;
  }

  isBusy(): boolean {
    return this.held;
  }
}
