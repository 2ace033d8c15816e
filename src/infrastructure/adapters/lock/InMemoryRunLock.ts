import type { RunLockPort } from '../../../application/ports/RunLockPort.js';

/**
 * Serializes runs within one process. Deployments with several processes sharing a
 * store need a lock held by the store itself.
 */
export class InMemoryRunLock implements RunLockPort {
  private held = false;

  async tryAcquire(): Promise<(() => Promise<void>) | null> {
    if (this.held) {
      return null;
    }

    this.held = true;
    let released = false;

    return async () => {
      if (!released) {
        released = true;
        this.held = false;
      }
    };
  }
}
