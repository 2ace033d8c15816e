export interface RunLockPort {
  /**
   * Resolves with a release callback, or `null` when another run holds the lock.
   */
  tryAcquire(): Promise<(() => Promise<void>) | null>;
}
