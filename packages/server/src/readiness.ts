// @module: server-readiness
// @tags: health, lifecycle

export interface ReadinessController {
  markReady(): void;
  markNotReady(reason?: string): void;
  isReady(): boolean;
  /** Why the server last stopped being ready, or `starting` before the first listen. */
  reason(): string;
}

export const createReadinessController = (): ReadinessController => {
  let ready = false;
  let notReadyReason = 'starting';

  return {
    markReady(): void {
      ready = true;
    },
    markNotReady(reason = 'stopping'): void {
      ready = false;
      notReadyReason = reason;
    },
    isReady(): boolean {
      return ready;
    },
    reason(): string {
      return notReadyReason;
    },
  };
};
