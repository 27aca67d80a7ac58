// @module: server-readiness
// @tags: health, lifecycle

export type ReadinessStatus = 'starting' | 'ready' | 'draining';

export interface ReadinessController {
  markReady(): void;
  markDraining(): void;
  isReady(): boolean;
  status(): ReadinessStatus;
}

export const createReadinessController = (): ReadinessController => {
  let status: ReadinessStatus = 'starting';

  return {
    markReady(): void {
      status = 'ready';
    },
    markDraining(): void {
      status = 'draining';
    },
    isReady(): boolean {
      return status === 'ready';
    },
    status(): ReadinessStatus {
      return status;
    },
  };
};
