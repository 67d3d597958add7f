/**
 * Cancellable sleep shared by the polling loop and the backfill.
 * Once cancelled, pending waits wake immediately and later waits return
 * at once.
 */

export type Pause = Readonly<{
  /** Resolves true when woken by cancel(), false when the time elapsed. */
  wait(ms: number): Promise<boolean>;
  cancel(): void;
  isCancelled(): boolean;
}>;

export function createPause(): Pause {
  let cancelled = false;
  const pending = new Set<() => void>();

  return {
    wait(ms: number): Promise<boolean> {
      if (cancelled) {
        return Promise.resolve(true);
      }

      return new Promise<boolean>((resolve) => {
        const wake = (): void => {
          clearTimeout(timer);
          pending.delete(wake);
          resolve(true);
        };
        const timer = setTimeout(() => {
          pending.delete(wake);
          resolve(false);
        }, ms);
        pending.add(wake);
      });
    },

    cancel(): void {
      cancelled = true;
      for (const wake of [...pending]) {
        wake();
      }
    },

    isCancelled(): boolean {
      return cancelled;
    },
  };
}
