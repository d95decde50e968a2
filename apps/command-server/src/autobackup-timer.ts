import { noopLogger, systemClock, type Clock, type Logger, type TransferJob } from '@chatdrive/session-core';

export interface AutoBackupRunner {
  runAutoBackups(): TransferJob[];
}

/** Runs every enabled autobackup rule each `intervalMs`. Returns a stop function. */
export function startAutoBackupTimer(
  runner: AutoBackupRunner,
  intervalMs: number,
  clock: Clock = systemClock,
  logger: Logger = noopLogger
): () => void {
  let cancel: (() => void) | null = null;
  let stopped = false;

  const tick = (): void => {
    if (stopped) return;
    const started = runner.runAutoBackups();
    if (started.length > 0) {
      logger.info('autobackup_tick', { started: started.map((job) => job.id) });
    }
    cancel = clock.schedule(tick, intervalMs);
  };

  cancel = clock.schedule(tick, intervalMs);
  return () => {
    stopped = true;
    cancel?.();
  };
}
