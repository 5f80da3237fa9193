export interface ShutdownHandle {
  signal: AbortSignal;
  /** Remove the process listeners */
  dispose(): void;
}

/**
 * SIGINT/SIGTERM abort the returned signal so loops can finish the unit of
 * work in flight. A second signal exits immediately.
 */
export function installShutdownHandlers(): ShutdownHandle {
  const controller = new AbortController();

  const onSignal = (name: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      console.log(`\n${name} again, exiting now`);
      process.exit(130);
    }
    console.log(`\n${name} received, shutting down after the current unit of work...`);
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}
