export interface TunnelTarget {
  readonly address: string;
}

/** A running tunnel process owned by exactly one batch. */
export interface TunnelHandle {
  readonly pid: number | undefined;
  /** Terminates the process and waits for it to exit. Safe to call twice; never throws. */
  stop(): Promise<void>;
}

export interface TunnelPort {
  /**
   * Starts a tunnel exposing one local listener per target, at
   * `portBase + index`. Rejects with a ProcessLaunchError when the process does
   * not come up.
   */
  start(targets: readonly TunnelTarget[]): Promise<TunnelHandle>;
}

/** Runs `fn` against a freshly started tunnel and always stops it afterwards. */
export async function withTunnel<T>(
  tunnel: TunnelPort,
  targets: readonly TunnelTarget[],
  fn: (handle: TunnelHandle) => Promise<T>,
): Promise<T> {
  const handle = await tunnel.start(targets);
  try {
    return await fn(handle);
  } finally {
    await handle.stop();
  }
}
