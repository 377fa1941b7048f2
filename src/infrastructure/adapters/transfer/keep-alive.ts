/**
 * Run `task` while calling `ping` every `intervalMs`; the timer is cleared
 * as soon as the task settles.
 */
export async function runWithKeepAlive<T>(task: () => Promise<T>, ping: () => void, intervalMs: number): Promise<T> {
  const timer = setInterval(ping, intervalMs);
  try {
    return await task();
  } finally {
    clearInterval(timer);
  }
}
