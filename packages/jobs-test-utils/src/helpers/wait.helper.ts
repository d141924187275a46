export async function waitForCondition(
  fn: () => boolean | Promise<boolean>,
  options: { timeout?: number; interval?: number } = {}
): Promise<void> {
  const timeout = options.timeout ?? 5000;
  const interval = options.interval ?? 10;
  const start = Date.now();

  while (Date.now() - start < timeout) {
    if (await fn()) return;
    await sleep(interval);
  }

  throw new Error(`Condition not met within ${timeout}ms`);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
