import { expect } from 'vitest';
import { jobMatchers, type JobMatchers } from './job-matchers';

export type { JobMatchers, ToHaveArgOptions, ToRejectArgsOptions } from './job-matchers';

declare module 'vitest' {
  interface Assertion<T = any> extends JobMatchers<T> {}
  interface AsymmetricMatchersContaining extends JobMatchers {}
}

export function installJobMatchers(): void {
  expect.extend(jobMatchers);
}

installJobMatchers();
