import { config as loadEnv } from 'dotenv';
import { createLogger, type JobRegistry } from '@typed-jobs/core';
import { loadRunnerConfig, type RunnerConfig } from '../config';
import { SupabaseJobStore, type JobStore } from '../store';
import { JobRunner } from './job-runner';

const logger = createLogger('job-runner-main');

export type RunWorkerOptions = {
  /** Settings to use instead of reading the environment */
  config?: RunnerConfig;
  store?: JobStore;
  signals?: readonly NodeJS.Signals[];
};

/**
 * Start a job runner for `registry` and stop it gracefully on SIGTERM/SIGINT.
 * Loads `.env` before reading the environment.
 */
export async function runWorker(registry: JobRegistry, options: RunWorkerOptions = {}): Promise<JobRunner> {
  let config = options.config;
  if (config === undefined) {
    loadEnv();
    config = loadRunnerConfig(process.env);
  }

  const runner = new JobRunner({
    store: options.store ?? SupabaseJobStore.fromConfig(config),
    registry,
    config: config.worker
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, 'Signal received');
    try {
      await runner.stop();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  for (const signal of options.signals ?? ['SIGTERM', 'SIGINT']) {
    process.once(signal, (received) => {
      void shutdown(received);
    });
  }

  await runner.start();
  return runner;
}
