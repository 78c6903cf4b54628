import type { ReportedError } from '@labfleet/protocol';
import { logger } from '../utils/logger';
import type { ConsoleConnector, ConsoleEndpoint, ConsoleSession } from './consoleSession';
import { CommandTimeoutError, toReportedError } from './errors';

/**
 * Fleet Dispatcher
 * Runs per-node jobs on a bounded pool of workers. Each worker owns one
 * console session for the duration of one job; a failing or hanging job
 * never affects the others.
 */

export interface DispatchJob<T> {
  id: string;
  nodeName: string;
  endpoint: ConsoleEndpoint | null;
  timeoutMs: number;
  execute(session: ConsoleSession): Promise<T>;
}

export type DispatchStatus = 'completed' | 'failed' | 'timeout';

export interface DispatchResult<T> {
  id: string;
  nodeName: string;
  status: DispatchStatus;
  value: T | null;
  error: ReportedError | null;
  elapsedMs: number;
}

export interface DispatcherOptions {
  connect: ConsoleConnector;
  connectTimeoutMs: number;
  newline?: string;
}

export interface RunOptions {
  concurrency: number;
}

export class FleetDispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  /**
   * Results come back in submission order, one per job.
   */
  async run<T>(jobs: ReadonlyArray<DispatchJob<T>>, { concurrency }: RunOptions): Promise<DispatchResult<T>[]> {
    const results: DispatchResult<T>[] = new Array(jobs.length);
    const workerCount = Math.min(Math.max(1, Math.floor(concurrency)), jobs.length);
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < jobs.length) {
        const index = cursor++;
        results[index] = await this.runJob(jobs[index]);
      }
    };

    logger.debug(`Dispatching ${jobs.length} jobs on ${workerCount} workers`);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }

  private async runJob<T>(job: DispatchJob<T>): Promise<DispatchResult<T>> {
    const startedAt = Date.now();
    const finish = (
      status: DispatchStatus,
      value: T | null,
      error: ReportedError | null
    ): DispatchResult<T> => ({
      id: job.id,
      nodeName: job.nodeName,
      status,
      value,
      error,
      elapsedMs: Date.now() - startedAt,
    });

    if (!job.endpoint) {
      logger.warn(`${job.nodeName}: no console endpoint; job ${job.id} not run`);
      return finish('failed', null, {
        kind: 'connect',
        message: `Node '${job.nodeName}' has no console port`,
      });
    }

    let session: ConsoleSession;
    try {
      session = await this.options.connect(job.endpoint, {
        connectTimeoutMs: this.options.connectTimeoutMs,
        newline: this.options.newline,
      });
    } catch (error) {
      logger.warn(`${job.nodeName}: console connect failed`, {
        endpoint: `${job.endpoint.host}:${job.endpoint.port}`,
        error: error instanceof Error ? error.message : String(error),
      });
      const reported = toReportedError(error);
      return finish('failed', null, { kind: 'connect', message: reported.message });
    }

    try {
      const value = await this.executeWithTimeout(job, session);
      return finish('completed', value, null);
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        session.abort();
        logger.warn(`${job.nodeName}: ${error.message}; session abandoned`);
        return finish('timeout', null, toReportedError(error));
      }

      logger.error(`${job.nodeName}: job ${job.id} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return finish('failed', null, toReportedError(error));
    } finally {
      await session.close().catch((closeError: unknown) => {
        logger.debug(`${job.nodeName}: console close failed`, {
          error: closeError instanceof Error ? closeError.message : String(closeError),
        });
      });
    }
  }

  private executeWithTimeout<T>(job: DispatchJob<T>, session: ConsoleSession): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        reject(new CommandTimeoutError(job.timeoutMs, `Job ${job.id} on ${job.nodeName}`));
      }, job.timeoutMs);

      Promise.resolve()
        .then(() => job.execute(session))
        .then((result) => {
          clearTimeout(timeoutHandle);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timeoutHandle);
          reject(error);
        });
    });
  }
}

