import path from 'path';
import type { ScriptJob, ScriptReport, ScriptRunJob, UploadOutcome } from '@labfleet/protocol';
import { logger } from '../utils/logger';
import { runCommand, type CommandOutcome, type ConsoleEndpoint, type ConsoleSession } from './consoleSession';
import type { DispatchJob, DispatchResult } from './fleetDispatcher';

/**
 * Script jobs
 * Upload goes through the console as base64 chunks appended to a staging
 * file, then decoded in place. Nothing here interprets the script itself.
 */

export interface ScriptJobOptions {
  id: string;
  endpoint: ConsoleEndpoint | null;
  chunkSize: number;
  /** Bound for each upload step; the run itself uses the job's timeout. */
  commandTimeoutMs: number;
}

const UPLOAD_OVERHEAD_STEPS = 8;

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function chunkBase64(source: string, chunkSize: number): string[] {
  const encoded = Buffer.from(source, 'utf8').toString('base64');
  const size = Math.max(4, Math.floor(chunkSize));
  const chunks: string[] = [];
  for (let offset = 0; offset < encoded.length; offset += size) {
    chunks.push(encoded.slice(offset, offset + size));
  }
  return chunks;
}

class StepFailure extends Error {
  constructor(readonly outcome: CommandOutcome) {
    super(
      outcome.timedOut
        ? `'${outcome.command}' timed out`
        : `'${outcome.command}' exited with ${outcome.exitCode ?? 'no status'}`
    );
  }
}

interface RunFields {
  status: ScriptReport['status'];
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

async function step(session: ConsoleSession, command: string, timeoutMs: number): Promise<CommandOutcome> {
  const outcome = await runCommand(session, command, { timeoutMs });
  if (outcome.timedOut || outcome.exitCode !== 0) {
    throw new StepFailure(outcome);
  }
  return outcome;
}

async function runScript(
  session: ConsoleSession,
  remotePath: string,
  shell: string,
  timeoutMs: number,
  commandTimeoutMs: number
): Promise<RunFields> {
  const stderrPath = shellQuote(`${remotePath}.stderr`);
  const run = await runCommand(session, `${shell} ${shellQuote(remotePath)} 2>${stderrPath}`, {
    timeoutMs,
  });

  if (run.timedOut) {
    // The shell is still busy with the script; its stderr file is left behind.
    return { status: 'timeout', exitCode: null, stdout: run.output, stderr: '' };
  }

  const stderr = await runCommand(session, `cat ${stderrPath}; rm -f ${stderrPath}`, {
    timeoutMs: commandTimeoutMs,
  });

  return {
    status: run.exitCode === 0 ? 'succeeded' : 'failed',
    exitCode: run.exitCode,
    stdout: run.output,
    stderr: stderr.output,
  };
}

function report(
  nodeName: string,
  remotePath: string,
  startedAt: number,
  fields: Partial<ScriptReport> & Pick<ScriptReport, 'status' | 'upload'>
): ScriptReport {
  return {
    nodeName,
    remotePath,
    skipReason: null,
    exitCode: null,
    stdout: '',
    stderr: '',
    error: null,
    ...fields,
    elapsedMs: Date.now() - startedAt,
  };
}

export function createScriptJob(
  job: ScriptJob,
  { id, endpoint, chunkSize, commandTimeoutMs }: ScriptJobOptions
): DispatchJob<ScriptReport> {
  const frozen = Object.freeze({ ...job });
  const chunks = chunkBase64(frozen.source, chunkSize);
  const remote = shellQuote(frozen.remotePath);
  const staging = shellQuote(`${frozen.remotePath}.b64`);

  const execute = async (session: ConsoleSession): Promise<ScriptReport> => {
    const startedAt = Date.now();
    let upload: UploadOutcome = 'uploaded';
    let skipReason: string | null = null;

    try {
      if (!frozen.overwrite) {
        const exists = await runCommand(session, `[ -e ${remote} ]`, { timeoutMs: commandTimeoutMs });
        if (exists.exitCode === 0) {
          upload = 'skipped';
          skipReason = 'exists';
        }
      }

      if (upload === 'uploaded') {
        await step(session, `mkdir -p ${shellQuote(path.posix.dirname(frozen.remotePath))}`, commandTimeoutMs);
        await step(session, `: > ${staging}`, commandTimeoutMs);
        for (const chunk of chunks) {
          await step(session, `printf '%s' '${chunk}' >> ${staging}`, commandTimeoutMs);
        }
        await step(session, `base64 -d ${staging} > ${remote}`, commandTimeoutMs);
        await step(session, `rm -f ${staging}`, commandTimeoutMs);
        if (frozen.executable) {
          await step(session, `chmod +x ${remote}`, commandTimeoutMs);
        }
        logger.info(`${frozen.nodeName}: uploaded ${frozen.remotePath} in ${chunks.length} chunks`);
      } else {
        logger.info(`${frozen.nodeName}: ${frozen.remotePath} exists; upload skipped`);
      }
    } catch (error) {
      if (error instanceof StepFailure) {
        logger.warn(`${frozen.nodeName}: upload of ${frozen.remotePath} failed: ${error.message}`);
        return report(frozen.nodeName, frozen.remotePath, startedAt, {
          status: error.outcome.timedOut ? 'timeout' : 'failed',
          upload: 'failed',
          exitCode: error.outcome.exitCode,
          stdout: error.outcome.output,
          error: { kind: error.outcome.timedOut ? 'timeout' : 'command', message: error.message },
        });
      }
      throw error;
    }

    if (!frozen.runAfterUpload) {
      return report(frozen.nodeName, frozen.remotePath, startedAt, {
        status: upload === 'skipped' ? 'skipped' : 'succeeded',
        upload,
        skipReason,
      });
    }

    const run = await runScript(
      session,
      frozen.remotePath,
      frozen.shell,
      frozen.timeoutMs,
      commandTimeoutMs
    );
    return report(frozen.nodeName, frozen.remotePath, startedAt, { ...run, upload, skipReason });
  };

  return {
    id,
    nodeName: frozen.nodeName,
    endpoint,
    timeoutMs: frozen.timeoutMs + commandTimeoutMs * (chunks.length + UPLOAD_OVERHEAD_STEPS),
    execute,
  };
}

export function createScriptRunJob(
  job: ScriptRunJob,
  { id, endpoint, commandTimeoutMs }: Omit<ScriptJobOptions, 'chunkSize'>
): DispatchJob<ScriptReport> {
  const frozen = Object.freeze({ ...job });

  return {
    id,
    nodeName: frozen.nodeName,
    endpoint,
    timeoutMs: frozen.timeoutMs + commandTimeoutMs * 2,
    execute: async (session) => {
      const startedAt = Date.now();
      const run = await runScript(
        session,
        frozen.remotePath,
        frozen.shell,
        frozen.timeoutMs,
        commandTimeoutMs
      );
      return report(frozen.nodeName, frozen.remotePath, startedAt, {
        ...run,
        upload: 'not-requested',
      });
    },
  };
}

/**
 * Dispatch-level failures (no endpoint, refused connection, job timeout)
 * carry no report of their own.
 */
export function toScriptReport(
  result: DispatchResult<ScriptReport>,
  remotePath: string,
  upload: UploadOutcome
): ScriptReport {
  if (result.value) {
    return result.value;
  }

  return {
    nodeName: result.nodeName,
    remotePath,
    status: result.status === 'timeout' ? 'timeout' : 'failed',
    upload: upload === 'not-requested' ? upload : 'failed',
    skipReason: null,
    exitCode: null,
    stdout: '',
    stderr: '',
    error: result.error,
    elapsedMs: result.elapsedMs,
  };
}
