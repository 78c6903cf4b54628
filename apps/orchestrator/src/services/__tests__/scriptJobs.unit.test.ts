import type { ScriptJob } from '@labfleet/protocol';
import { ScriptedConsoleSession, type CommandResponder } from '../../test/fakeConsole';
import {
  chunkBase64,
  createScriptJob,
  createScriptRunJob,
  shellQuote,
  toScriptReport,
} from '../scriptJobs';

const ENDPOINT = { host: '127.0.0.1', port: 5003 };

const baseJob: ScriptJob = {
  nodeName: 'Workstation-1',
  source: 'echo hi\n',
  remotePath: '/opt/lab/hello.sh',
  runAfterUpload: false,
  executable: true,
  overwrite: true,
  timeoutMs: 10_000,
  shell: 'sh',
};

const UPLOAD_COMMANDS = [
  "mkdir -p '/opt/lab'",
  ": > '/opt/lab/hello.sh.b64'",
  "printf '%s' 'ZWNobyBo' >> '/opt/lab/hello.sh.b64'",
  "printf '%s' 'aQo=' >> '/opt/lab/hello.sh.b64'",
  "base64 -d '/opt/lab/hello.sh.b64' > '/opt/lab/hello.sh'",
  "rm -f '/opt/lab/hello.sh.b64'",
  "chmod +x '/opt/lab/hello.sh'",
];

function session(responder: CommandResponder = () => undefined): ScriptedConsoleSession {
  return new ScriptedConsoleSession(ENDPOINT, responder);
}

function job(overrides: Partial<ScriptJob> = {}) {
  return createScriptJob(
    { ...baseJob, ...overrides },
    { id: 'push:0:Workstation-1', endpoint: ENDPOINT, chunkSize: 8, commandTimeoutMs: 500 }
  );
}

describe('shellQuote', () => {
  it('wraps values in single quotes', () => {
    expect(shellQuote('/opt/lab/a b.sh')).toBe("'/opt/lab/a b.sh'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe('chunkBase64', () => {
  it('splits the encoded source', () => {
    expect(chunkBase64('echo hi\n', 8)).toEqual(['ZWNobyBo', 'aQo=']);
  });

  it('uses at least four characters per chunk', () => {
    expect(chunkBase64('echo hi\n', 2)).toEqual(['ZWNo', 'byBo', 'aQo=']);
  });

  it('produces no chunks for an empty source', () => {
    expect(chunkBase64('', 8)).toEqual([]);
  });
});

describe('createScriptJob', () => {
  it('budgets the dispatch timeout for every upload step', () => {
    expect(job().timeoutMs).toBe(10_000 + 500 * (2 + 8));
  });

  it('uploads through base64 chunks', async () => {
    const shell = session();

    const report = await job().execute(shell);

    expect(shell.commands).toEqual(UPLOAD_COMMANDS);
    expect(report).toMatchObject({
      nodeName: 'Workstation-1',
      remotePath: '/opt/lab/hello.sh',
      status: 'succeeded',
      upload: 'uploaded',
      skipReason: null,
      exitCode: null,
      error: null,
    });
  });

  it('skips chmod for non-executable scripts', async () => {
    const shell = session();

    await job({ executable: false }).execute(shell);

    expect(shell.commands).toEqual(UPLOAD_COMMANDS.slice(0, -1));
  });

  it('skips the upload when the file exists and overwrite is off', async () => {
    const shell = session(() => ({ exitCode: 0 }));

    const report = await job({ overwrite: false }).execute(shell);

    expect(shell.commands).toEqual(["[ -e '/opt/lab/hello.sh' ]"]);
    expect(report).toMatchObject({ status: 'skipped', upload: 'skipped', skipReason: 'exists' });
  });

  it('uploads when the file is absent and overwrite is off', async () => {
    const shell = session((command) => (command.startsWith('[ -e') ? { exitCode: 1 } : undefined));

    const report = await job({ overwrite: false }).execute(shell);

    expect(shell.commands).toEqual(["[ -e '/opt/lab/hello.sh' ]", ...UPLOAD_COMMANDS]);
    expect(report.upload).toBe('uploaded');
  });

  it('stops at the first failing upload step', async () => {
    const shell = session((command) =>
      command.startsWith('mkdir') ? { output: 'mkdir: permission denied', exitCode: 1 } : undefined
    );

    const report = await job({ runAfterUpload: true }).execute(shell);

    expect(shell.commands).toEqual(["mkdir -p '/opt/lab'"]);
    expect(report).toMatchObject({
      status: 'failed',
      upload: 'failed',
      exitCode: 1,
      stdout: 'mkdir: permission denied',
      error: { kind: 'command', message: "'mkdir -p '/opt/lab'' exited with 1" },
    });
  });

  it('runs the script and collects stderr', async () => {
    const shell = session((command) => {
      if (command.startsWith('sh ')) {
        return { output: 'hi' };
      }
      if (command.startsWith('cat ')) {
        return { output: 'warning: no tty' };
      }
      return undefined;
    });

    const report = await job({ runAfterUpload: true }).execute(shell);

    expect(shell.commands.slice(-2)).toEqual([
      "sh '/opt/lab/hello.sh' 2>'/opt/lab/hello.sh.stderr'",
      "cat '/opt/lab/hello.sh.stderr'; rm -f '/opt/lab/hello.sh.stderr'",
    ]);
    expect(report).toMatchObject({
      status: 'succeeded',
      upload: 'uploaded',
      exitCode: 0,
      stdout: 'hi',
      stderr: 'warning: no tty',
    });
  });

  it('runs an existing script when the upload was skipped', async () => {
    const shell = session((command) => (command.startsWith('sh ') ? { exitCode: 3 } : undefined));

    const report = await job({ overwrite: false, runAfterUpload: true }).execute(shell);

    expect(shell.commands[0]).toBe("[ -e '/opt/lab/hello.sh' ]");
    expect(shell.commands[1]).toBe("sh '/opt/lab/hello.sh' 2>'/opt/lab/hello.sh.stderr'");
    expect(report).toMatchObject({ status: 'failed', upload: 'skipped', skipReason: 'exists', exitCode: 3 });
  });

  it('reports a script that outlives its timeout', async () => {
    const shell = session((command) => (command.startsWith('sh ') ? { hang: true } : undefined));

    const report = await job({ runAfterUpload: true, timeoutMs: 50 }).execute(shell);

    expect(report).toMatchObject({ status: 'timeout', upload: 'uploaded', exitCode: null });
    expect(shell.commands.some((command) => command.startsWith('cat '))).toBe(false);
  });
});

describe('createScriptRunJob', () => {
  const runJob = createScriptRunJob(
    { nodeName: 'Workstation-1', remotePath: '/opt/lab/hello.sh', shell: 'bash', timeoutMs: 1000 },
    { id: 'run:0:Workstation-1', endpoint: ENDPOINT, commandTimeoutMs: 500 }
  );

  it('allows time for the run and the stderr read', () => {
    expect(runJob.timeoutMs).toBe(2000);
  });

  it('runs without uploading', async () => {
    const shell = session((command) => (command.startsWith('bash ') ? { output: 'done' } : undefined));

    const report = await runJob.execute(shell);

    expect(shell.commands).toEqual([
      "bash '/opt/lab/hello.sh' 2>'/opt/lab/hello.sh.stderr'",
      "cat '/opt/lab/hello.sh.stderr'; rm -f '/opt/lab/hello.sh.stderr'",
    ]);
    expect(report).toMatchObject({ status: 'succeeded', upload: 'not-requested', stdout: 'done', stderr: '' });
  });
});

describe('toScriptReport', () => {
  it('builds a report for jobs that never produced one', () => {
    const report = toScriptReport(
      {
        id: 'push:0:Workstation-1',
        nodeName: 'Workstation-1',
        status: 'timeout',
        value: null,
        error: { kind: 'timeout', message: 'Job push:0:Workstation-1 on Workstation-1 timed out after 30ms' },
        elapsedMs: 31,
      },
      '/opt/lab/hello.sh',
      'uploaded'
    );

    expect(report).toEqual({
      nodeName: 'Workstation-1',
      remotePath: '/opt/lab/hello.sh',
      status: 'timeout',
      upload: 'failed',
      skipReason: null,
      exitCode: null,
      stdout: '',
      stderr: '',
      error: { kind: 'timeout', message: 'Job push:0:Workstation-1 on Workstation-1 timed out after 30ms' },
      elapsedMs: 31,
    });
  });

  it('keeps not-requested uploads for run failures', () => {
    const report = toScriptReport(
      {
        id: 'run:0:X',
        nodeName: 'X',
        status: 'failed',
        value: null,
        error: { kind: 'connect', message: "Node 'X' has no console port" },
        elapsedMs: 0,
      },
      '/opt/lab/hello.sh',
      'not-requested'
    );

    expect(report.status).toBe('failed');
    expect(report.upload).toBe('not-requested');
  });
});
