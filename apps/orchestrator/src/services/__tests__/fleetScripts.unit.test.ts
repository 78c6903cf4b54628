import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FakeConsoleFleet } from '../../test/fakeConsole';
import { NodeNotFoundError, ScriptPathError } from '../errors';
import { FleetScripts, type ScriptPushItem } from '../fleetScripts';

const pushItem = (overrides: Partial<ScriptPushItem> = {}): ScriptPushItem => ({
  nodeName: 'Workstation-1',
  localPath: 'hello.sh',
  remotePath: '/opt/lab/hello.sh',
  runAfterUpload: false,
  executable: true,
  overwrite: true,
  timeoutMs: 1000,
  shell: 'sh',
  ...overrides,
});

describe('FleetScripts', () => {
  let dir: string;
  let fleet: FakeConsoleFleet;
  let scripts: FleetScripts;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'labfleet-fleet-scripts-'));
    await fs.mkdir(path.join(dir, 'scripts'));
    await fs.writeFile(path.join(dir, 'scripts', 'hello.sh'), 'echo hi\n');
    await fs.writeFile(
      path.join(dir, 'config.json'),
      JSON.stringify({
        nodes: [
          { name: 'Workstation-1', console_port: 5002 },
          { name: 'Workstation-2', console_port: 5003 },
          { name: 'Workstation-9' },
        ],
      })
    );

    fleet = new FakeConsoleFleet()
      .on(5002, (command) => (command.startsWith('sh ') ? { output: 'hi' } : undefined))
      .on(5003, (command) => (command.startsWith('bash ') ? { output: 'oops', exitCode: 2 } : undefined));
    scripts = new FleetScripts(
      {
        configPath: path.join(dir, 'config.json'),
        scriptsDir: path.join(dir, 'scripts'),
        hostOverride: null,
        connectTimeoutMs: 100,
        newline: '\r',
        concurrency: 2,
        chunkSize: 256,
        commandTimeoutMs: 200,
      },
      { connect: fleet.connect }
    );
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('pushes and runs a script', async () => {
    const [report] = await scripts.push([pushItem({ runAfterUpload: true })]);

    expect(report).toMatchObject({
      nodeName: 'Workstation-1',
      remotePath: '/opt/lab/hello.sh',
      status: 'succeeded',
      upload: 'uploaded',
      exitCode: 0,
      stdout: 'hi',
    });
    expect(fleet.commandsFor(5002)).toContain("printf '%s' 'ZWNobyBoaQo=' >> '/opt/lab/hello.sh.b64'");
  });

  it('keeps one report per item in request order', async () => {
    const reports = await scripts.push([
      pushItem({ nodeName: 'Workstation-2' }),
      pushItem({ nodeName: 'workstation-1' }),
    ]);

    expect(reports.map((report) => [report.nodeName, report.status])).toEqual([
      ['Workstation-2', 'succeeded'],
      ['Workstation-1', 'succeeded'],
    ]);
  });

  it('reports nodes without a console port per item', async () => {
    const reports = await scripts.push([pushItem({ nodeName: 'Workstation-9' }), pushItem()]);

    expect(reports[0]).toMatchObject({
      nodeName: 'Workstation-9',
      status: 'failed',
      upload: 'failed',
      error: { kind: 'connect', message: "Node 'Workstation-9' has no console port" },
    });
    expect(reports[1].status).toBe('succeeded');
  });

  it('validates every item before connecting', async () => {
    await expect(scripts.push([pushItem(), pushItem({ nodeName: 'Ghost' })])).rejects.toThrow(
      new NodeNotFoundError('Ghost')
    );
    await expect(scripts.push([pushItem(), pushItem({ remotePath: 'relative.sh' })])).rejects.toBeInstanceOf(
      ScriptPathError
    );
    await expect(scripts.push([pushItem({ localPath: '../config.json' })])).rejects.toBeInstanceOf(
      ScriptPathError
    );
    expect(fleet.connectAttempts).toEqual([]);
  });

  it('runs scripts already on the nodes', async () => {
    const [report] = await scripts.run([
      { nodeName: 'Workstation-2', remotePath: '/opt/lab/check.sh', shell: 'bash', timeoutMs: 1000 },
    ]);

    expect(report).toMatchObject({
      nodeName: 'Workstation-2',
      status: 'failed',
      upload: 'not-requested',
      exitCode: 2,
      stdout: 'oops',
    });
    expect(fleet.commandsFor(5003)[0]).toBe("bash '/opt/lab/check.sh' 2>'/opt/lab/check.sh.stderr'");
  });

  it('connects through the host override', async () => {
    await scripts.run(
      [{ nodeName: 'Workstation-1', remotePath: '/opt/lab/hello.sh', shell: 'sh', timeoutMs: 1000 }],
      { hostOverride: 'lab-host' }
    );

    expect(fleet.connectAttempts).toEqual([{ host: 'lab-host', port: 5002 }]);
  });
});
