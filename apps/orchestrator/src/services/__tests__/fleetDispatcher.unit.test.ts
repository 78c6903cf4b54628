import { FakeConsoleFleet } from '../../test/fakeConsole';
import { runCommand, type ConsoleEndpoint } from '../consoleSession';
import { FleetDispatcher, type DispatchJob } from '../fleetDispatcher';

const endpoint = (port: number): ConsoleEndpoint => ({ host: '127.0.0.1', port });

function hostnameJob(id: string, nodeName: string, port: number | null): DispatchJob<string> {
  return {
    id,
    nodeName,
    endpoint: port === null ? null : endpoint(port),
    timeoutMs: 1000,
    execute: async (session) => (await runCommand(session, 'hostname', { timeoutMs: 500 })).output,
  };
}

describe('FleetDispatcher', () => {
  let fleet: FakeConsoleFleet;
  let dispatcher: FleetDispatcher;

  beforeEach(() => {
    fleet = new FakeConsoleFleet()
      .on(5000, () => ({ output: 'node-a' }))
      .on(5001, () => ({ output: 'node-b', delayMs: 30 }))
      .on(5002, (command) => (command === 'hostname' ? { hang: true } : undefined));
    dispatcher = new FleetDispatcher({ connect: fleet.connect, connectTimeoutMs: 1000 });
  });

  it('returns one result per job in submission order', async () => {
    const results = await dispatcher.run(
      [hostnameJob('b', 'B', 5001), hostnameJob('a', 'A', 5000)],
      { concurrency: 2 }
    );

    expect(results.map((result) => [result.id, result.status, result.value])).toEqual([
      ['b', 'completed', 'node-b'],
      ['a', 'completed', 'node-a'],
    ]);
    expect(fleet.sessions.every((session) => session.closed)).toBe(true);
  });

  it('isolates a hanging job', async () => {
    const hanging: DispatchJob<string> = {
      ...hostnameJob('hang', 'Hung-1', 5002),
      timeoutMs: 1000,
      execute: async (session) => (await runCommand(session, 'hostname', { timeoutMs: 5000 })).output,
    };

    const results = await dispatcher.run(
      [hostnameJob('a', 'A', 5000), hanging, hostnameJob('b', 'B', 5001)],
      { concurrency: 3 }
    );

    expect(results.map((result) => result.status)).toEqual(['completed', 'timeout', 'completed']);
    expect(results[1].value).toBeNull();
    expect(results[1].error).toEqual({
      kind: 'timeout',
      message: 'Job hang on Hung-1 timed out after 1000ms',
    });
    // The healthy jobs finish on their own schedule, not the hung one's
    expect(results[1].elapsedMs).toBeGreaterThanOrEqual(900);
    expect(results[0].elapsedMs).toBeLessThan(250);
    expect(results[2].elapsedMs).toBeLessThan(250);
    expect(fleet.sessionsFor(5002)[0].aborted).toBe(true);
  });

  it('reports refused connections as connect failures', async () => {
    const [result] = await dispatcher.run([hostnameJob('x', 'X', 5999)], { concurrency: 1 });

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({
      kind: 'connect',
      message: 'Console 127.0.0.1:5999 unreachable: connect ECONNREFUSED',
    });
  });

  it('fails nodes without a console port without connecting', async () => {
    const [result] = await dispatcher.run([hostnameJob('c', 'C', null)], { concurrency: 1 });

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({ kind: 'connect', message: "Node 'C' has no console port" });
    expect(fleet.connectAttempts).toEqual([]);
  });

  it('reports thrown errors and still closes the session', async () => {
    const [result] = await dispatcher.run(
      [
        {
          ...hostnameJob('boom', 'A', 5000),
          execute: async () => {
            throw new Error('parser exploded');
          },
        },
      ],
      { concurrency: 1 }
    );

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({ kind: 'unknown', message: 'parser exploded' });
    expect(fleet.sessionsFor(5000)[0].closed).toBe(true);
  });

  it('never runs more jobs than the concurrency bound', async () => {
    let active = 0;
    let peak = 0;
    const jobs = Array.from({ length: 6 }, (_, index): DispatchJob<number> => ({
      id: `j${index}`,
      nodeName: `N${index}`,
      endpoint: endpoint(5000),
      timeoutMs: 1000,
      execute: async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 20));
        active -= 1;
        return index;
      },
    }));

    const results = await dispatcher.run(jobs, { concurrency: 2 });

    expect(peak).toBe(2);
    expect(results.map((result) => result.value)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('handles an empty job list', async () => {
    await expect(dispatcher.run([], { concurrency: 4 })).resolves.toEqual([]);
  });
});
