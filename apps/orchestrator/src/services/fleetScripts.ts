import type { FleetNode, ScriptReport } from '@labfleet/protocol';
import { config } from '../config';
import { logger } from '../utils/logger';
import { openConsole, resolveConsoleEndpoint, type ConsoleConnector } from './consoleSession';
import { NodeNotFoundError } from './errors';
import { FleetConfigStore } from './fleetConfigStore';
import { FleetDispatcher, type DispatchJob } from './fleetDispatcher';
import { createScriptJob, createScriptRunJob, toScriptReport } from './scriptJobs';
import { resolveScriptSource, validateRemotePath } from './scriptSources';

export interface ScriptPushItem {
  nodeName: string;
  localPath: string;
  remotePath: string;
  runAfterUpload: boolean;
  executable: boolean;
  overwrite: boolean;
  timeoutMs: number;
  shell: string;
}

export interface ScriptRunItem {
  nodeName: string;
  remotePath: string;
  shell: string;
  timeoutMs: number;
}

export interface ScriptDispatchOptions {
  hostOverride?: string | null;
  concurrency?: number;
}

export interface FleetScriptSettings {
  configPath: string;
  scriptsDir: string;
  hostOverride: string | null;
  connectTimeoutMs: number;
  newline: string;
  concurrency: number;
  chunkSize: number;
  commandTimeoutMs: number;
}

export interface FleetScriptDeps {
  connect: ConsoleConnector;
  openStore: (path: string) => Promise<FleetConfigStore>;
}

export function scriptSettingsFromConfig(): FleetScriptSettings {
  return {
    configPath: config.fleet.configPath,
    scriptsDir: config.fleet.scriptsDir,
    hostOverride: config.console.hostOverride,
    connectTimeoutMs: config.console.connectTimeoutMs,
    newline: config.console.newline,
    concurrency: config.scripts.concurrency,
    chunkSize: config.scripts.uploadChunkSize,
    commandTimeoutMs: config.provisioning.commandTimeoutMs,
  };
}

function findNode(nodes: FleetNode[], name: string): FleetNode {
  const node =
    nodes.find((candidate) => candidate.name === name) ??
    nodes.find((candidate) => candidate.name.toLowerCase() === name.toLowerCase());
  if (!node) {
    throw new NodeNotFoundError(name);
  }
  return node;
}

/**
 * Pushes and runs scripts across the fleet. Every item is validated (node
 * known, paths acceptable, source readable) before any console is opened.
 */
export class FleetScripts {
  private readonly settings: FleetScriptSettings;
  private readonly deps: FleetScriptDeps;

  constructor(settings: Partial<FleetScriptSettings> = {}, deps: Partial<FleetScriptDeps> = {}) {
    this.settings = { ...scriptSettingsFromConfig(), ...settings };
    this.deps = {
      connect: openConsole,
      openStore: (path) => FleetConfigStore.open(path),
      ...deps,
    };
  }

  async push(items: ScriptPushItem[], options: ScriptDispatchOptions = {}): Promise<ScriptReport[]> {
    const nodes = (await this.deps.openStore(this.settings.configPath)).snapshot().nodes;
    const hostOverride = options.hostOverride ?? this.settings.hostOverride;

    const jobs: DispatchJob<ScriptReport>[] = [];
    for (const [index, item] of items.entries()) {
      const node = findNode(nodes, item.nodeName);
      const remotePath = validateRemotePath(item.remotePath);
      const source = await resolveScriptSource(this.settings.scriptsDir, item.localPath);

      jobs.push(
        createScriptJob(
          {
            nodeName: node.name,
            source: source.content,
            remotePath,
            runAfterUpload: item.runAfterUpload,
            executable: item.executable,
            overwrite: item.overwrite,
            timeoutMs: item.timeoutMs,
            shell: item.shell,
          },
          {
            id: `push:${index}:${node.name}`,
            endpoint: resolveConsoleEndpoint(node, hostOverride),
            chunkSize: this.settings.chunkSize,
            commandTimeoutMs: this.settings.commandTimeoutMs,
          }
        )
      );
    }

    logger.info(`Pushing ${jobs.length} scripts`);
    const results = await this.dispatcher().run(jobs, {
      concurrency: options.concurrency ?? this.settings.concurrency,
    });
    return results.map((result, index) =>
      toScriptReport(result, validateRemotePath(items[index].remotePath), 'uploaded')
    );
  }

  async run(items: ScriptRunItem[], options: ScriptDispatchOptions = {}): Promise<ScriptReport[]> {
    const nodes = (await this.deps.openStore(this.settings.configPath)).snapshot().nodes;
    const hostOverride = options.hostOverride ?? this.settings.hostOverride;

    const jobs = items.map((item, index) => {
      const node = findNode(nodes, item.nodeName);
      return createScriptRunJob(
        {
          nodeName: node.name,
          remotePath: validateRemotePath(item.remotePath),
          shell: item.shell,
          timeoutMs: item.timeoutMs,
        },
        {
          id: `run:${index}:${node.name}`,
          endpoint: resolveConsoleEndpoint(node, hostOverride),
          commandTimeoutMs: this.settings.commandTimeoutMs,
        }
      );
    });

    logger.info(`Running ${jobs.length} scripts`);
    const results = await this.dispatcher().run(jobs, {
      concurrency: options.concurrency ?? this.settings.concurrency,
    });
    return results.map((result, index) =>
      toScriptReport(result, validateRemotePath(items[index].remotePath), 'not-requested')
    );
  }

  private dispatcher(): FleetDispatcher {
    return new FleetDispatcher({
      connect: this.deps.connect,
      connectTimeoutMs: this.settings.connectTimeoutMs,
      newline: this.settings.newline,
    });
  }
}
