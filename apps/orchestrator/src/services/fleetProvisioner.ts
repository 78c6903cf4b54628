import type {
  CommandResult,
  FleetNode,
  InterfaceOutcome,
  NodeReport,
  NodeRole,
  ProvisionReport,
  ReportedError,
} from '@labfleet/protocol';
import { config, type PersistMode } from '../config';
import { logger } from '../utils/logger';
import { acquireAddress, staticAddressCommands, type AcquisitionOutcome } from './addressAcquisition';
import {
  openConsole,
  resolveConsoleEndpoint,
  runCommand,
  toCommandResult,
  type ConsoleConnector,
  type ConsoleSession,
} from './consoleSession';
import { resolveStrategies, type DhcpClientStrategy } from './dhcpStrategies';
import {
  FirewallRuleError,
  NodeNotFoundError,
  PersistenceError,
  StaticPlanMissError,
  toReportedError,
} from './errors';
import { composeFirewallRules, type FirewallParams } from './firewallRules';
import { FleetConfigStore } from './fleetConfigStore';
import { FleetDispatcher, type DispatchJob, type DispatchResult } from './fleetDispatcher';
import { classifyNode } from './nodeClassifier';
import { loadStaticPlan, type StaticPlan } from './staticPlan';

/**
 * Fleet Provisioner
 * One provisioning run: classify, start DHCP servers, warm up, acquire
 * addresses and set up firewalls, merge into the store, persist, report.
 */

export interface ProvisionOptions {
  hostOverride?: string | null;
  only?: string[];
  interfaces?: string[];
  attemptTimeoutMs?: number;
  nodeTimeoutMs?: number;
  dhcpWarmupMs?: number;
  concurrency?: number;
  strategies?: string[];
  applyStatic?: boolean;
}

export interface ProvisionerSettings {
  configPath: string;
  staticPlanPath: string;
  hostOverride: string | null;
  connectTimeoutMs: number;
  newline: string;
  concurrency: number;
  attemptTimeoutMs: number;
  nodeTimeoutMs: number;
  commandTimeoutMs: number;
  dhcpWarmupMs: number;
  strategies: string[];
  dhcpServerStartCommand: string;
  persistMode: PersistMode;
  firewall: Partial<FirewallParams>;
}

export interface ProvisionerDeps {
  connect: ConsoleConnector;
  openStore: (path: string) => Promise<FleetConfigStore>;
  loadPlan: (path: string) => Promise<StaticPlan>;
  sleep: (ms: number) => Promise<void>;
}

type NodeWork = Omit<NodeReport, 'nodeName' | 'role' | 'elapsedMs'>;

interface Target {
  node: FleetNode;
  role: NodeRole;
}

interface SaveAttempt {
  backupPath: string | null;
  error: ReportedError | null;
}

const defaultDeps: ProvisionerDeps = {
  connect: openConsole,
  openStore: (path) => FleetConfigStore.open(path),
  loadPlan: (path) => loadStaticPlan(path),
  sleep: (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)),
};

export function settingsFromConfig(): ProvisionerSettings {
  return {
    configPath: config.fleet.configPath,
    staticPlanPath: config.fleet.staticPlanPath,
    hostOverride: config.console.hostOverride,
    connectTimeoutMs: config.console.connectTimeoutMs,
    newline: config.console.newline,
    concurrency: config.provisioning.concurrency,
    attemptTimeoutMs: config.provisioning.attemptTimeoutMs,
    nodeTimeoutMs: config.provisioning.nodeTimeoutMs,
    commandTimeoutMs: config.provisioning.commandTimeoutMs,
    dhcpWarmupMs: config.provisioning.dhcpWarmupMs,
    strategies: config.provisioning.strategies,
    dhcpServerStartCommand: config.provisioning.dhcpServerStartCommand,
    persistMode: config.provisioning.persistMode,
    firewall: { ...config.firewall },
  };
}

/**
 * Case-insensitive target selection. Names that match nothing abort the run.
 */
export function selectTargets(nodes: FleetNode[], only?: string[]): FleetNode[] {
  if (!only || only.length === 0) {
    return nodes;
  }

  const wanted = new Set(only.map((name) => name.toLowerCase()));
  for (const name of only) {
    if (!nodes.some((node) => node.name.toLowerCase() === name.toLowerCase())) {
      throw new NodeNotFoundError(name);
    }
  }
  return nodes.filter((node) => wanted.has(node.name.toLowerCase()));
}

function emptyWork(action: NodeReport['action']): NodeWork {
  return {
    action,
    status: 'failed',
    assignedIp: null,
    gateway: null,
    addressSource: null,
    interfaces: [],
    commands: [],
    error: null,
  };
}

function actionFor(role: NodeRole): NodeReport['action'] {
  switch (role) {
    case 'dhcp-server':
      return 'dhcp-server-start';
    case 'firewall':
      return 'firewall';
    case 'client':
      return 'address-acquisition';
    default:
      return 'none';
  }
}

export class FleetProvisioner {
  private readonly settings: ProvisionerSettings;
  private readonly deps: ProvisionerDeps;

  constructor(settings: Partial<ProvisionerSettings> = {}, deps: Partial<ProvisionerDeps> = {}) {
    this.settings = { ...settingsFromConfig(), ...settings };
    this.deps = { ...defaultDeps, ...deps };
  }

  async provision(options: ProvisionOptions = {}): Promise<ProvisionReport> {
    const startedAt = new Date();
    const settings = this.settings;
    const hostOverride = options.hostOverride ?? settings.hostOverride;
    const concurrency = options.concurrency ?? settings.concurrency;
    const nodeTimeoutMs = options.nodeTimeoutMs ?? settings.nodeTimeoutMs;
    const dhcpWarmupMs = options.dhcpWarmupMs ?? settings.dhcpWarmupMs;

    const store = await this.deps.openStore(settings.configPath);
    const plan = await this.deps.loadPlan(settings.staticPlanPath);
    const strategies = resolveStrategies(options.strategies ?? settings.strategies);

    const targets: Target[] = selectTargets(store.snapshot().nodes, options.only).map((node) => ({
      node,
      role: classifyNode(node.name),
    }));
    logger.info(`Provisioning ${targets.length} nodes`, {
      roles: Object.fromEntries(targets.map((target) => [target.node.name, target.role])),
    });

    const dispatcher = new FleetDispatcher({
      connect: this.deps.connect,
      connectTimeoutMs: settings.connectTimeoutMs,
      newline: settings.newline,
    });
    const reports = new Map<string, NodeReport>();
    const toJob = (
      target: Target,
      execute: (session: ConsoleSession) => Promise<NodeWork>
    ): DispatchJob<NodeWork> => ({
      id: `${target.role}:${target.node.name}`,
      nodeName: target.node.name,
      endpoint: resolveConsoleEndpoint(target.node, hostOverride),
      timeoutMs: nodeTimeoutMs,
      execute,
    });
    const record = (targetsInPhase: Target[], results: DispatchResult<NodeWork>[]): void => {
      results.forEach((result, index) => {
        const target = targetsInPhase[index];
        reports.set(target.node.name, this.toNodeReport(target, result));
      });
    };

    // Phase 1: DHCP servers must be serving before any client asks for a lease
    const servers = targets.filter((target) => target.role === 'dhcp-server');
    const serverResults = await dispatcher.run(
      servers.map((target) => toJob(target, (session) => this.startDhcpServer(target, session))),
      { concurrency }
    );
    record(servers, serverResults);

    if (serverResults.some((result) => result.value?.status === 'started') && dhcpWarmupMs > 0) {
      logger.info(`Waiting ${dhcpWarmupMs}ms for DHCP servers to come up`);
      await this.deps.sleep(dhcpWarmupMs);
    }

    for (const target of targets.filter((candidate) => candidate.role === 'switch')) {
      reports.set(target.node.name, {
        nodeName: target.node.name,
        role: target.role,
        ...emptyWork('none'),
        status: 'skipped',
        elapsedMs: 0,
      });
    }

    // Phase 2: clients and firewalls
    const workers = targets.filter(
      (target) => target.role === 'client' || target.role === 'firewall'
    );
    const workerResults = await dispatcher.run(
      workers.map((target) =>
        toJob(target, (session) =>
          target.role === 'firewall'
            ? this.configureFirewall(target, session, plan, options)
            : this.acquire(target, session, plan, options, strategies)
        )
      ),
      { concurrency }
    );
    record(workers, workerResults);

    // Merge in config order through the store's single update path
    let changed = false;
    const saves: SaveAttempt[] = [];
    for (const target of workers) {
      const nodeReport = reports.get(target.node.name);
      if (!nodeReport || nodeReport.status === 'timeout') {
        continue;
      }

      const resolved = nodeReport.status === 'resolved' || nodeReport.status === 'fallback';
      const update = await store.updateNode(target.node.name, (draft) => {
        draft.assignedIp = resolved ? nodeReport.assignedIp : null;
        draft.gateway = resolved ? nodeReport.gateway : null;
      });
      changed = changed || update.changed;

      if (update.changed && settings.persistMode === 'incremental') {
        saves.push(await this.save(store));
      }
    }

    if (changed && settings.persistMode === 'end-of-run') {
      saves.push(await this.save(store));
    }
    const backupPath = saves.reduce<string | null>(
      (latest, attempt) => attempt.backupPath ?? latest,
      null
    );
    const persistenceError = saves.find((attempt) => attempt.error !== null)?.error ?? null;

    const completedAt = new Date();
    const nodes = targets.flatMap((target) => {
      const nodeReport = reports.get(target.node.name);
      return nodeReport ? [nodeReport] : [];
    });
    logger.info('Provisioning run complete', {
      changed,
      persisted: persistenceError === null,
      durationMs: completedAt.getTime() - startedAt.getTime(),
      statuses: Object.fromEntries(nodes.map((node) => [node.nodeName, node.status])),
    });

    return {
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      changed,
      backupPath,
      persistenceError,
      nodes,
    };
  }

  /**
   * A failed write costs the save step only; the node results stand.
   */
  private async save(store: FleetConfigStore): Promise<SaveAttempt> {
    try {
      return { backupPath: (await store.save()).backupPath, error: null };
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      logger.error(`Provisioning results not saved: ${error.message}`, {
        cause: error.cause instanceof Error ? error.cause.message : String(error.cause),
      });
      return { backupPath: null, error: toReportedError(error) };
    }
  }

  private toNodeReport(target: Target, result: DispatchResult<NodeWork>): NodeReport {
    const work: NodeWork = result.value ?? {
      ...emptyWork(actionFor(target.role)),
      status: result.status === 'timeout' ? 'timeout' : 'failed',
      error: result.error,
    };

    return {
      nodeName: target.node.name,
      role: target.role,
      ...work,
      elapsedMs: result.elapsedMs,
    };
  }

  private interfacesFor(nodeName: string, plan: StaticPlan, options: ProvisionOptions): string[] {
    if (options.interfaces && options.interfaces.length > 0) {
      return options.interfaces;
    }
    const planned = plan.interfacesFor(nodeName);
    return planned.length > 0 ? planned : ['eth0'];
  }

  private async startDhcpServer(target: Target, session: ConsoleSession): Promise<NodeWork> {
    const command = this.settings.dhcpServerStartCommand;
    const outcome = await runCommand(session, command, {
      timeoutMs: this.settings.attemptTimeoutMs,
    });
    const result = toCommandResult(target.node.name, outcome);

    // A server kept in the foreground never returns; it is running.
    if (result.succeeded || result.timedOut) {
      if (result.timedOut) {
        logger.info(
          `${target.node.name}: '${command}' still running after ${this.settings.attemptTimeoutMs}ms; treated as started`
        );
      }
      return { ...emptyWork('dhcp-server-start'), status: 'started', commands: [result] };
    }

    logger.warn(`${target.node.name}: DHCP server start failed`, { exitCode: result.exitCode });
    return {
      ...emptyWork('dhcp-server-start'),
      commands: [result],
      error: {
        kind: 'command',
        message: `'${command}' exited with ${result.exitCode ?? 'no status'}`,
      },
    };
  }

  private async acquire(
    target: Target,
    session: ConsoleSession,
    plan: StaticPlan,
    options: ProvisionOptions,
    strategies: DhcpClientStrategy[]
  ): Promise<NodeWork> {
    const commands: CommandResult[] = [];
    const interfaces: InterfaceOutcome[] = [];
    let first: AcquisitionOutcome | null = null;

    for (const interfaceName of this.interfacesFor(target.node.name, plan, options)) {
      const outcome = await acquireAddress(session, {
        nodeName: target.node.name,
        interfaceName,
        strategies,
        staticPlan: plan,
        attemptTimeoutMs: options.attemptTimeoutMs ?? this.settings.attemptTimeoutMs,
        commandTimeoutMs: this.settings.commandTimeoutMs,
        applyStatic: options.applyStatic,
      });
      first = first ?? outcome;
      commands.push(...outcome.commands);
      interfaces.push({
        interfaceName: outcome.interfaceName,
        status: outcome.status,
        ip: outcome.ip,
        prefixLength: outcome.prefixLength,
        gateway: outcome.gateway,
        strategy: outcome.strategy,
      });
    }

    if (!first) {
      return emptyWork('address-acquisition');
    }

    return {
      action: 'address-acquisition',
      status: first.status,
      assignedIp: first.ip,
      gateway: first.gateway,
      addressSource:
        first.status === 'resolved' ? 'lease' : first.status === 'fallback' ? 'static-plan' : null,
      interfaces,
      commands,
      error: first.error ? toReportedError(first.error) : null,
    };
  }

  private async configureFirewall(
    target: Target,
    session: ConsoleSession,
    plan: StaticPlan,
    options: ProvisionOptions
  ): Promise<NodeWork> {
    const nodeName = target.node.name;
    const [interfaceName] = this.interfacesFor(nodeName, plan, options);
    const entry = plan.lookup(nodeName, interfaceName);

    if (!entry) {
      const error = new StaticPlanMissError(nodeName, interfaceName);
      logger.warn(`${nodeName}: ${error.message}; firewall left unconfigured`);
      return { ...emptyWork('firewall'), error: toReportedError(error) };
    }

    const ruleSet = composeFirewallRules(entry.ip, this.settings.firewall);
    const commands: CommandResult[] = [];
    for (const command of [...staticAddressCommands(entry), ...ruleSet.commands]) {
      const outcome = await runCommand(session, command, {
        timeoutMs: this.settings.commandTimeoutMs,
      });
      commands.push(toCommandResult(nodeName, outcome));
    }

    const failures = commands.filter((result) => !result.succeeded);
    const interfaces: InterfaceOutcome[] = [
      {
        interfaceName,
        status: failures.length === 0 ? 'fallback' : 'failed',
        ip: entry.ip,
        prefixLength: entry.prefixLength,
        gateway: entry.gateway,
        strategy: null,
      },
    ];

    if (failures.length > 0) {
      const error = new FirewallRuleError(
        `${failures.length} of ${commands.length} firewall commands failed, first: ${failures[0].command}`
      );
      logger.warn(`${nodeName}: ${error.message}`);
      return { ...emptyWork('firewall'), interfaces, commands, error: toReportedError(error) };
    }

    logger.info(`${nodeName}: firewall configured on ${entry.ip}`, {
      rules: ruleSet.commands.length,
    });
    return {
      action: 'firewall',
      status: 'resolved',
      assignedIp: entry.ip,
      gateway: entry.gateway,
      addressSource: 'static-plan',
      interfaces,
      commands,
      error: null,
    };
  }
}
