import type { CommandResult, StaticPlanEntry } from '@labfleet/protocol';
import { logger } from '../utils/logger';
import { runCommand, toCommandResult, type ConsoleSession } from './consoleSession';
import {
  isCommandNotFound,
  parseDefaultGateway,
  type DhcpClientStrategy,
} from './dhcpStrategies';
import { StaticApplyError, StaticPlanMissError, type FleetError } from './errors';
import type { StaticPlan } from './staticPlan';

export type AcquisitionState =
  | 'START'
  | 'TRY_STRATEGY'
  | 'SUCCESS'
  | 'NEXT_STRATEGY'
  | 'STATIC_FALLBACK'
  | 'RESOLVED'
  | 'FAILED';

export interface AcquisitionTransition {
  state: AcquisitionState;
  strategy?: string;
  detail?: string;
}

export interface AcquisitionOptions {
  nodeName: string;
  interfaceName: string;
  strategies: DhcpClientStrategy[];
  staticPlan: StaticPlan;
  /** Upper bound for one DHCP client run. */
  attemptTimeoutMs: number;
  /** Upper bound for housekeeping commands (link up, route probe, static apply). */
  commandTimeoutMs: number;
  applyStatic?: boolean;
}

export interface AcquisitionOutcome {
  status: 'resolved' | 'fallback' | 'failed';
  interfaceName: string;
  ip: string | null;
  prefixLength: number | null;
  gateway: string | null;
  strategy: string | null;
  commands: CommandResult[];
  transitions: AcquisitionTransition[];
  error: FleetError | null;
}

/**
 * Shell commands that put a static plan entry on its interface.
 */
export function staticAddressCommands(entry: StaticPlanEntry): string[] {
  const commands = [
    `ip addr flush dev ${entry.interfaceName}`,
    `ip addr add ${entry.ip}/${entry.prefixLength} dev ${entry.interfaceName}`,
  ];
  if (entry.gateway) {
    commands.push(`ip route replace default via ${entry.gateway} dev ${entry.interfaceName}`);
  }
  return commands;
}

/**
 * Drives one interface of one node from START to RESOLVED or FAILED over an
 * already-open console. Strategies run strictly in order and the first one
 * whose output yields a valid lease wins.
 */
export class AddressAcquisition {
  private readonly commands: CommandResult[] = [];
  private readonly transitions: AcquisitionTransition[] = [];

  constructor(
    private readonly session: ConsoleSession,
    private readonly options: AcquisitionOptions
  ) {}

  private transition(state: AcquisitionState, strategy?: string, detail?: string): void {
    this.transitions.push({ state, strategy, detail });
    logger.debug(`Acquisition ${this.options.nodeName}:${this.options.interfaceName} -> ${state}`, {
      strategy,
      detail,
    });
  }

  private async run(command: string, timeoutMs: number): Promise<CommandResult> {
    const outcome = await runCommand(this.session, command, { timeoutMs });
    const result = toCommandResult(this.options.nodeName, outcome);
    this.commands.push(result);
    return result;
  }

  private outcome(
    status: AcquisitionOutcome['status'],
    fields: Partial<Pick<AcquisitionOutcome, 'ip' | 'prefixLength' | 'gateway' | 'strategy' | 'error'>>
  ): AcquisitionOutcome {
    return {
      status,
      interfaceName: this.options.interfaceName,
      ip: fields.ip ?? null,
      prefixLength: fields.prefixLength ?? null,
      gateway: fields.gateway ?? null,
      strategy: fields.strategy ?? null,
      commands: [...this.commands],
      transitions: [...this.transitions],
      error: fields.error ?? null,
    };
  }

  private async probeGateway(): Promise<string | null> {
    const { interfaceName, commandTimeoutMs } = this.options;
    const result = await this.run('ip -4 route show default', commandTimeoutMs);
    return parseDefaultGateway(result.capturedOutput, interfaceName);
  }

  async acquire(): Promise<AcquisitionOutcome> {
    const { nodeName, interfaceName, strategies, staticPlan, attemptTimeoutMs, commandTimeoutMs } =
      this.options;
    const planEntry = staticPlan.lookup(nodeName, interfaceName);

    this.transition('START');
    await this.run(`ip link set ${interfaceName} up`, commandTimeoutMs);

    for (const strategy of strategies) {
      this.transition('TRY_STRATEGY', strategy.name);
      const result = await this.run(strategy.command(interfaceName), attemptTimeoutMs);

      if (isCommandNotFound(result.capturedOutput, strategy.binary)) {
        this.transition('NEXT_STRATEGY', strategy.name, 'client not installed');
        continue;
      }

      const lease = strategy.parseLease(result.capturedOutput);
      if (!lease) {
        this.transition(
          'NEXT_STRATEGY',
          strategy.name,
          result.timedOut ? 'no lease before timeout' : 'no lease in output'
        );
        continue;
      }

      this.transition('SUCCESS', strategy.name, lease.ip);
      const gateway = lease.gateway ?? (await this.probeGateway()) ?? planEntry?.gateway ?? null;
      this.transition('RESOLVED', strategy.name);
      logger.info(`${nodeName}:${interfaceName} leased ${lease.ip} via ${strategy.name}`, {
        gateway,
      });

      return this.outcome('resolved', {
        ip: lease.ip,
        prefixLength: lease.prefixLength,
        gateway,
        strategy: strategy.name,
      });
    }

    this.transition('STATIC_FALLBACK');
    if (!planEntry) {
      const error = new StaticPlanMissError(nodeName, interfaceName);
      this.transition('FAILED', undefined, error.message);
      logger.warn(`${nodeName}:${interfaceName} -> DHCP unavailable and no static plan entry`);
      return this.outcome('failed', { error });
    }

    if (this.options.applyStatic ?? true) {
      for (const command of staticAddressCommands(planEntry)) {
        const result = await this.run(command, commandTimeoutMs);
        if (!result.succeeded) {
          const error = new StaticApplyError(nodeName, interfaceName, result);
          this.transition('FAILED', undefined, error.message);
          logger.warn(`${nodeName}:${interfaceName} -> ${error.message}`);
          return this.outcome('failed', { error });
        }
      }
    }

    this.transition('RESOLVED', undefined, 'static plan');
    logger.warn(`${nodeName}:${interfaceName} -> DHCP unavailable; using static ${planEntry.ip}`);

    return this.outcome('fallback', {
      ip: planEntry.ip,
      prefixLength: planEntry.prefixLength,
      gateway: planEntry.gateway,
    });
  }
}

export function acquireAddress(
  session: ConsoleSession,
  options: AcquisitionOptions
): Promise<AcquisitionOutcome> {
  return new AddressAcquisition(session, options).acquire();
}
