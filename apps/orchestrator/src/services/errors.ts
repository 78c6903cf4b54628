import type { CommandResult, FleetErrorKind, ReportedError } from '@labfleet/protocol';

/**
 * Base class for every failure the provisioning core reports.
 * `kind` is what ends up in run reports; HTTP status mapping happens in the
 * controllers.
 */
export class FleetError extends Error {
  constructor(
    message: string,
    public readonly kind: FleetErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConnectError extends FleetError {
  constructor(
    public readonly host: string,
    public readonly port: number,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Console ${host}:${port} unreachable: ${reason}`, 'connect', options);
  }
}

export class CommandTimeoutError extends FleetError {
  constructor(
    public readonly timeoutMs: number,
    subject: string
  ) {
    super(`${subject} timed out after ${timeoutMs}ms`, 'timeout');
  }
}

export class ConfigNotFoundError extends FleetError {
  constructor(public readonly path: string) {
    super(`Config file not found: ${path}`, 'not-found');
  }
}

export class ConfigParseError extends FleetError {
  constructor(
    public readonly path: string,
    public readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(`Invalid file ${path}: ${issues.join('; ')}`, 'parse', options);
  }
}

export class StaticPlanMissError extends FleetError {
  constructor(
    public readonly nodeName: string,
    public readonly interfaceName: string
  ) {
    super(`No static plan entry for ${nodeName}:${interfaceName}`, 'static-plan-miss');
  }
}

export class PersistenceError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'persistence', options);
  }
}

export class NodeNotFoundError extends FleetError {
  constructor(public readonly nodeName: string) {
    super(`Node '${nodeName}' not found in config`, 'node-not-found');
  }
}

export class InvalidNodeError extends FleetError {
  constructor(
    public readonly nodeName: string,
    reason: string
  ) {
    super(`Node '${nodeName}' ${reason}`, 'validation');
  }
}

export class FirewallRuleError extends FleetError {
  constructor(message: string) {
    super(message, 'firewall');
  }
}

export class StaticApplyError extends FleetError {
  constructor(
    public readonly nodeName: string,
    public readonly interfaceName: string,
    public readonly result: CommandResult
  ) {
    const reason = result.timedOut ? 'timed out' : `exited with ${result.exitCode ?? 'no status'}`;
    super(
      `Static address not applied on ${nodeName}:${interfaceName}: '${result.command}' ${reason}`,
      'command'
    );
  }
}

export class ScriptPathError extends FleetError {
  constructor(message: string) {
    super(message, 'script-path');
  }
}

export function toReportedError(error: unknown): ReportedError {
  if (error instanceof FleetError) {
    return { kind: error.kind, message: error.message };
  }

  return {
    kind: 'unknown',
    message: error instanceof Error ? error.message : String(error),
  };
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
