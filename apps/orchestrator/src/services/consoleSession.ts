import net from 'node:net';
import { randomUUID } from 'crypto';
import { StringDecoder } from 'string_decoder';
import type { CommandResult, FleetNode } from '@labfleet/protocol';
import { logger } from '../utils/logger';
import { ConnectError } from './errors';

/**
 * Console Session
 * One bounded, line-oriented conversation with a node's text console.
 * Knows nothing about DHCP or firewalls.
 */

export interface ConsoleEndpoint {
  host: string;
  port: number;
}

export interface ReadUntilOptions {
  /** Stop as soon as this matches. Without a pattern the read lasts the whole timeout. */
  pattern?: RegExp | string;
  timeoutMs: number;
}

export interface ReadResult {
  output: string;
  matched: boolean;
  timedOut: boolean;
  closed: boolean;
}

export interface ConsoleSession {
  readonly endpoint: ConsoleEndpoint;
  sendLine(text: string): Promise<void>;
  /** Always resolves with whatever was captured, even when the timeout elapses. */
  readUntil(options: ReadUntilOptions): Promise<ReadResult>;
  close(): Promise<void>;
  /** Tears the transport down immediately; pending reads resolve as closed. */
  abort(): void;
}

export interface ConnectOptions {
  connectTimeoutMs: number;
  newline?: string;
}

export type ConsoleConnector = (
  endpoint: ConsoleEndpoint,
  options: ConnectOptions
) => Promise<ConsoleSession>;

export interface CommandOutcome {
  command: string;
  output: string;
  exitCode: number | null;
  timedOut: boolean;
  elapsedMs: number;
}

const CLOSE_GRACE_MS = 500;
const WILDCARD_HOSTS = new Set(['', '0.0.0.0', '::']);
const DEFAULT_CONSOLE_HOST = '127.0.0.1';

// Telnet protocol bytes
const IAC = 255;
const DONT = 254;
const DO = 253;
const WONT = 252;
const WILL = 251;
const SB = 250;
const SE = 240;
const OPT_ECHO = 1;
const OPT_SGA = 3;

type DecoderState = 'data' | 'iac' | 'option' | 'sb' | 'sb-iac';

/**
 * Strips telnet negotiation from the byte stream and produces the replies the
 * server expects. Only echo and suppress-go-ahead are accepted.
 */
export class TelnetDecoder {
  private state: DecoderState = 'data';
  private command = 0;
  private readonly text = new StringDecoder('utf8');

  push(chunk: Buffer): { text: string; replies: Buffer[] } {
    const data: number[] = [];
    const replies: Buffer[] = [];

    for (const byte of chunk) {
      switch (this.state) {
        case 'data':
          if (byte === IAC) {
            this.state = 'iac';
          } else {
            data.push(byte);
          }
          break;
        case 'iac':
          if (byte === IAC) {
            data.push(IAC);
            this.state = 'data';
          } else if (byte === DO || byte === DONT || byte === WILL || byte === WONT) {
            this.command = byte;
            this.state = 'option';
          } else if (byte === SB) {
            this.state = 'sb';
          } else {
            this.state = 'data';
          }
          break;
        case 'option':
          if (this.command === WILL) {
            const accepted = byte === OPT_ECHO || byte === OPT_SGA;
            replies.push(Buffer.from([IAC, accepted ? DO : DONT, byte]));
          } else if (this.command === DO) {
            replies.push(Buffer.from([IAC, WONT, byte]));
          }
          this.state = 'data';
          break;
        case 'sb':
          if (byte === IAC) {
            this.state = 'sb-iac';
          }
          break;
        case 'sb-iac':
          this.state = byte === SE ? 'data' : 'sb';
          break;
      }
    }

    return { text: this.text.write(Buffer.from(data)), replies };
  }
}

function findMatchEnd(buffer: string, pattern: RegExp | string | undefined): number {
  if (pattern === undefined) {
    return -1;
  }

  if (typeof pattern === 'string') {
    const index = buffer.indexOf(pattern);
    return index >= 0 ? index + pattern.length : -1;
  }

  const matcher = new RegExp(pattern.source, pattern.flags.replace('g', ''));
  const match = matcher.exec(buffer);
  return match ? match.index + match[0].length : -1;
}

export class TelnetConsoleSession implements ConsoleSession {
  private buffer = '';
  private closed = false;
  private readonly waiters = new Set<() => void>();
  private readonly decoder = new TelnetDecoder();

  constructor(
    private readonly socket: net.Socket,
    readonly endpoint: ConsoleEndpoint,
    private readonly newline: string = '\r'
  ) {
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', (error: Error) => {
      logger.debug(`Console ${endpoint.host}:${endpoint.port} socket error`, {
        error: error.message,
      });
    });
    socket.on('close', () => {
      this.closed = true;
      this.notify();
    });
  }

  private onData(chunk: Buffer): void {
    const { text, replies } = this.decoder.push(chunk);
    for (const reply of replies) {
      this.socket.write(reply);
    }
    if (text.length > 0) {
      this.buffer += text;
      this.notify();
    }
  }

  private notify(): void {
    for (const waiter of Array.from(this.waiters)) {
      waiter();
    }
  }

  private take(end: number = this.buffer.length): string {
    const output = this.buffer.slice(0, end);
    this.buffer = this.buffer.slice(end);
    return output;
  }

  sendLine(text: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(
        new Error(`Console ${this.endpoint.host}:${this.endpoint.port} is closed`)
      );
    }

    return new Promise((resolve, reject) => {
      this.socket.write(`${text}${this.newline}`, 'utf8', (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  readUntil({ pattern, timeoutMs }: ReadUntilOptions): Promise<ReadResult> {
    return new Promise((resolve) => {
      const finish = (result: ReadResult): void => {
        clearTimeout(timer);
        this.waiters.delete(check);
        resolve(result);
      };

      const check = (): void => {
        const end = findMatchEnd(this.buffer, pattern);
        if (end >= 0) {
          finish({ output: this.take(end), matched: true, timedOut: false, closed: false });
        } else if (this.closed) {
          finish({ output: this.take(), matched: false, timedOut: false, closed: true });
        }
      };

      const timer = setTimeout(() => {
        finish({ output: this.take(), matched: false, timedOut: true, closed: this.closed });
      }, timeoutMs);

      this.waiters.add(check);
      check();
    });
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => this.socket.destroy(), CLOSE_GRACE_MS);
      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      // Leave the console at a fresh prompt for the next operator
      this.socket.end(`exit${this.newline}`);
    });
  }

  abort(): void {
    this.closed = true;
    this.socket.destroy();
    this.notify();
  }
}

/**
 * Opens a console over TCP. Rejects with ConnectError when the endpoint refuses
 * or does not answer within the connect timeout.
 */
export function openConsole(
  endpoint: ConsoleEndpoint,
  { connectTimeoutMs, newline = '\r' }: ConnectOptions
): Promise<ConsoleSession> {
  const { host, port } = endpoint;
  logger.debug(`Opening console ${host}:${port}`);

  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const onError = (error: Error): void => {
      clearTimeout(timer);
      socket.destroy();
      reject(new ConnectError(host, port, error.message, { cause: error }));
    };

    const timer = setTimeout(() => {
      socket.removeListener('error', onError);
      socket.destroy();
      reject(new ConnectError(host, port, `no connection within ${connectTimeoutMs}ms`));
    }, connectTimeoutMs);

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      socket.setNoDelay(true);
      resolve(new TelnetConsoleSession(socket, endpoint, newline));
    });
  });
}

function stripSentinelLines(output: string, token: string): string {
  return output
    .replace(/\r/g, '')
    .split('\n')
    .filter((line) => !line.includes(token))
    .join('\n')
    .trim();
}

/**
 * Runs one shell command and reads until its exit-status marker. The echoed
 * command line contains `$rc`, never digits, so only the real marker matches.
 */
export async function runCommand(
  session: ConsoleSession,
  command: string,
  { timeoutMs }: { timeoutMs: number }
): Promise<CommandOutcome> {
  const startedAt = Date.now();
  const token = `__END__${randomUUID().replace(/-/g, '')}__`;
  const marker = new RegExp(`${token} (\\d+)`);

  await session.sendLine(`${command}; rc=$?; echo ${token} $rc`);
  const result = await session.readUntil({ pattern: marker, timeoutMs });

  const exitMatch = marker.exec(result.output);
  return {
    command,
    output: stripSentinelLines(result.output, token),
    exitCode: exitMatch ? parseInt(exitMatch[1], 10) : null,
    timedOut: result.timedOut,
    elapsedMs: Date.now() - startedAt,
  };
}

export function toCommandResult(nodeName: string, outcome: CommandOutcome): CommandResult {
  return Object.freeze({
    nodeName,
    command: outcome.command,
    capturedOutput: outcome.output,
    succeeded: outcome.exitCode === 0 && !outcome.timedOut,
    exitCode: outcome.exitCode,
    timedOut: outcome.timedOut,
    elapsedMs: outcome.elapsedMs,
  });
}

/**
 * Reduces a stored console host to a bare host name or address.
 * Accepts URLs, `host:port` and bracketed IPv6; wildcard binds count as absent.
 */
export function normalizeConsoleHost(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  let host = value.trim();
  if (host.includes('//')) {
    host = host.slice(host.indexOf('//') + 2);
  }
  host = host.split('/')[0];
  host = host.slice(host.lastIndexOf('@') + 1);

  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    host = end > 0 ? host.slice(1, end) : host.slice(1);
  } else if (host.split(':').length === 2) {
    host = host.split(':')[0];
  }

  host = host.trim();
  return WILDCARD_HOSTS.has(host) ? null : host;
}

/**
 * Override first, then the stored host, then loopback. A node without a
 * console port has no endpoint.
 */
export function resolveConsoleEndpoint(
  node: Pick<FleetNode, 'consoleHost' | 'consolePort'>,
  hostOverride: string | null = null
): ConsoleEndpoint | null {
  if (node.consolePort === null) {
    return null;
  }

  for (const candidate of [hostOverride, node.consoleHost, DEFAULT_CONSOLE_HOST]) {
    const host = normalizeConsoleHost(candidate);
    if (host) {
      return { host, port: node.consolePort };
    }
  }

  return null;
}
