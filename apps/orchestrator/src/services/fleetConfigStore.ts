import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { isIP } from 'node:net';
import {
  fleetConfigFileSchema,
  type FleetConfig,
  type FleetConfigFile,
  type FleetNode,
  type FleetNodeRecord,
} from '@labfleet/protocol';
import { logger } from '../utils/logger';
import { formatZodIssues } from '../utils/formatIssues';
import {
  ConfigNotFoundError,
  ConfigParseError,
  InvalidNodeError,
  NodeNotFoundError,
  PersistenceError,
  hasErrorCode,
} from './errors';

/**
 * Fleet Config Store
 * Owns the fleet config file. Every mutation and every save goes through a
 * single promise queue, so at most one writer touches the file at a time.
 */

export type StoreFileSystem = Pick<
  typeof fs,
  'readFile' | 'writeFile' | 'rename' | 'copyFile' | 'unlink'
>;

export interface SaveResult {
  path: string;
  backupPath: string | null;
}

export interface NodeUpdate {
  node: FleetNode;
  changed: boolean;
}

const NODE_KEYS = new Set([
  'name',
  'console_host',
  'console_port',
  'assigned_ip',
  'gateway',
  'node_id',
]);
const CONFIG_KEYS = new Set(['project_name', 'project_id', 'nodes']);

function pickExtras(record: Record<string, unknown>, known: Set<string>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([key]) => !known.has(key)));
}

function toFleetNode(record: FleetNodeRecord): FleetNode {
  const node: FleetNode = {
    name: record.name,
    consoleHost: record.console_host ?? null,
    consolePort: record.console_port ?? record.console ?? null,
    assignedIp: record.assigned_ip ?? null,
    gateway: record.gateway ?? null,
    // The legacy `console` key is kept as an extra and written back untouched.
    extras: pickExtras(record, NODE_KEYS),
  };
  if (record.node_id !== undefined) {
    node.nodeId = record.node_id;
  }
  return node;
}

function toNodeRecord(node: FleetNode): Record<string, unknown> {
  const record: Record<string, unknown> = { name: node.name };
  if (node.nodeId !== undefined) {
    record.node_id = node.nodeId;
  }
  if (node.consoleHost !== null) {
    record.console_host = node.consoleHost;
  }
  if (node.consolePort !== null && node.extras.console !== node.consolePort) {
    record.console_port = node.consolePort;
  }
  record.assigned_ip = node.assignedIp;
  record.gateway = node.gateway;
  return { ...record, ...node.extras };
}

export function parseFleetConfig(raw: unknown, source: string): FleetConfig {
  const parsed = fleetConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigParseError(source, formatZodIssues(parsed.error));
  }

  const file: FleetConfigFile = parsed.data;
  const config: FleetConfig = {
    nodes: file.nodes.map(toFleetNode),
    extras: pickExtras(file, CONFIG_KEYS),
  };
  if (file.project_name !== undefined) {
    config.projectName = file.project_name;
  }
  if (file.project_id !== undefined) {
    config.projectId = file.project_id;
  }
  return config;
}

/**
 * Four-space JSON with a trailing newline; node order is preserved.
 */
export function serializeFleetConfig(config: FleetConfig): string {
  const document: Record<string, unknown> = {};
  if (config.projectName !== undefined) {
    document.project_name = config.projectName;
  }
  if (config.projectId !== undefined) {
    document.project_id = config.projectId;
  }
  Object.assign(document, config.extras);
  document.nodes = config.nodes.map(toNodeRecord);

  return `${JSON.stringify(document, null, 4)}\n`;
}

export function backupPathFor(configPath: string): string {
  const { dir, name } = path.parse(configPath);
  return path.join(dir, `${name}.backup.json`);
}

async function readConfigFile(configPath: string, fileSystem: StoreFileSystem): Promise<FleetConfig> {
  let text: string;
  try {
    text = await fileSystem.readFile(configPath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new ConfigNotFoundError(configPath);
    }
    throw new PersistenceError(`Unable to read ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigParseError(
      configPath,
      [error instanceof Error ? error.message : String(error)],
      { cause: error }
    );
  }

  return parseFleetConfig(raw, configPath);
}

function validateNode(node: FleetNode, expectedName: string): void {
  if (node.name !== expectedName) {
    throw new InvalidNodeError(expectedName, `cannot be renamed to '${node.name}'`);
  }
  for (const [field, value] of [
    ['assignedIp', node.assignedIp],
    ['gateway', node.gateway],
  ] as const) {
    if (value !== null && isIP(value) === 0) {
      throw new InvalidNodeError(node.name, `${field} '${value}' is not an IP address`);
    }
  }
  if (
    node.consolePort !== null &&
    (!Number.isInteger(node.consolePort) || node.consolePort < 1 || node.consolePort > 65_535)
  ) {
    throw new InvalidNodeError(node.name, `console port ${node.consolePort} is out of range`);
  }
}

export class FleetConfigStore {
  private state: FleetConfig;
  private queue: Promise<void> = Promise.resolve();
  private dirty = false;

  private constructor(
    readonly path: string,
    initial: FleetConfig,
    private readonly fileSystem: StoreFileSystem
  ) {
    this.state = initial;
  }

  static async open(configPath: string, fileSystem: StoreFileSystem = fs): Promise<FleetConfigStore> {
    const initial = await readConfigFile(configPath, fileSystem);
    logger.info(`Loaded fleet config ${configPath} with ${initial.nodes.length} nodes`);
    return new FleetConfigStore(configPath, initial, fileSystem);
  }

  get backupPath(): string {
    return backupPathFor(this.path);
  }

  /** True when in-memory state differs from what was last loaded or saved. */
  get isDirty(): boolean {
    return this.dirty;
  }

  snapshot(): FleetConfig {
    return structuredClone(this.state);
  }

  findNode(name: string): FleetNode | null {
    const node = this.state.nodes.find((candidate) => candidate.name === name);
    return node ? structuredClone(node) : null;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Re-reads the file, discarding unsaved changes.
   */
  load(): Promise<FleetConfig> {
    return this.enqueue(async () => {
      this.state = await readConfigFile(this.path, this.fileSystem);
      this.dirty = false;
      return structuredClone(this.state);
    });
  }

  /**
   * The only way a node changes. The mutator edits a draft; the draft is
   * validated before it replaces the stored node.
   */
  updateNode(name: string, mutator: (draft: FleetNode) => void): Promise<NodeUpdate> {
    return this.enqueue(async () => {
      const index = this.state.nodes.findIndex((node) => node.name === name);
      if (index < 0) {
        throw new NodeNotFoundError(name);
      }

      const current = this.state.nodes[index];
      const draft = structuredClone(current);
      mutator(draft);
      validateNode(draft, name);

      const changed = JSON.stringify(draft) !== JSON.stringify(current);
      if (changed) {
        this.state.nodes[index] = draft;
        this.dirty = true;
        logger.debug(`Updated node ${name}`, {
          assignedIp: draft.assignedIp,
          gateway: draft.gateway,
        });
      }

      return { node: structuredClone(draft), changed };
    });
  }

  /**
   * Backs the current file up, then replaces it atomically (temp file plus
   * rename in the same directory). On failure the prior file and the
   * in-memory state are left as they were.
   */
  save(): Promise<SaveResult> {
    return this.enqueue(async () => {
      const content = serializeFleetConfig(this.state);
      const backupPath = await this.writeBackup();
      const tempPath = path.join(
        path.dirname(this.path),
        `.${path.basename(this.path)}.${randomUUID()}.tmp`
      );

      try {
        await this.fileSystem.writeFile(tempPath, content, 'utf8');
        await this.fileSystem.rename(tempPath, this.path);
      } catch (error) {
        await this.fileSystem.unlink(tempPath).catch((cleanupError: unknown) => {
          if (!hasErrorCode(cleanupError, 'ENOENT')) {
            logger.warn(`Unable to remove temp file ${tempPath}`, {
              error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
            });
          }
        });
        throw new PersistenceError(`Unable to write ${this.path}`, { cause: error });
      }

      this.dirty = false;
      logger.info(`Saved fleet config ${this.path}`, { backupPath });
      return { path: this.path, backupPath };
    });
  }

  private async writeBackup(): Promise<string | null> {
    try {
      await this.fileSystem.copyFile(this.path, this.backupPath);
      return this.backupPath;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw new PersistenceError(`Unable to back up ${this.path}`, { cause: error });
    }
  }
}
