import { promises as fs } from 'fs';
import { isIP } from 'node:net';
import { staticPlanFileSchema, type StaticPlanEntry } from '@labfleet/protocol';
import { logger } from '../utils/logger';
import { formatZodIssues } from '../utils/formatIssues';
import { ConfigParseError, hasErrorCode } from './errors';

const DEFAULT_PREFIX_LENGTH = 24;

type PlanFileSystem = Pick<typeof fs, 'readFile'>;

/**
 * Operator-authored fallback addressing, keyed by (node, interface).
 * Read-only once loaded; node names match case-insensitively.
 */
export class StaticPlan {
  private readonly byNode = new Map<string, StaticPlanEntry[]>();

  constructor(entries: StaticPlanEntry[]) {
    for (const entry of entries) {
      const key = entry.nodeName.toLowerCase();
      const existing = this.byNode.get(key) ?? [];
      existing.push(Object.freeze({ ...entry }));
      this.byNode.set(key, existing);
    }
  }

  static empty(): StaticPlan {
    return new StaticPlan([]);
  }

  get size(): number {
    let count = 0;
    for (const entries of this.byNode.values()) {
      count += entries.length;
    }
    return count;
  }

  lookup(nodeName: string, interfaceName: string): StaticPlanEntry | null {
    const entries = this.byNode.get(nodeName.toLowerCase()) ?? [];
    return entries.find((entry) => entry.interfaceName === interfaceName) ?? null;
  }

  interfacesFor(nodeName: string): string[] {
    return (this.byNode.get(nodeName.toLowerCase()) ?? []).map((entry) => entry.interfaceName);
  }
}

function splitAddress(value: string): { ip: string; prefix: number | null } {
  const slash = value.indexOf('/');
  if (slash < 0) {
    return { ip: value, prefix: null };
  }
  const prefix = value.slice(slash + 1);
  return {
    ip: value.slice(0, slash),
    prefix: /^[0-9]{1,3}$/.test(prefix) ? parseInt(prefix, 10) : -1,
  };
}

export function parseStaticPlan(raw: unknown, source: string): StaticPlan {
  const parsed = staticPlanFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigParseError(source, formatZodIssues(parsed.error));
  }

  const entries: StaticPlanEntry[] = [];
  const issues: string[] = [];

  for (const [nodeName, interfaces] of Object.entries(parsed.data.interfaces)) {
    interfaces.forEach((record, index) => {
      const { ip, prefix } = splitAddress(record.ip);
      const prefixLength = record.prefix_length ?? prefix ?? DEFAULT_PREFIX_LENGTH;
      const at = `"interfaces.${nodeName}.${index}"`;

      if (isIP(ip) === 0) {
        issues.push(`${at} static ip '${record.ip}' is not a valid address`);
        return;
      }
      if (prefixLength < 0 || prefixLength > (isIP(ip) === 4 ? 32 : 128)) {
        issues.push(`${at} prefix length out of range for '${record.ip}'`);
        return;
      }

      entries.push({
        nodeName,
        interfaceName: record.ifname,
        ip,
        prefixLength,
        gateway: record.gw ?? record.gateway ?? null,
      });
    });
  }

  if (issues.length > 0) {
    throw new ConfigParseError(source, issues);
  }

  return new StaticPlan(entries);
}

/**
 * Loads the static plan. A missing file is an empty plan: absence only
 * matters when a node actually needs a fallback.
 */
export async function loadStaticPlan(
  path: string,
  fileSystem: PlanFileSystem = fs
): Promise<StaticPlan> {
  let text: string;
  try {
    text = await fileSystem.readFile(path, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      logger.warn(`Static plan ${path} not found; continuing without fallbacks`);
      return StaticPlan.empty();
    }
    throw new ConfigParseError(path, [error instanceof Error ? error.message : String(error)], {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigParseError(path, [error instanceof Error ? error.message : String(error)], {
      cause: error,
    });
  }

  const plan = parseStaticPlan(raw, path);
  logger.info(`Loaded static plan ${path} with ${plan.size} entries`);
  return plan;
}
