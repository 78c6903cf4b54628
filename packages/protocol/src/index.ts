import { isIP } from 'node:net';
import { z } from 'zod';

// --- Shared types ---

export type NodeRole = 'dhcp-server' | 'switch' | 'firewall' | 'client';

/**
 * A lab node as held in memory. `role` is never stored; it is derived from the
 * name by the classifier whenever a workflow needs it.
 */
export interface FleetNode {
  name: string;
  consoleHost: string | null;
  consolePort: number | null;
  assignedIp: string | null;
  gateway: string | null;
  nodeId?: string;
  /** Keys found in the file that this project does not interpret. */
  extras: Record<string, unknown>;
}

export interface FleetConfig {
  projectName?: string;
  projectId?: string;
  nodes: FleetNode[];
  extras: Record<string, unknown>;
}

export interface StaticPlanEntry {
  nodeName: string;
  interfaceName: string;
  ip: string;
  prefixLength: number;
  gateway: string | null;
}

export interface CommandResult {
  nodeName: string;
  command: string;
  capturedOutput: string;
  succeeded: boolean;
  exitCode: number | null;
  timedOut: boolean;
  elapsedMs: number;
}

export interface FirewallRuleSet {
  nodeIp: string;
  commands: string[];
}

export interface ScriptJob {
  nodeName: string;
  /** Script content, already loaded from wherever it came from. */
  source: string;
  remotePath: string;
  runAfterUpload: boolean;
  executable: boolean;
  overwrite: boolean;
  timeoutMs: number;
  shell: string;
}

export interface ScriptRunJob {
  nodeName: string;
  remotePath: string;
  shell: string;
  timeoutMs: number;
}

// --- Reports ---

export type NodeStatus = 'resolved' | 'fallback' | 'failed' | 'timeout' | 'skipped' | 'started';

export type NodeAction = 'dhcp-server-start' | 'address-acquisition' | 'firewall' | 'none';

export type AddressSource = 'lease' | 'static-plan';

export type FleetErrorKind =
  | 'connect'
  | 'timeout'
  | 'not-found'
  | 'parse'
  | 'static-plan-miss'
  | 'persistence'
  | 'node-not-found'
  | 'firewall'
  | 'script-path'
  | 'validation'
  | 'command'
  | 'unknown';

export interface ReportedError {
  kind: FleetErrorKind;
  message: string;
}

export interface InterfaceOutcome {
  interfaceName: string;
  status: 'resolved' | 'fallback' | 'failed';
  ip: string | null;
  prefixLength: number | null;
  gateway: string | null;
  strategy: string | null;
}

export interface NodeReport {
  nodeName: string;
  role: NodeRole;
  action: NodeAction;
  status: NodeStatus;
  assignedIp: string | null;
  gateway: string | null;
  addressSource: AddressSource | null;
  interfaces: InterfaceOutcome[];
  commands: CommandResult[];
  error: ReportedError | null;
  elapsedMs: number;
}

export interface ProvisionReport {
  startedAt: string;
  completedAt: string;
  changed: boolean;
  backupPath: string | null;
  /** Set when merged results could not be written; `changed` still reflects memory. */
  persistenceError: ReportedError | null;
  nodes: NodeReport[];
}

export type ScriptStatus = 'succeeded' | 'failed' | 'timeout' | 'skipped';

export type UploadOutcome = 'uploaded' | 'skipped' | 'failed' | 'not-requested';

export interface ScriptReport {
  nodeName: string;
  remotePath: string;
  status: ScriptStatus;
  upload: UploadOutcome;
  skipReason: string | null;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error: ReportedError | null;
  elapsedMs: number;
}

// --- Error shape ---

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    statusCode: number;
    timestamp: string;
    path: string;
  };
}

// --- Zod schemas ---

export const ipAddressSchema = z.string().refine((value) => isIP(value) !== 0, {
  message: 'must be a valid IPv4 or IPv6 address',
});

const consolePortSchema = z
  .number()
  .int('console port must be an integer')
  .min(1, 'console port must be between 1 and 65535')
  .max(65_535, 'console port must be between 1 and 65535');

/**
 * One node record as written in the fleet config file. Unknown keys pass
 * through so platform metadata survives a rewrite.
 */
export const fleetNodeRecordSchema = z
  .object({
    name: z.string().trim().min(1, 'node name must not be empty'),
    console_host: z.string().nullable().optional(),
    console_port: consolePortSchema.nullable().optional(),
    console: consolePortSchema.nullable().optional(),
    assigned_ip: ipAddressSchema.nullable().optional(),
    gateway: ipAddressSchema.nullable().optional(),
    node_id: z.string().optional(),
  })
  .passthrough();

export type FleetNodeRecord = z.infer<typeof fleetNodeRecordSchema>;

export const fleetConfigFileSchema = z
  .object({
    project_name: z.string().optional(),
    project_id: z.string().optional(),
    nodes: z.array(fleetNodeRecordSchema),
  })
  .passthrough()
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.nodes.forEach((node, index) => {
      if (seen.has(node.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes', index, 'name'],
          message: `duplicate node name '${node.name}'`,
        });
      }
      seen.add(node.name);
    });
  });

export type FleetConfigFile = z.infer<typeof fleetConfigFileSchema>;

export const staticPlanInterfaceSchema = z
  .object({
    ifname: z.string().trim().min(1).default('eth0'),
    ip: z.string().trim().min(1, 'static ip must not be empty'),
    prefix_length: z.number().int().min(0).max(128).optional(),
    gw: ipAddressSchema.nullable().optional(),
    gateway: ipAddressSchema.nullable().optional(),
  })
  .passthrough();

export const staticPlanFileSchema = z
  .object({
    interfaces: z.record(z.string(), z.array(staticPlanInterfaceSchema)).default({}),
  })
  .passthrough();

export type StaticPlanFile = z.infer<typeof staticPlanFileSchema>;
