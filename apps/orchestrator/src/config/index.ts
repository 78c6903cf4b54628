import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config({
  quiet: process.env.NODE_ENV === 'test' || process.env.DOTENV_CONFIG_QUIET === 'true',
});

export type PersistMode = 'end-of-run' | 'incremental';

export function getEnvNumber(key: string, defaultValue: number): number {
  const rawValue = process.env[key];
  const parsedValue = rawValue ? parseInt(rawValue, 10) : defaultValue;
  return Number.isNaN(parsedValue) ? defaultValue : parsedValue;
}

export function getEnvList(key: string, defaultValue: string[]): string[] {
  const parsed = process.env[key]
    ?.split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return parsed && parsed.length > 0 ? parsed : defaultValue;
}

function getPersistMode(): PersistMode {
  return process.env.PERSIST_MODE === 'incremental' ? 'incremental' : 'end-of-run';
}

/**
 * Console newlines are written in .env files as escape sequences.
 */
function getConsoleNewline(): string {
  const raw = process.env.CONSOLE_NEWLINE;
  if (!raw) {
    return '\r';
  }

  return raw.replace(/\\r/g, '\r').replace(/\\n/g, '\n');
}

export const config = {
  server: {
    port: getEnvNumber('PORT', 8090),
    host: process.env.HOST || '0.0.0.0',
    env: process.env.NODE_ENV || 'development',
  },
  fleet: {
    configPath: process.env.FLEET_CONFIG_PATH || './config/config.generated.json',
    staticPlanPath: process.env.STATIC_PLAN_PATH || './config/ip_plan.json',
    scriptsDir: process.env.SCRIPTS_DIR || './scripts',
  },
  console: {
    // Applied to every node of a run; useful when the stored host is a wildcard bind
    hostOverride: process.env.CONSOLE_HOST_OVERRIDE || null,
    connectTimeoutMs: getEnvNumber('CONSOLE_CONNECT_TIMEOUT_MS', 10_000),
    newline: getConsoleNewline(),
  },
  provisioning: {
    concurrency: getEnvNumber('PROVISION_CONCURRENCY', 5),
    attemptTimeoutMs: getEnvNumber('DHCP_ATTEMPT_TIMEOUT_MS', 15_000),
    nodeTimeoutMs: getEnvNumber('NODE_TIMEOUT_MS', 120_000),
    commandTimeoutMs: getEnvNumber('CONSOLE_COMMAND_TIMEOUT_MS', 5_000),
    dhcpWarmupMs: getEnvNumber('DHCP_WARMUP_MS', 2_000),
    strategies: getEnvList('DHCP_STRATEGIES', ['dhclient', 'udhcpc', 'dhcpcd']),
    dhcpServerStartCommand: process.env.DHCP_SERVER_START_COMMAND || '/usr/local/bin/start.sh',
    persistMode: getPersistMode(),
  },
  scripts: {
    concurrency: getEnvNumber('SCRIPT_CONCURRENCY', 5),
    timeoutMs: getEnvNumber('SCRIPT_TIMEOUT_MS', 10_000),
    uploadChunkSize: getEnvNumber('SCRIPT_UPLOAD_CHUNK_SIZE', 512),
  },
  firewall: {
    synHitcount: getEnvNumber('FIREWALL_SYN_HITCOUNT', 15),
    synWindowSeconds: getEnvNumber('FIREWALL_SYN_WINDOW_SECONDS', 1),
    udpHitcount: getEnvNumber('FIREWALL_UDP_HITCOUNT', 20),
    udpWindowSeconds: getEnvNumber('FIREWALL_UDP_WINDOW_SECONDS', 1),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    dir: process.env.LOG_DIR || 'logs',
  },
  auth: {
    apiKey: process.env.API_KEY,
  },
};
