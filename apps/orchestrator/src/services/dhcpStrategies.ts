/**
 * DHCP client strategies.
 * Each client prints its lease in its own format, so each strategy owns the
 * command that requests a lease and the matcher that scrapes it. Adding a
 * client means adding an entry here; the acquisition state machine never
 * changes.
 */

export interface Lease {
  ip: string;
  gateway: string | null;
  prefixLength: number | null;
}

export interface DhcpClientStrategy {
  readonly name: string;
  readonly binary: string;
  command(interfaceName: string): string;
  parseLease(output: string): Lease | null;
}

const IPV4_CANDIDATE = '([0-9]+(?:\\.[0-9]+){3})';

/**
 * Dotted quad with every octet in 0-255 and no zero padding.
 */
export function isValidIPv4(value: string): boolean {
  const octets = value.split('.');
  if (octets.length !== 4) {
    return false;
  }

  return octets.every((octet) => {
    if (!/^[0-9]{1,3}$/.test(octet)) {
      return false;
    }
    if (octet.length > 1 && octet.startsWith('0')) {
      return false;
    }
    return parseInt(octet, 10) <= 255;
  });
}

/**
 * A lease must name a usable unicast host address.
 */
export function isAssignableIPv4(value: string): boolean {
  if (!isValidIPv4(value)) {
    return false;
  }

  return !value.startsWith('127.') && value !== '0.0.0.0' && value !== '255.255.255.255';
}

export function isCommandNotFound(output: string, binary: string): boolean {
  return output
    .split(/\r?\n/)
    .some(
      (line) =>
        line.includes(binary) && /(command not found|not found|No such file or directory)/.test(line)
    );
}

function firstMarkedAddress(
  output: string,
  markers: string[],
  accept: (ip: string) => boolean
): string | null {
  for (const marker of markers) {
    const pattern = new RegExp(marker.replace('{ip}', IPV4_CANDIDATE), 'g');
    let match = pattern.exec(output);
    while (match) {
      if (accept(match[1])) {
        return match[1];
      }
      match = pattern.exec(output);
    }
  }

  return null;
}

function firstPrefixLength(output: string, marker: string): number | null {
  const match = new RegExp(marker).exec(output);
  if (!match) {
    return null;
  }

  const prefix = parseInt(match[1], 10);
  return prefix >= 0 && prefix <= 32 ? prefix : null;
}

export const dhclientStrategy: DhcpClientStrategy = {
  name: 'dhclient',
  binary: 'dhclient',
  command: (interfaceName) => `dhclient -v -1 ${interfaceName}`,
  parseLease(output) {
    const ip = firstMarkedAddress(
      output,
      ['bound to {ip}', 'DHCPACK of {ip}'],
      isAssignableIPv4
    );
    return ip ? { ip, gateway: null, prefixLength: null } : null;
  },
};

export const udhcpcStrategy: DhcpClientStrategy = {
  name: 'udhcpc',
  binary: 'udhcpc',
  command: (interfaceName) => `udhcpc -i ${interfaceName} -q -n -t 3`,
  parseLease(output) {
    const ip = firstMarkedAddress(output, ['lease of {ip} obtained'], isAssignableIPv4);
    if (!ip) {
      return null;
    }

    return {
      ip,
      gateway: firstMarkedAddress(
        output,
        ['adding router {ip}', 'route add default gw {ip}'],
        isValidIPv4
      ),
      prefixLength: null,
    };
  },
};

export const dhcpcdStrategy: DhcpClientStrategy = {
  name: 'dhcpcd',
  binary: 'dhcpcd',
  command: (interfaceName) => `dhcpcd -4 -t 10 ${interfaceName}`,
  parseLease(output) {
    const ip = firstMarkedAddress(output, ['leased {ip} for'], isAssignableIPv4);
    if (!ip) {
      return null;
    }

    return {
      ip,
      gateway: firstMarkedAddress(output, ['default route via {ip}'], isValidIPv4),
      prefixLength: firstPrefixLength(output, 'adding route to [0-9.]+/([0-9]+)'),
    };
  },
};

export const DHCP_STRATEGIES: Readonly<Record<string, DhcpClientStrategy>> = {
  dhclient: dhclientStrategy,
  udhcpc: udhcpcStrategy,
  dhcpcd: dhcpcdStrategy,
};

/**
 * Maps configured names to strategies, keeping their order.
 */
export function resolveStrategies(names: string[]): DhcpClientStrategy[] {
  return names.map((name) => {
    const key = name.trim().toLowerCase();
    const strategy = Object.prototype.hasOwnProperty.call(DHCP_STRATEGIES, key)
      ? DHCP_STRATEGIES[key]
      : undefined;
    if (!strategy) {
      throw new Error(
        `Unknown DHCP strategy '${name}'. Known strategies: ${Object.keys(DHCP_STRATEGIES).join(', ')}`
      );
    }
    return strategy;
  });
}

/**
 * Reads the default gateway from `ip route` output, preferring the route bound
 * to the given interface.
 */
export function parseDefaultGateway(output: string, interfaceName: string): string | null {
  const lines = output.split(/\r?\n/);
  const defaultVia = new RegExp(`default\\s+via\\s+${IPV4_CANDIDATE}`);

  const onInterface = lines.find(
    (line) => defaultVia.test(line) && new RegExp(`\\bdev\\s+${interfaceName}\\b`).test(line)
  );
  const candidate = onInterface ?? lines.find((line) => defaultVia.test(line));
  if (!candidate) {
    return null;
  }

  const match = defaultVia.exec(candidate);
  return match && isValidIPv4(match[1]) ? match[1] : null;
}
