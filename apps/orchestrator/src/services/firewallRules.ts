import type { FirewallRuleSet } from '@labfleet/protocol';
import { isValidIPv4 } from './dhcpStrategies';
import { FirewallRuleError } from './errors';

export interface FirewallParams {
  synHitcount: number;
  synWindowSeconds: number;
  udpHitcount: number;
  udpWindowSeconds: number;
  enableForwarding: boolean;
}

export const DEFAULT_FIREWALL_PARAMS: Readonly<FirewallParams> = Object.freeze({
  synHitcount: 15,
  synWindowSeconds: 1,
  udpHitcount: 20,
  udpWindowSeconds: 1,
  enableForwarding: true,
});

const SCAN_GUARD = 'SCAN_GUARD';

// xt_recent keeps this many packets per address (ip_pkt_list_tot) and rejects a larger --hitcount
export const MAX_RECENT_HITCOUNT = 20;

function assertPositiveInteger(name: keyof FirewallParams, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new FirewallRuleError(`${name} must be a positive integer, got ${value}`);
  }
}

function assertHitcount(name: 'synHitcount' | 'udpHitcount', value: number): void {
  assertPositiveInteger(name, value);
  if (value > MAX_RECENT_HITCOUNT) {
    throw new FirewallRuleError(`${name} must not exceed ${MAX_RECENT_HITCOUNT}, got ${value}`);
  }
}

/**
 * Composes the iptables posture for a firewall node that owns `staticIp`.
 * Pure; the caller runs the commands in order. The ruleset never sets a
 * default policy.
 */
export function composeFirewallRules(
  staticIp: string,
  params: Partial<FirewallParams> = {}
): FirewallRuleSet {
  const { synHitcount, synWindowSeconds, udpHitcount, udpWindowSeconds, enableForwarding } = {
    ...DEFAULT_FIREWALL_PARAMS,
    ...params,
  };

  if (!isValidIPv4(staticIp)) {
    throw new FirewallRuleError(`Firewall address '${staticIp}' is not a valid IPv4 address`);
  }
  assertHitcount('synHitcount', synHitcount);
  assertPositiveInteger('synWindowSeconds', synWindowSeconds);
  assertHitcount('udpHitcount', udpHitcount);
  assertPositiveInteger('udpWindowSeconds', udpWindowSeconds);

  const commands: string[] = [];

  if (enableForwarding) {
    commands.push('sysctl -w net.ipv4.ip_forward=1');
  }

  commands.push(
    'iptables -F INPUT',
    'iptables -F FORWARD',
    `iptables -N ${SCAN_GUARD} 2>/dev/null || true`,
    `iptables -F ${SCAN_GUARD}`,

    'iptables -A INPUT -i lo -j ACCEPT',
    'iptables -A INPUT -m conntrack --ctstate ESTABLISHED,RELATED -j ACCEPT',
    'iptables -A FORWARD -m conntrack --ctstate ESTABLISHED,RELATED -j ACCEPT',

    `iptables -A INPUT -d ${staticIp} -p icmp --icmp-type echo-request -j ACCEPT`,

    'iptables -A INPUT -p udp --sport 67:68 --dport 67:68 -j ACCEPT',
    'iptables -A FORWARD -p udp --sport 67:68 --dport 67:68 -j ACCEPT',

    `iptables -A ${SCAN_GUARD} -m recent --name synscan --update --seconds ${synWindowSeconds} --hitcount ${synHitcount} -j DROP`,
    `iptables -A ${SCAN_GUARD} -m recent --name synscan --set -j RETURN`,
    `iptables -A INPUT -d ${staticIp} -p tcp --syn -m conntrack --ctstate NEW -j ${SCAN_GUARD}`,
    `iptables -A FORWARD -p tcp --syn -m conntrack --ctstate NEW -j ${SCAN_GUARD}`,

    `iptables -A INPUT -p udp -m recent --name udpflood --update --seconds ${udpWindowSeconds} --hitcount ${udpHitcount} -j DROP`,
    'iptables -A INPUT -p udp -m recent --name udpflood --set'
  );

  return { nodeIp: staticIp, commands };
}
