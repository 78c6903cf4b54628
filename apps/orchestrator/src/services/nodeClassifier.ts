import type { NodeRole } from '@labfleet/protocol';

/**
 * Name patterns in priority order. A name can plausibly match more than one
 * (e.g. "dhcp-switch"), so the first matching group wins.
 */
const ROLE_PATTERNS: ReadonlyArray<{ role: NodeRole; keywords: readonly string[] }> = [
  { role: 'switch', keywords: ['switch', 'openvswitch', 'ovs'] },
  { role: 'dhcp-server', keywords: ['dhcp', 'dnsmasq'] },
  { role: 'firewall', keywords: ['firewall'] },
];

/**
 * Maps a node's declared name to the workflow role it gets.
 * Advisory only; nothing verifies that a "firewall" really is one.
 */
export function classifyNode(name: string): NodeRole {
  const lowered = name.toLowerCase();

  for (const { role, keywords } of ROLE_PATTERNS) {
    if (keywords.some((keyword) => lowered.includes(keyword))) {
      return role;
    }
  }

  return 'client';
}
