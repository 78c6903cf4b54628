import { composeFirewallRules, DEFAULT_FIREWALL_PARAMS } from '../firewallRules';
import { FirewallRuleError } from '../errors';

describe('composeFirewallRules', () => {
  const { nodeIp, commands } = composeFirewallRules('10.0.0.5');

  it('targets the static address', () => {
    expect(nodeIp).toBe('10.0.0.5');
  });

  it('enables forwarding first', () => {
    expect(commands[0]).toBe('sysctl -w net.ipv4.ip_forward=1');
  });

  it('allows exactly one ICMP echo-request to the node', () => {
    const icmp = commands.filter((command) => command.includes('-p icmp'));
    expect(icmp).toEqual(['iptables -A INPUT -d 10.0.0.5 -p icmp --icmp-type echo-request -j ACCEPT']);
  });

  it('allows the DHCP pair on INPUT and FORWARD', () => {
    const dhcp = commands.filter((command) => command.includes('--sport 67:68 --dport 67:68'));
    expect(dhcp).toEqual([
      'iptables -A INPUT -p udp --sport 67:68 --dport 67:68 -j ACCEPT',
      'iptables -A FORWARD -p udp --sport 67:68 --dport 67:68 -j ACCEPT',
    ]);
  });

  it('bounds SYN rates with the default hitcount', () => {
    expect(commands).toContain(
      'iptables -A SCAN_GUARD -m recent --name synscan --update --seconds 1 --hitcount 15 -j DROP'
    );
    expect(commands).toContain(
      'iptables -A INPUT -d 10.0.0.5 -p tcp --syn -m conntrack --ctstate NEW -j SCAN_GUARD'
    );
    expect(commands).toContain(
      'iptables -A FORWARD -p tcp --syn -m conntrack --ctstate NEW -j SCAN_GUARD'
    );
  });

  it('applies a milder UDP limit', () => {
    expect(commands).toContain(
      'iptables -A INPUT -p udp -m recent --name udpflood --update --seconds 1 --hitcount 20 -j DROP'
    );
  });

  it('never sets a default policy or drops unconditionally', () => {
    expect(commands.some((command) => / -P /.test(command))).toBe(false);
    expect(commands).not.toContain('iptables -A INPUT -j DROP');
    expect(commands).not.toContain('iptables -A FORWARD -j DROP');
  });

  it('creates the guard chain before using it', () => {
    const create = commands.indexOf('iptables -N SCAN_GUARD 2>/dev/null || true');
    const firstJump = commands.findIndex((command) => command.endsWith('-j SCAN_GUARD'));
    expect(create).toBeGreaterThan(-1);
    expect(create).toBeLessThan(firstJump);
  });

  it('honours custom parameters', () => {
    const custom = composeFirewallRules('192.168.1.1', {
      synHitcount: 18,
      synWindowSeconds: 2,
      enableForwarding: false,
    });

    expect(custom.commands[0]).toBe('iptables -F INPUT');
    expect(custom.commands).toContain(
      'iptables -A SCAN_GUARD -m recent --name synscan --update --seconds 2 --hitcount 18 -j DROP'
    );
  });

  it('exposes its defaults', () => {
    expect(DEFAULT_FIREWALL_PARAMS).toEqual({
      synHitcount: 15,
      synWindowSeconds: 1,
      udpHitcount: 20,
      udpWindowSeconds: 1,
      enableForwarding: true,
    });
  });

  it.each(['10.0.0', '300.0.0.1', 'fe80::1'])('rejects static address %s', (ip) => {
    expect(() => composeFirewallRules(ip)).toThrow(FirewallRuleError);
  });

  it('rejects non-positive hitcounts', () => {
    expect(() => composeFirewallRules('10.0.0.5', { synHitcount: 0 })).toThrow(
      'synHitcount must be a positive integer, got 0'
    );
    expect(() => composeFirewallRules('10.0.0.5', { udpWindowSeconds: 1.5 })).toThrow(
      FirewallRuleError
    );
  });

  it('rejects hitcounts the recent match cannot track', () => {
    expect(() => composeFirewallRules('10.0.0.5', { udpHitcount: 60 })).toThrow(
      'udpHitcount must not exceed 20, got 60'
    );
    expect(() => composeFirewallRules('10.0.0.5', { synHitcount: 21 })).toThrow(FirewallRuleError);
    expect(composeFirewallRules('10.0.0.5', { synHitcount: 20 }).commands).toContain(
      'iptables -A SCAN_GUARD -m recent --name synscan --update --seconds 1 --hitcount 20 -j DROP'
    );
  });
});
