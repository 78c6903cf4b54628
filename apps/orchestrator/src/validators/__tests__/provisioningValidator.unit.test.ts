import { provisionRequestSchema } from '../provisioningValidator';

describe('provisionRequestSchema', () => {
  it('accepts an empty request', () => {
    const result = provisionRequestSchema.safeParse({});
    expect(result.success).toBe(true);
  });

  it('accepts a fully specified request', () => {
    const result = provisionRequestSchema.safeParse({
      hostOverride: ' lab-host ',
      only: ['Workstation-1', 'Firewall-1'],
      interfaces: ['eth0', 'ens3'],
      attemptTimeoutMs: 15000,
      nodeTimeoutMs: 60000,
      dhcpWarmupMs: 0,
      concurrency: 8,
      strategies: ['udhcpc', 'dhclient'],
      applyStatic: false,
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.hostOverride).toBe('lab-host');
      expect(result.data.strategies).toEqual(['udhcpc', 'dhclient']);
    }
  });

  it('rejects unknown strategies', () => {
    const result = provisionRequestSchema.safeParse({ strategies: ['pump'] });
    expect(result.success).toBe(false);
  });

  it('rejects interface names the kernel would not accept', () => {
    const result = provisionRequestSchema.safeParse({ interfaces: ['eth0; reboot'] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        'Interface name must be 1-15 characters of [A-Za-z0-9_.:-]'
      );
    }
  });

  it('rejects concurrency out of range', () => {
    const zero = provisionRequestSchema.safeParse({ concurrency: 0 });
    const huge = provisionRequestSchema.safeParse({ concurrency: 65 });

    expect(zero.success).toBe(false);
    expect(huge.success).toBe(false);
    if (!zero.success) {
      expect(zero.error.issues[0].message).toBe('concurrency must be at least 1');
    }
  });

  it('rejects non-integer timeouts', () => {
    const result = provisionRequestSchema.safeParse({ nodeTimeoutMs: 1.5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('nodeTimeoutMs must be an integer');
    }
  });

  it('rejects unknown fields', () => {
    const result = provisionRequestSchema.safeParse({ nodes: ['Workstation-1'] });
    expect(result.success).toBe(false);
  });
});
