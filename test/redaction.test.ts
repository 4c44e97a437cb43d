import { describe, expect, it } from 'vitest';
import { redactSensitive } from '../src/lib/redaction.js';

describe('redactSensitive', () => {
  it('redacts credentials and contact details recursively', () => {
    const input = {
      headers: {
        authorization: 'Bearer test-token',
        'x-api-key': 'test-api-key',
        'x-actor-id': 'tech-1'
      },
      technician: {
        identity: { displayName: 'Field Tech', email: 'tech@example.test' },
        contactPhone: '555-0100'
      },
      breaks: [{ damageType: 'chip', homeAddress: '1 Test Way' }, { damageType: 'crack' }]
    };

    const output = redactSensitive(input);

    expect(output.headers.authorization).toBe('[REDACTED]');
    expect(output.headers['x-api-key']).toBe('[REDACTED]');
    expect(output.headers['x-actor-id']).toBe('tech-1');
    expect(output.technician.identity.email).toBe('[REDACTED]');
    expect(output.technician.identity.displayName).toBe('Field Tech');
    expect(output.technician.contactPhone).toBe('[REDACTED]');
    expect(output.breaks[0].homeAddress).toBe('[REDACTED]');
    expect(output.breaks[1].damageType).toBe('crack');
  });

  it('does not mutate the original object', () => {
    const input = {
      password: 'test-secret',
      repair: { unitNumber: 'TRUCK-7' }
    };

    const output = redactSensitive(input);

    expect(output.password).toBe('[REDACTED]');
    expect(input.password).toBe('test-secret');
    expect(output.repair.unitNumber).toBe('TRUCK-7');
  });

  it('replaces circular references instead of recursing forever', () => {
    const node: { name: string; self?: unknown } = { name: 'unit' };
    node.self = node;

    const output = redactSensitive(node);

    expect(output.name).toBe('unit');
    expect(output.self).toBe('[REDACTED]');
  });
});
