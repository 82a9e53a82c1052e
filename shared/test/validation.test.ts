import { cidrContains, cidrPrefix, ipToNumber, subnetCapacity, validateCidr } from '../lib/validation';

describe('validateCidr', () => {
  test.each(['10.0.0.0/16', '172.16.0.0/12', '192.168.1.0/24', '0.0.0.0/0', '203.0.113.7/32'])(
    'accepts %s',
    (cidr) => {
      expect(validateCidr(cidr)).toEqual({ valid: true });
    }
  );

  test('rejects malformed blocks', () => {
    expect(validateCidr('10.0.0/16')).toEqual({
      valid: false,
      error: 'Invalid CIDR format: 10.0.0/16. Expected format: x.x.x.x/y',
    });
  });

  test('rejects octets above 255', () => {
    expect(validateCidr('10.0.300.0/24').error).toBe('Invalid IP octet in CIDR: 10.0.300.0/24');
  });

  test('rejects prefixes above 32', () => {
    expect(validateCidr('10.0.0.0/33').error).toBe('Invalid prefix length in CIDR: 10.0.0.0/33. Must be 0-32');
  });

  test('rejects host bits', () => {
    expect(validateCidr('10.0.1.0/16').error).toBe('CIDR 10.0.1.0/16 has host bits set. Use the network address');
  });
});

describe('address arithmetic', () => {
  test('ipToNumber handles the high bit', () => {
    expect(ipToNumber('255.255.255.255')).toBe(4294967295);
    expect(ipToNumber('10.0.1.0')).toBe(167772416);
  });

  test('cidrPrefix', () => {
    expect(cidrPrefix('10.0.0.0/16')).toBe(16);
  });

  test('cidrContains', () => {
    expect(cidrContains('10.0.0.0/16', '10.0.5.0/24')).toBe(true);
    expect(cidrContains('10.0.0.0/16', '10.1.0.0/24')).toBe(false);
    expect(cidrContains('10.0.0.0/24', '10.0.0.0/16')).toBe(false);
    expect(cidrContains('0.0.0.0/0', '192.168.0.0/16')).toBe(true);
  });

  test('subnetCapacity', () => {
    expect(subnetCapacity('10.0.0.0/16', 24)).toBe(256);
    expect(subnetCapacity('10.0.0.0/24', 26)).toBe(4);
    expect(subnetCapacity('10.0.0.0/24', 16)).toBe(0);
  });
});
