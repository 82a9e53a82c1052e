/**
 * CIDR helpers for network configuration
 */

export interface ValidationResult {
  readonly valid: boolean;
  readonly error?: string;
}

const CIDR_PATTERN = /^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/;

/**
 * Validate an IPv4 CIDR block (format, octets, prefix, no host bits set)
 */
export function validateCidr(cidr: string): ValidationResult {
  if (!CIDR_PATTERN.test(cidr)) {
    return {
      valid: false,
      error: `Invalid CIDR format: ${cidr}. Expected format: x.x.x.x/y`,
    };
  }

  const [address, prefixText] = cidr.split('/');
  const octets = address.split('.').map(Number);
  if (octets.some((octet) => octet > 255)) {
    return { valid: false, error: `Invalid IP octet in CIDR: ${cidr}` };
  }

  const prefix = Number(prefixText);
  if (prefix > 32) {
    return {
      valid: false,
      error: `Invalid prefix length in CIDR: ${cidr}. Must be 0-32`,
    };
  }

  if ((ipToNumber(address) & ~prefixMask(prefix)) >>> 0 !== 0) {
    return {
      valid: false,
      error: `CIDR ${cidr} has host bits set. Use the network address`,
    };
  }

  return { valid: true };
}

/**
 * Prefix length of a CIDR block ('10.0.0.0/16' → 16)
 */
export function cidrPrefix(cidr: string): number {
  return Number(cidr.split('/')[1]);
}

/**
 * Convert a dotted IPv4 address to an unsigned 32-bit integer
 */
export function ipToNumber(address: string): number {
  return address
    .split('.')
    .map(Number)
    .reduce((acc, octet) => ((acc << 8) | octet) >>> 0, 0);
}

function prefixMask(prefix: number): number {
  return prefix === 0 ? 0 : (~0 << (32 - prefix)) >>> 0;
}

/**
 * Whether `inner` lies entirely within `outer`
 */
export function cidrContains(outer: string, inner: string): boolean {
  const outerPrefix = cidrPrefix(outer);
  if (cidrPrefix(inner) < outerPrefix) {
    return false;
  }
  const mask = prefixMask(outerPrefix);
  return ((ipToNumber(outer.split('/')[0]) & mask) >>> 0) === ((ipToNumber(inner.split('/')[0]) & mask) >>> 0);
}

/**
 * Number of subnets of size `/mask` that fit in the VPC CIDR
 */
export function subnetCapacity(vpcCidr: string, mask: number): number {
  const prefix = cidrPrefix(vpcCidr);
  return mask < prefix ? 0 : 2 ** (mask - prefix);
}
