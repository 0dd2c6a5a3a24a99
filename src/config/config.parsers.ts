import { BOOLEAN_TRUE_VALUES } from './config.constants';
import { isValidDomain } from './config.validators';
import { isCertificateType } from '../certificate/certificate.constants';
import type { CertificateType } from '../certificate/certificate.constants';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ensure integer for configuration values (ports, timeouts, counts)
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Splits a comma-separated environment variable into trimmed, non-empty entries.
 */
export function parseList(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value || !value.trim()) {
    return defaultValue;
  }

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Parses the managed domain list.
 *
 * The first entry is the primary domain. Entries are lowercased and validated.
 *
 * @example
 * ```
 * CERTD_DOMAINS=mail.example.com,www.example.com
 * // Returns: ['mail.example.com', 'www.example.com']
 * ```
 * @throws {Error} If any entry is not a valid domain name
 */
export function parseDomains(value: string | undefined, defaultValue: string[]): string[] {
  const domains = parseList(value, defaultValue).map((domain) => domain.toLowerCase());

  const invalidDomains = domains.filter((domain) => !isValidDomain(domain));
  if (invalidDomains.length > 0) {
    throw new Error(`Invalid domain format in CERTD_DOMAINS: ${invalidDomains.join(', ')}`);
  }

  return domains;
}

/**
 * Parses an optional certificate type. Returns undefined for empty input.
 *
 * @throws {Error} If the value names an unknown certificate type
 */
export function parseCertificateType(value: string | undefined, variable: string): CertificateType | undefined {
  if (value === undefined || !value.trim()) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (!isCertificateType(normalized)) {
    throw new Error(`Invalid certificate type in ${variable}: "${value}"`);
  }

  return normalized;
}
