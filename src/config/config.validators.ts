/**
 * Validates domain format.
 *
 * Accepts multi-label names (mail.example.com), single labels used inside
 * private networks (localhost, mailhost) and a leading wildcard label
 * (*.example.com).
 *
 * @param domain - Domain name to validate
 * @returns True if domain format is valid
 */
export function isValidDomain(domain: string): boolean {
  return /^(?:\*\.)?(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/.test(
    domain,
  );
}

/**
 * Checks whether a certificate name (CN or SAN entry) covers a domain.
 * A wildcard entry matches exactly one additional label.
 */
export function nameCoversDomain(name: string, domain: string): boolean {
  const normalizedName = name.toLowerCase();
  const normalizedDomain = domain.toLowerCase();

  if (normalizedName === normalizedDomain) {
    return true;
  }

  if (!normalizedName.startsWith('*.')) {
    return false;
  }

  const suffix = normalizedName.slice(1);
  if (!normalizedDomain.endsWith(suffix)) {
    return false;
  }

  const label = normalizedDomain.slice(0, normalizedDomain.length - suffix.length);
  return label.length > 0 && !label.includes('.');
}
