/**
 * Certificate types tracked by the store.
 */
export const CERTIFICATE_TYPES = ['manual', 'letsencrypt-production', 'letsencrypt-staging', 'self-signed'] as const;

export type CertificateType = (typeof CERTIFICATE_TYPES)[number];

/**
 * Selection priority without a type preference, highest first. Manual
 * certificates are absent: they are served only when preferred explicitly.
 */
export const AUTOMATIC_SELECTION_ORDER: readonly CertificateType[] = [
  'letsencrypt-production',
  'letsencrypt-staging',
  'self-signed',
];

/**
 * Directory (under the certificate root) that holds material of each type.
 * Provenance is encoded by placement, so a path alone tells which type it is.
 */
export const CERTIFICATE_DIRECTORIES: Record<CertificateType, string> = {
  manual: 'manual',
  'letsencrypt-production': 'live',
  'letsencrypt-staging': 'staged',
  'self-signed': 'self-signed',
};

export const CERTIFICATE_FILE_NAMES = {
  certificate: 'cert.pem',
  private_key: 'privkey.pem',
  chain: 'chain.pem',
  fullchain: 'fullchain.pem',
} as const;

export type CertificateFileType = keyof typeof CERTIFICATE_FILE_NAMES;

export const CERTIFICATE_FILE_TYPES: readonly CertificateFileType[] = ['certificate', 'private_key', 'chain', 'fullchain'];

export const CHANGE_OPERATIONS = ['created', 'updated', 'renewed', 'expired', 'deleted'] as const;

export type ChangeOperation = (typeof CHANGE_OPERATIONS)[number];

/** Pub/sub topic prefix; full topic is `certificates/<domain>/<type>`. */
export const CERTIFICATE_TOPIC_PREFIX = 'certificates';

/**
 * Output fragments from the ACME tool that identify a known environment
 * incompatibility rather than a real issuance failure. Matching output makes
 * the generator fall back to a self-signed certificate. Best effort only.
 */
export const ACME_COMPATIBILITY_PATTERNS: readonly RegExp[] = [/X509_V_FLAG_NOTIFY_POLICY/];

export function isCertificateType(value: string): value is CertificateType {
  return CERTIFICATE_TYPES.some((type) => type === value);
}

export function certificateTopic(domain: string, type: CertificateType | '*'): string {
  return `${CERTIFICATE_TOPIC_PREFIX}/${domain}/${type}`;
}

/** Delay between application bootstrap and the first coverage check. */
export const STARTUP_CHECK_DELAY_MS = 5000;
