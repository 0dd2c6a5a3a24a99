import {
  parseCertificateType,
  parseDomains,
  parseList,
  parseNumberWithDefault,
  parseOptionalBoolean,
  parseStringWithDefault,
} from '../config.parsers';

describe('parseOptionalBoolean', () => {
  it('should return the default when the value is undefined', () => {
    expect(parseOptionalBoolean(undefined)).toBe(false);
    expect(parseOptionalBoolean(undefined, true)).toBe(true);
  });

  it.each(['true', 'TRUE', ' yes ', '1', 'on'])('should parse %p as true', (value) => {
    expect(parseOptionalBoolean(value)).toBe(true);
  });

  it.each(['false', '0', 'False'])('should parse %p as false', (value) => {
    expect(parseOptionalBoolean(value, true)).toBe(false);
  });

  it('should fall back to the default for unrecognised values', () => {
    expect(parseOptionalBoolean('maybe', true)).toBe(true);
  });
});

describe('parseNumberWithDefault', () => {
  it('should return the default for undefined or empty input', () => {
    expect(parseNumberWithDefault(undefined, 30)).toBe(30);
    expect(parseNumberWithDefault('', 30)).toBe(30);
  });

  it('should parse integers', () => {
    expect(parseNumberWithDefault('120000', 1)).toBe(120000);
    expect(parseNumberWithDefault('0', 1)).toBe(0);
  });

  it('should reject negative, non-numeric and fractional values', () => {
    expect(() => parseNumberWithDefault('-1', 1)).toThrow('Invalid numeric value: "-1" (must be a non-negative finite number)');
    expect(() => parseNumberWithDefault('abc', 1)).toThrow('Invalid numeric value: "abc" (must be a non-negative finite number)');
    expect(() => parseNumberWithDefault('1.5', 1)).toThrow('Invalid numeric value: "1.5" (must be an integer)');
  });
});

describe('parseStringWithDefault', () => {
  it('should return the value when set and the default otherwise', () => {
    expect(parseStringWithDefault('certbot-custom', 'certbot')).toBe('certbot-custom');
    expect(parseStringWithDefault('', 'certbot')).toBe('certbot');
    expect(parseStringWithDefault(undefined, 'certbot')).toBe('certbot');
  });
});

describe('parseList', () => {
  it('should split, trim and drop empty entries', () => {
    expect(parseList(' mail , apache,, ')).toEqual(['mail', 'apache']);
  });

  it('should return the default for blank input', () => {
    expect(parseList('   ', ['mail'])).toEqual(['mail']);
    expect(parseList(undefined)).toEqual([]);
  });
});

describe('parseDomains', () => {
  it('should lowercase entries and keep their order', () => {
    expect(parseDomains('Mail.Example.com,www.example.com', ['localhost'])).toEqual(['mail.example.com', 'www.example.com']);
  });

  it('should accept single label names', () => {
    expect(parseDomains('localhost', [])).toEqual(['localhost']);
  });

  it('should use the default list when unset', () => {
    expect(parseDomains(undefined, ['localhost'])).toEqual(['localhost']);
  });

  it('should reject malformed domains', () => {
    expect(() => parseDomains('good.example.com,bad_domain!', [])).toThrow(
      'Invalid domain format in CERTD_DOMAINS: bad_domain!',
    );
  });
});

describe('parseCertificateType', () => {
  it('should return undefined for empty input', () => {
    expect(parseCertificateType(undefined, 'CERTD_DEFAULT_TYPE')).toBeUndefined();
    expect(parseCertificateType('  ', 'CERTD_DEFAULT_TYPE')).toBeUndefined();
  });

  it('should normalise known types', () => {
    expect(parseCertificateType(' LetsEncrypt-Production ', 'CERTD_DEFAULT_TYPE')).toBe('letsencrypt-production');
  });

  it('should name the variable when the type is unknown', () => {
    expect(() => parseCertificateType('acme', 'CERTD_TYPE_PREFERENCE')).toThrow(
      'Invalid certificate type in CERTD_TYPE_PREFERENCE: "acme"',
    );
  });
});
