import * as fs from 'fs';
import * as path from 'path';
import { ArtifactInspectorService, formatPermissions } from '../generator/artifact-inspector.service';
import { GenerationError } from '../errors/certificate.errors';
import type { ArtifactPaths } from '../storage/certificate-storage.service';
import {
  BASE_TIME,
  createPemPair,
  createTempDir,
  daysFrom,
  removeTempDir,
  writePemFiles,
} from '../../../test/helpers/certificates';
import type { PemPair } from '../../../test/helpers/certificates';

describe('ArtifactInspectorService', () => {
  let directory: string;
  let inspector: ArtifactInspectorService;

  const writeArtifacts = (pair: PemPair): ArtifactPaths => {
    const written = writePemFiles(directory, pair);
    return {
      certificate: written.certificatePath,
      private_key: written.privateKeyPath,
      chain: written.chainPath,
      fullchain: written.fullchainPath,
    };
  };

  const inspectFailure = async (paths: ArtifactPaths, domain = 'test.local'): Promise<GenerationError> => {
    try {
      await inspector.inspect(domain, 'self-signed', paths);
    } catch (error) {
      if (error instanceof GenerationError) {
        return error;
      }
      throw error;
    }
    throw new Error('inspection unexpectedly passed');
  };

  beforeEach(() => {
    directory = createTempDir('certd-inspect-');
    inspector = new ArtifactInspectorService();
  });

  afterEach(() => {
    removeTempDir(directory);
  });

  it('should accept a matching certificate and key for the domain', async () => {
    const paths = writeArtifacts(createPemPair('test.local'));

    const inspected = await inspector.inspect('test.local', 'self-signed', paths);

    expect(inspected.subjectAltNames).toEqual(['test.local']);
    expect(inspected.issuer).toBe('test.local');
    expect(inspected.notBefore).toEqual(BASE_TIME);
    expect(inspected.notAfter).toEqual(daysFrom(BASE_TIME, 90));
    expect(inspected.files.map((file) => file.fileType)).toEqual(['certificate', 'private_key', 'chain', 'fullchain']);
    expect(inspected.files[1].permissions).toBe('600');
    expect(inspected.files[0].checksum).toMatch(/^[0-9a-f]{64}$/);
    expect(inspected.files[0].fileSize).toBe(fs.statSync(paths.certificate).size);
  });

  it('should report subject alternative names when present', async () => {
    const paths = writeArtifacts(createPemPair('test.local', { altNames: ['test.local', 'www.test.local'] }));

    const inspected = await inspector.inspect('www.test.local', 'self-signed', paths);

    expect(inspected.subjectAltNames).toEqual(['test.local', 'www.test.local']);
  });

  it('should accept a wildcard name covering the domain', async () => {
    const paths = writeArtifacts(createPemPair('*.test.local'));

    await expect(inspector.inspect('mail.test.local', 'self-signed', paths)).resolves.toMatchObject({
      issuer: '*.test.local',
    });
  });

  it('should reject a certificate issued for another domain', async () => {
    const paths = writeArtifacts(createPemPair('other.local'));

    const error = await inspectFailure(paths);

    expect(error.reason).toBe('artifact-invalid');
    expect(error.message).toBe('Certificate names [other.local] do not cover test.local');
  });

  it('should reject a private key that does not belong to the certificate', async () => {
    const paths = writeArtifacts(createPemPair('test.local'));
    fs.writeFileSync(paths.private_key, createPemPair('test.local').privateKey);

    const error = await inspectFailure(paths);

    expect(error.reason).toBe('artifact-invalid');
    expect(error.message).toBe('Private key does not match certificate for test.local');
  });

  it('should reject a missing artifact', async () => {
    const paths = writeArtifacts(createPemPair('test.local'));
    fs.rmSync(paths.chain);

    const error = await inspectFailure(paths);

    expect(error.message).toBe(`chain file ${path.join(directory, 'chain.pem')} is missing or unreadable`);
  });

  it('should reject an unparseable certificate', async () => {
    const paths = writeArtifacts(createPemPair('test.local'));
    fs.writeFileSync(paths.certificate, 'not a certificate');

    const error = await inspectFailure(paths);

    expect(error.reason).toBe('artifact-invalid');
    expect(error.message).toMatch(/^Certificate for test\.local could not be parsed/);
  });

  describe('keyMatchesCertificate', () => {
    it('should return false for garbage input instead of throwing', () => {
      expect(inspector.keyMatchesCertificate('garbage', 'garbage')).toBe(false);
    });
  });

  describe('formatPermissions', () => {
    it('should render the permission bits as three octal digits', () => {
      expect(formatPermissions(0o100600)).toBe('600');
      expect(formatPermissions(0o40755)).toBe('755');
      expect(formatPermissions(0o004)).toBe('004');
    });
  });
});
