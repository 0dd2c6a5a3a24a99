export * from './certificate-config.interface';
export * from './certificate.interface';
export * from './certificate-status.interface';
