export * from './managed-service.interface';
export * from './services-config.interface';
