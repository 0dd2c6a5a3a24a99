export const SERVICES_CONFIG = Symbol('SERVICES_CONFIG');
