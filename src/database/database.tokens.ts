export const DATABASE_CONNECTION = Symbol('DATABASE_CONNECTION');
