/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is registered under one of these symbols.
 * Symbols cannot collide with a stray "Logger" string elsewhere, and
 * `Symbol.for` keeps them identical across module instances (jest resets
 * modules between files, the registry survives).
 */
export const TOKENS = {
  // Infrastructure — low-level tools the library needs to function
  Logger: Symbol.for('Logger'),
  ConnectionString: Symbol.for('ConnectionString'),
  DbConnector: Symbol.for('DbConnector'),

  // Adapters — the public data-access surface
  DataSourceAdapter: Symbol.for('DataSourceAdapter'),
} as const;
