/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up in the tsyringe container by one of
 * these symbols. `Symbol.for` keeps them unique without colliding with plain
 * string keys, and they never leak into JSON output.
 *
 * Grouped by layer so it is easy to see what exists at each level; a new
 * service gets its token here before it is registered in container.ts.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the app needs to function
  Logger: Symbol.for('Logger'),
  AuthConfig: Symbol.for('AuthConfig'),
  AppInfo: Symbol.for('AppInfo'),
  MetricsRegistry: Symbol.for('MetricsRegistry'),
  HttpMetrics: Symbol.for('HttpMetrics'),
  SystemStats: Symbol.for('SystemStats'),
  PasswordHasher: Symbol.for('PasswordHasher'),

  // Repositories — data-access contracts
  UserRepository: Symbol.for('UserRepository'),

  // Services — application-level orchestrators
  TokenService: Symbol.for('TokenService'),
  AuthService: Symbol.for('AuthService'),
} as const;
