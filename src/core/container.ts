/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens are bound to implementations. No class builds
 * its own collaborators; controllers and middleware resolve them from here.
 *
 *   - `reflect-metadata` must load first: tsyringe reads constructor
 *     parameter metadata written by the decorators.
 *   - `useValue` registers a ready-made singleton (logger, registry, the
 *     seeded directory).
 *   - `registerSingleton` builds the class on first resolve and caches it.
 *
 * The metrics registry is a fresh prom-client Registry rather than the
 * library's global one, so tests can swap it without touching module state.
 */
import 'reflect-metadata';
import { collectDefaultMetrics, Registry } from 'prom-client';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { AuthService } from '@application/services/AuthService';
import { TokenService } from '@application/services/TokenService';
import { HttpMetrics } from '@infrastructure/metrics/HttpMetrics';
import { InMemoryUserRepository } from '@infrastructure/repositories/InMemoryUserRepository';
import { BcryptPasswordHasher } from '@infrastructure/security/BcryptPasswordHasher';
import { SystemStatsService } from '@infrastructure/system/SystemStatsService';
import { SEED_USERS } from '@shared/constants';

const registry = new Registry();
if (config.metrics.collectDefaults) {
  collectDefaultMetrics({ register: registry });
}

const passwordHasher = new BcryptPasswordHasher(config.auth);

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.AuthConfig, { useValue: config.auth });
container.register(TOKENS.AppInfo, { useValue: config.app });
container.register(TOKENS.MetricsRegistry, { useValue: registry });
container.register(TOKENS.PasswordHasher, { useValue: passwordHasher });
container.register(TOKENS.UserRepository, {
  useValue: InMemoryUserRepository.fromSeeds(SEED_USERS, passwordHasher),
});
container.register(TOKENS.SystemStats, { useValue: new SystemStatsService() });
container.registerSingleton(TOKENS.HttpMetrics, HttpMetrics);
container.registerSingleton(TOKENS.TokenService, TokenService);
container.registerSingleton(TOKENS.AuthService, AuthService);

export { container };
