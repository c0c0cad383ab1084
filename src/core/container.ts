/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens meet implementations. `reflect-metadata` must be
 * imported before anything decorated loads: tsyringe reads the constructor
 * parameter metadata the decorators emit.
 *
 * Consumers resolve TOKENS.DataSourceAdapter and get an adapter bound to the
 * configured DATABASE_URL. Swapping the connector (for a different driver, or
 * a fake in tests) is a single registration.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { MySqlDataSourceAdapter } from '@infrastructure/adapters/MySqlDataSourceAdapter';
import { KnexConnector } from '@infrastructure/database/KnexConnector';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.ConnectionString, { useValue: config.database.url });
container.register(TOKENS.DbConnector, { useClass: KnexConnector });
container.register(TOKENS.DataSourceAdapter, { useClass: MySqlDataSourceAdapter });

export { container };
