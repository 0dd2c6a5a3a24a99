import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { CommandRunnerService } from '../shared/command-runner.service';
import { CommandManagedService } from './command-managed.service';
import type { ServicesConfig } from './interfaces';
import { loadServiceDefinitions } from './managed-service.definitions';
import { ManagedServiceRegistry } from './managed-service.registry';
import { SERVICES_CONFIG } from './services.tokens';

const servicesConfigProvider = {
  provide: SERVICES_CONFIG,
  useFactory: (configService: ConfigService): ServicesConfig => {
    const config = configService.get<ServicesConfig>('certd.services');
    if (!config) {
      throw new Error('Managed services configuration is missing');
    }
    return config;
  },
  inject: [ConfigService],
};

/**
 * Builds the registry from the definitions file. An enabled name with no
 * definition fails startup instead of silently watching nothing.
 */
export function buildManagedServiceRegistry(config: ServicesConfig, commandRunner: CommandRunnerService): ManagedServiceRegistry {
  const logger = new Logger('ManagedServices');
  const registry = new ManagedServiceRegistry();

  if (config.enabled.length === 0) {
    logger.warn('No managed services enabled; certificate changes will not be applied to any service');
    return registry;
  }

  const definitions = loadServiceDefinitions(path.resolve(config.definitionsPath));
  for (const name of config.enabled) {
    const definition = definitions.find((candidate) => candidate.name === name);
    if (!definition) {
      throw new Error(
        `Unknown managed service "${name}" in CERTD_SERVICES (defined: ${definitions.map((d) => d.name).join(', ')})`,
      );
    }
    registry.register(new CommandManagedService(definition, commandRunner, config));
  }

  return registry;
}

/**
 * Managed services (mail, web server, ...) the reloader drives.
 */
@Module({
  providers: [
    servicesConfigProvider,
    CommandRunnerService,
    {
      provide: ManagedServiceRegistry,
      useFactory: buildManagedServiceRegistry,
      inject: [SERVICES_CONFIG, CommandRunnerService],
    },
  ],
  exports: [SERVICES_CONFIG, ManagedServiceRegistry, CommandRunnerService],
})
export class ServicesModule {}
