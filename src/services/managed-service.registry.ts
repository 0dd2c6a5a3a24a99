import { Injectable, Logger } from '@nestjs/common';
import type { ManagedService } from './interfaces';

/**
 * The managed services this instance watches, by name.
 */
@Injectable()
export class ManagedServiceRegistry {
  private readonly logger = new Logger(ManagedServiceRegistry.name);
  private readonly services = new Map<string, ManagedService>();

  register(service: ManagedService): void {
    if (this.services.has(service.name)) {
      throw new Error(`Managed service "${service.name}" is already registered`);
    }
    this.services.set(service.name, service);
    this.logger.log(`Registered managed service ${service.name}`);
  }

  get(name: string): ManagedService | undefined {
    return this.services.get(name);
  }

  list(): ManagedService[] {
    return [...this.services.values()];
  }
}
