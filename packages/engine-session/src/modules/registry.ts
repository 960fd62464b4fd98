import type { ModuleFactory, NegotiationModule } from './types.js';

/**
 * Name → factory table. Build once at startup, read many times.
 * Re-registering a name replaces its factory.
 */
export class ModuleRegistry {
  private readonly factories = new Map<string, ModuleFactory>();

  register(name: string, factory: ModuleFactory): void {
    this.factories.set(name, factory);
  }

  /** New instance of the named module, or null when nothing is registered under that name. */
  create(name: string): NegotiationModule | null {
    const factory = this.factories.get(name);
    return factory ? factory() : null;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  listModules(): string[] {
    return [...this.factories.keys()];
  }
}
