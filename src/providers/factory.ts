import { AcrCloudProvider } from './AcrCloudProvider.js';
import { AuddProvider } from './AuddProvider.js';
import { ConfigurationError } from '../types/errors.js';
import type { ValidatedAppConfig } from '../config/schema.js';
import type { RecognitionProvider } from '../types/identification.js';

type ProvidersConfig = ValidatedAppConfig['providers'];
type ProviderFactory = (config: ProvidersConfig) => RecognitionProvider;

/**
 * Named recognition providers. Lookup is case-insensitive.
 */
export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();

  register(name: string, factory: ProviderFactory): this {
    this.factories.set(name.toLowerCase(), factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Instantiates the providers named in `priorityOrder`, in that order.
   */
  create(config: ProvidersConfig): RecognitionProvider[] {
    const seen = new Set<string>();

    return config.priorityOrder.map((name) => {
      const key = name.toLowerCase();
      const factory = this.factories.get(key);
      if (!factory) {
        throw new ConfigurationError(`Unknown recognition provider "${name}"`, {
          available: this.names(),
        });
      }
      if (seen.has(key)) {
        throw new ConfigurationError(`Provider "${name}" is listed more than once`);
      }
      seen.add(key);
      return factory(config);
    });
  }
}

export function createProviderRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register('acrcloud', (config) => new AcrCloudProvider(config.acrcloud))
    .register('audd', (config) => new AuddProvider(config.audd));
}
