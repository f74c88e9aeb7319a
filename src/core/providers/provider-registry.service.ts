import { Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  EsimProviderClient,
  isProviderId,
  PROVIDER_DISPLAY_NAMES,
  PROVIDER_ORDER,
  ProviderId,
} from '../../domain/esim';
import { errorMessage } from '../errors/esim.errors';
import { logger } from '../logger/logger.config';
import { ProviderRegistration } from './provider.types';

@Injectable()
export class ProviderRegistry implements OnModuleInit {
  private readonly logger = logger();
  private readonly providers = new Map<ProviderId, ProviderRegistration>();

  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    this.logger.info(
      { enabledProviders: this.getEnabledProvidersFromConfig() },
      'Provider registry initialized',
    );
  }

  registerProvider(client: EsimProviderClient, enabled?: boolean): void {
    const id = client.providerId;
    if (this.providers.has(id)) {
      this.logger.warn({ provider: id }, 'Provider already registered');
      return;
    }

    const registration: ProviderRegistration = {
      id,
      client,
      enabled: enabled ?? this.getEnabledProvidersFromConfig().includes(id),
      metadata: {
        displayName: PROVIDER_DISPLAY_NAMES[id],
      },
    };

    this.providers.set(id, registration);
    this.logger.info(
      { provider: id, enabled: registration.enabled },
      'Provider registered',
    );
  }

  getProviderClient(id: ProviderId): EsimProviderClient | undefined {
    const registration = this.providers.get(id);
    return registration?.enabled ? registration.client : undefined;
  }

  /**
   * Enabled providers in fixed provider order
   */
  getActiveProviders(): ProviderRegistration[] {
    return PROVIDER_ORDER.flatMap((id) => {
      const registration = this.providers.get(id);
      return registration?.enabled ? [registration] : [];
    });
  }

  getActiveProviderClients(): EsimProviderClient[] {
    return this.getActiveProviders().map((p) => p.client);
  }

  async checkProvidersHealth(): Promise<Map<ProviderId, boolean>> {
    const healthMap = new Map<ProviderId, boolean>();

    await Promise.all(
      this.getActiveProviders().map(async (provider) => {
        try {
          healthMap.set(provider.id, await provider.client.isHealthy());
        } catch (error) {
          this.logger.error(
            { provider: provider.id, error: errorMessage(error) },
            'Health check failed',
          );
          healthMap.set(provider.id, false);
        }
      }),
    );

    return healthMap;
  }

  private getEnabledProvidersFromConfig(): ProviderId[] {
    const enabledProviders = this.configService.get<string>(
      'ENABLED_PROVIDERS',
      PROVIDER_ORDER.join(','),
    );

    return enabledProviders
      .split(',')
      .map((p) => p.trim().toUpperCase())
      .filter(isProviderId);
  }
}
