import { registerAs } from '@nestjs/config';

export interface AirhubConfig {
  baseUrl: string;
  username: string;
  password: string;
}

export interface EsimcardConfig {
  baseUrl: string;
  email: string;
  password: string;
}

export interface TravelroamConfig {
  baseUrl: string;
  apiKey: string;
  clientSecret: string;
}

export interface ProvidersConfig {
  airhub: AirhubConfig;
  esimcard: EsimcardConfig;
  travelroam: TravelroamConfig;
}

export const PROVIDERS_CONFIG_KEY = 'providers';

/**
 * Provider endpoints and credentials, read once at startup
 */
export const providersConfig = registerAs(
  PROVIDERS_CONFIG_KEY,
  (): ProvidersConfig => ({
    airhub: {
      baseUrl: process.env.AIRHUB_BASE_URL || 'https://sandbox.airhub.app',
      username: process.env.AIRHUB_USERNAME || '',
      password: process.env.AIRHUB_PASSWORD || '',
    },
    esimcard: {
      baseUrl:
        process.env.ESIMCARD_BASE_URL ||
        'https://esimcard.com/api/developer/reseller',
      email: process.env.ESIMCARD_EMAIL || '',
      password: process.env.ESIMCARD_PASSWORD || '',
    },
    travelroam: {
      baseUrl: process.env.TRAVELROAM_BASE_URL || 'https://api.travelroam.com/v1',
      apiKey: process.env.TRAVELROAM_API_KEY || '',
      clientSecret: process.env.TRAVELROAM_CLIENT_SECRET || '',
    },
  }),
);
