export * from './provider-registry.service';
export * from './provider.types';
export * from './providers.module';
