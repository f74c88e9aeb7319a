export * from './interfaces';
export * from './models';
