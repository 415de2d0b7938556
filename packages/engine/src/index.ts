export * from './environment';
export * from './setup';
