export * from './types';
export * from './constants';
export * from './vec';
export * from './rng';
export * from './errors';
