export * from './types';
export * from './errors';
export * from './logger';
export * from './slug';
export * from './filename';
export * from './links';
export * from './buffers';
export * from './store';
