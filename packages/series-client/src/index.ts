export * from './client';
export * from './columnWriteClient';
export * from './errors';
export * from './transport';
export * from './types';
