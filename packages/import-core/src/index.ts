export * from './adapters';
export * from './collaborators';
export * from './config';
export * from './constants';
export * from './context/importContext';
export * from './dispatch/batchBuffer';
export * from './dispatch/builderRegistry';
export * from './dispatch/dispatcher';
export * from './dispatch/responseCodes';
export * from './dispatch/writeRequest';
export * from './dispatch/writeStrategies';
export * from './errors';
export * from './importer';
export * from './lineProtocol/encoder';
export * from './lineProtocol/tokenizer';
export * from './point';
export * from './types';
export * from './values';
