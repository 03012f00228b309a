export * from './types';
export * from './errors';
export * from './logger';
export * from './naming';
export * from './policy';
export * from './manifest';
export * from './schema/registry';
export * from './schema/samples';
export * from './schema/pruner';
export * from './route/normalizer';
export * from './parameters/descriptions';
export * from './parameters/factory';
export * from './parameters/classifier';
export * from './responses/statusText';
export * from './responses/assembler';
export * from './examples/serialize';
export * from './examples/synthesizer';
export * from './operation/skeleton';
export * from './operation/assembler';
export * from './document/builder';
