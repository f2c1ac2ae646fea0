export * from './common/constants';
export * from './common/errors';
export * from './common/logger';
export * from './vm/bus';
export * from './vm/memory';
export * from './vm/register';
export * from './vm/instruction';
export * from './vm/trace';
export * from './vm/vm';
export * from './vm/program';
export * from './zk/field';
export * from './zk/hash';
export * from './zk/serialize';
export * from './zk/commitment';
export * from './runner';
