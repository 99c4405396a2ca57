export * from './clock';
export * from './config';
export * from './errors';
export * from './policy';
export * from './registry';
export * from './signal';
