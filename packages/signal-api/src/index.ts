export * from './signal';
export * from './sequence';
