export * from './token';
export * from './ast';
export * from './bytecode';
