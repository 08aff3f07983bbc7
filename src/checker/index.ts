export { TypeChecker, checkProgram } from './type-checker';
export type { CheckResult } from './type-checker';
export { TypeEnvironment } from './environment';
export { BUILTIN_SIGNATURES } from './builtins';
export * from './types';
