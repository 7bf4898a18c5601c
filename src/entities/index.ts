export * from './worktime';
export * from './register';
export * from './checkRegister';
export type { EntityDefinition, StoredSchema } from './types';
