export * from './wire/index.ts';
export * from './types/index.ts';
export * from './channel/index.ts';
export { CodingPolicy, loadCodingPolicy, parseCodingPolicy } from './config/index.ts';
export type { ProfileRule, ResolvedProfile } from './config/index.ts';
