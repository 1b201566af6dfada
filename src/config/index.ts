export { CodingPolicy, loadCodingPolicy, parseCodingPolicy } from './coding-policy.ts';
export type { ProfileRule, ResolvedProfile, WarnSink } from './coding-policy.ts';
