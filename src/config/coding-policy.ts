// src/config/coding-policy.ts
import * as fs from 'node:fs';
import { parse } from 'yaml';
import picomatch from 'picomatch';
import { DEFAULT_WIRE_PROFILE, createCodingConfig } from '../wire/index.ts';
import type { CodingConfig, HandleSpace, WireProfile } from '../wire/index.ts';

export type WarnSink = (message: string) => void;

export interface ProfileRule {
  name: string;
  match: string | string[];
  max_depth?: number;
  inlining_mask?: number;
}

interface CompiledProfile {
  rule: ProfileRule;
  overrides: Partial<WireProfile>;
  matches: (typeName: string) => boolean;
}

export interface ResolvedProfile {
  /** Name of the matching profile, or `default`. */
  name: string;
  profile: WireProfile;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function readMaxDepth(value: unknown, where: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${where}: "max_depth" must be a non-negative integer`);
  }
  return value;
}

function readInliningMask(value: unknown, where: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 0xffff) {
    throw new Error(`${where}: "inlining_mask" must be an integer between 1 and 65535`);
  }
  return value;
}

function overridesOf(maxDepth: number | undefined, inliningMask: number | undefined): Partial<WireProfile> {
  const overrides: Partial<WireProfile> = {};
  if (maxDepth !== undefined) overrides.maxDepth = maxDepth;
  if (inliningMask !== undefined) overrides.inliningMask = inliningMask;
  return overrides;
}

function validateProfile(raw: unknown, index: number): ProfileRule {
  if (!isRecord(raw)) {
    throw new Error(`Profile at index ${index}: must be an object`);
  }
  const name = raw['name'];
  if (typeof name !== 'string') {
    throw new Error(`Profile at index ${index}: missing required field "name"`);
  }
  const match = raw['match'];
  if (typeof match !== 'string' && !isStringList(match)) {
    throw new Error(`Profile "${name}": "match" must be a glob or a list of globs`);
  }
  const rule: ProfileRule = { name, match };
  const maxDepth = readMaxDepth(raw['max_depth'], `Profile "${name}"`);
  const inliningMask = readInliningMask(raw['inlining_mask'], `Profile "${name}"`);
  if (maxDepth !== undefined) rule.max_depth = maxDepth;
  if (inliningMask !== undefined) rule.inlining_mask = inliningMask;
  return rule;
}

function compileProfile(rule: ProfileRule, warn: WarnSink): CompiledProfile {
  const globs = Array.isArray(rule.match) ? rule.match : [rule.match];
  if (globs.length === 0) {
    warn(`[coding-config] Profile "${rule.name}": match is an empty list, profile will never apply`);
  }
  return {
    rule,
    overrides: overridesOf(rule.max_depth, rule.inlining_mask),
    matches: globs.length === 0 ? () => false : picomatch(globs),
  };
}

/**
 * Maps message type names to wire profiles. The first profile whose globs
 * match wins; its settings are laid over the defaults.
 */
export class CodingPolicy {
  constructor(
    private readonly defaults: WireProfile,
    private readonly profiles: readonly CompiledProfile[],
  ) {}

  static empty(): CodingPolicy {
    return new CodingPolicy({ ...DEFAULT_WIRE_PROFILE }, []);
  }

  get profileNames(): string[] {
    return this.profiles.map((p) => p.rule.name);
  }

  resolve(typeName: string): ResolvedProfile {
    const hit = this.profiles.find((p) => p.matches(typeName));
    if (!hit) return { name: 'default', profile: { ...this.defaults } };
    return { name: hit.rule.name, profile: { ...this.defaults, ...hit.overrides } };
  }

  configFor(typeName: string, handles: HandleSpace): CodingConfig {
    return createCodingConfig({ handles, profile: this.resolve(typeName).profile });
  }
}

export function parseCodingPolicy(content: string, warn: WarnSink = console.warn): CodingPolicy {
  const parsed: unknown = parse(content);
  if (parsed === null || parsed === undefined) return CodingPolicy.empty();
  if (!isRecord(parsed)) throw new Error('Coding policy: top level must be a mapping');

  const rawDefaults = parsed['defaults'] ?? {};
  if (!isRecord(rawDefaults)) throw new Error('Coding policy: "defaults" must be a mapping');
  const defaults: WireProfile = {
    ...DEFAULT_WIRE_PROFILE,
    ...overridesOf(
      readMaxDepth(rawDefaults['max_depth'], 'Defaults'),
      readInliningMask(rawDefaults['inlining_mask'], 'Defaults'),
    ),
  };

  const rawProfiles = parsed['profiles'] ?? [];
  if (!Array.isArray(rawProfiles)) throw new Error('Coding policy: "profiles" must be a list');

  const seen = new Set<string>();
  const profiles: CompiledProfile[] = [];
  rawProfiles.forEach((raw: unknown, index) => {
    const rule = validateProfile(raw, index);
    if (seen.has(rule.name)) throw new Error(`Profile "${rule.name}": duplicate name`);
    seen.add(rule.name);
    profiles.push(compileProfile(rule, warn));
  });

  return new CodingPolicy(defaults, profiles);
}

export function loadCodingPolicy(filePath: string, warn: WarnSink = console.warn): CodingPolicy {
  return parseCodingPolicy(fs.readFileSync(filePath, 'utf8'), warn);
}
