// src/channel/handle-table.ts
import { Rights } from '../wire/index.ts';
import type { HandleMetadata, HandleSpace, ObjectType } from '../wire/index.ts';

export interface KernelObject {
  koid: number;
  type: ObjectType;
}

interface Entry {
  object: KernelObject;
  rights: number;
}

export type WarnSink = (message: string) => void;

/**
 * In-process stand-in for a kernel handle table. Raw handle values are never
 * reused, so a close after close is detectable through `closeCount`.
 */
export class HandleTable implements HandleSpace {
  private nextRaw = 1;
  private nextKoid = 1;
  private readonly entries = new Map<number, Entry>();
  private readonly closes = new Map<number, number>();

  constructor(private readonly warn: WarnSink = console.warn) {}

  /** Creates a fresh object and returns the only handle to it. */
  create(type: ObjectType, rights: number = Rights.TRANSFER | Rights.DUPLICATE | Rights.READ | Rights.WRITE): number {
    return this.insert({ koid: this.nextKoid++, type }, rights);
  }

  duplicate(raw: number, rights: number = Rights.SAME_RIGHTS): number | undefined {
    const entry = this.entries.get(raw);
    if (!entry || (entry.rights & Rights.DUPLICATE) === 0) return undefined;
    const next = rights === Rights.SAME_RIGHTS ? entry.rights : rights;
    if ((next & ~entry.rights) !== 0) return undefined;
    return this.insert(entry.object, next);
  }

  isOpen(raw: number): boolean {
    return this.entries.has(raw);
  }

  get openCount(): number {
    return this.entries.size;
  }

  /** How many times `close` has been called with `raw`, successful or not. */
  closeCount(raw: number): number {
    return this.closes.get(raw) ?? 0;
  }

  metadata(raw: number): HandleMetadata | undefined {
    const entry = this.entries.get(raw);
    return entry ? { objectType: entry.object.type, rights: entry.rights } : undefined;
  }

  objectOf(raw: number): KernelObject | undefined {
    return this.entries.get(raw)?.object;
  }

  close(raw: number): boolean {
    this.closes.set(raw, this.closeCount(raw) + 1);
    if (!this.entries.delete(raw)) {
      this.warn(`[handle-table] close of invalid handle ${raw}`);
      return false;
    }
    return true;
  }

  replace(raw: number, rights: number): number | undefined {
    const entry = this.entries.get(raw);
    if (!entry) return undefined;
    const next = rights === Rights.SAME_RIGHTS ? entry.rights : rights;
    if ((next & ~entry.rights) !== 0) return undefined;
    this.entries.delete(raw);
    return this.insert(entry.object, next);
  }

  private insert(object: KernelObject, rights: number): number {
    const raw = this.nextRaw++;
    this.entries.set(raw, { object, rights });
    return raw;
  }
}
