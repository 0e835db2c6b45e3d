import {
  type SaveMode,
  type Session,
  type SessionIdGenerator,
  MissingAttributeError,
} from "@strata-session/contracts";

import { UuidSessionIdGenerator } from "./id-generators.js";

export const DEFAULT_MAX_INACTIVE_INTERVAL_MS = 30 * 60 * 1000;

export interface SessionState {
  readonly id: string;
  readonly creationTime: number;
  readonly lastAccessedTime: number;
  readonly maxInactiveInterval: number;
  readonly attributes: ReadonlyMap<string, unknown>;
}

export interface MapSessionOptions {
  readonly idGenerator?: SessionIdGenerator;
  readonly saveMode?: SaveMode;
  /**
   * Whether the state has never been written to a backend. Defaults to `true`.
   */
  readonly isNew?: boolean;
}

/**
 * Everything a repository has to write on the next save. An attribute mapped
 * to `undefined` has been removed.
 */
export interface SessionChanges {
  readonly idChanged: boolean;
  readonly metadataChanged: boolean;
  readonly attributes: ReadonlyMap<string, unknown>;
}

export const initialSessionState = (
  idGenerator: SessionIdGenerator,
  now: number,
  maxInactiveInterval: number,
): SessionState => ({
  id: idGenerator.generate(),
  creationTime: now,
  lastAccessedTime: now,
  maxInactiveInterval,
  attributes: new Map(),
});

export class MapSession implements Session {
  readonly creationTime: number;

  private currentId: string;
  private persistedId: string;
  private lastAccessed: number;
  private maxInactive: number;
  private fresh: boolean;
  private metadataChanged = false;
  private readonly attributes = new Map<string, unknown>();
  private readonly changedAttributes = new Set<string>();
  private readonly idGenerator: SessionIdGenerator;
  private readonly saveMode: SaveMode;

  constructor(state: SessionState, options: MapSessionOptions = {}) {
    this.currentId = state.id;
    this.persistedId = state.id;
    this.creationTime = state.creationTime;
    this.lastAccessed = state.lastAccessedTime;
    this.maxInactive = state.maxInactiveInterval;
    for (const [name, value] of state.attributes) {
      this.attributes.set(name, value);
    }
    this.idGenerator = options.idGenerator ?? new UuidSessionIdGenerator();
    this.saveMode = options.saveMode ?? "on_set_attribute";
    this.fresh = options.isNew ?? true;
  }

  get id(): string {
    return this.currentId;
  }

  get lastAccessedTime(): number {
    return this.lastAccessed;
  }

  get maxInactiveInterval(): number {
    return this.maxInactive;
  }

  /**
   * `true` until the first successful save.
   */
  get isNew(): boolean {
    return this.fresh;
  }

  /**
   * Id under which the backend currently stores this session.
   */
  get originalId(): string {
    return this.persistedId;
  }

  getAttribute<T = unknown>(name: string): T | undefined {
    if (!this.attributes.has(name)) {
      return undefined;
    }
    if (this.saveMode === "on_get_attribute") {
      this.changedAttributes.add(name);
    }
    return this.attributes.get(name) as T | undefined;
  }

  getAttributeOrDefault<T>(name: string, defaultValue: T): T {
    const value = this.getAttribute<T>(name);
    return value === undefined ? defaultValue : value;
  }

  getRequiredAttribute<T = unknown>(name: string): T {
    const value = this.getAttribute<T>(name);
    if (value === undefined) {
      throw new MissingAttributeError(name);
    }
    return value;
  }

  setAttribute(name: string, value: unknown): void {
    if (value === undefined || value === null) {
      this.removeAttribute(name);
      return;
    }
    this.attributes.set(name, value);
    this.changedAttributes.add(name);
  }

  removeAttribute(name: string): void {
    if (this.attributes.delete(name)) {
      this.changedAttributes.add(name);
    }
  }

  getAttributeNames(): Set<string> {
    return new Set(this.attributes.keys());
  }

  setLastAccessedTime(time: number): void {
    this.lastAccessed = time;
    this.metadataChanged = true;
  }

  setMaxInactiveInterval(interval: number): void {
    this.maxInactive = interval;
    this.metadataChanged = true;
  }

  changeSessionId(): string {
    this.currentId = this.idGenerator.generate();
    return this.currentId;
  }

  isExpired(now: number = Date.now()): boolean {
    return this.maxInactive > 0 && now - this.lastAccessed >= this.maxInactive;
  }

  equals(other: unknown): boolean {
    return (
      typeof other === "object" &&
      other !== null &&
      "id" in other &&
      typeof other.id === "string" &&
      other.id === this.currentId
    );
  }

  hasChanges(): boolean {
    return (
      this.fresh ||
      this.currentId !== this.persistedId ||
      this.metadataChanged ||
      this.changedAttributes.size > 0 ||
      (this.saveMode === "always" && this.attributes.size > 0)
    );
  }

  getPendingChanges(): SessionChanges {
    const names = new Set(this.changedAttributes);
    if (this.saveMode === "always") {
      for (const name of this.attributes.keys()) {
        names.add(name);
      }
    }

    const attributes = new Map<string, unknown>();
    for (const name of names) {
      attributes.set(name, this.attributes.get(name));
    }

    return {
      idChanged: this.currentId !== this.persistedId,
      metadataChanged: this.metadataChanged,
      attributes,
    };
  }

  /**
   * Called by repositories once the pending changes are durable.
   */
  markPersisted(): void {
    this.fresh = false;
    this.persistedId = this.currentId;
    this.metadataChanged = false;
    this.changedAttributes.clear();
  }

  /**
   * Snapshot of the current state. Reading it never marks attributes dirty.
   */
  toState(): SessionState {
    return {
      id: this.currentId,
      creationTime: this.creationTime,
      lastAccessedTime: this.lastAccessed,
      maxInactiveInterval: this.maxInactive,
      attributes: new Map(this.attributes),
    };
  }
}
