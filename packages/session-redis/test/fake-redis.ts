import type {
  RedisMessageListener,
  RedisSessionCommands,
  RedisSessionSubscriber,
  RedisSetOptions,
} from "../src/index.js";

interface Expiring<T> {
  value: T;
  expiresAt?: number;
}

/**
 * In-process stand-in for the handful of Redis commands the repository uses.
 * Keys with a TTL read as absent once due; `fireExpirations` removes them and
 * delivers keyevent notifications the way Redis would.
 */
export class FakeRedis implements RedisSessionCommands, RedisSessionSubscriber {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();
  private readonly strings = new Map<string, Expiring<string>>();
  private readonly sets = new Map<string, Expiring<Set<string>>>();
  private readonly sortedSets = new Map<string, Map<string, number>>();
  private readonly config = new Map<string, string>();
  private readonly listeners = new Map<string, RedisMessageListener>();

  constructor(private readonly time: () => number) {}

  async get(key: string): Promise<string | null> {
    this.record("get");
    return this.live(this.strings, key)?.value ?? null;
  }

  async set(key: string, value: string, options: RedisSetOptions = {}): Promise<boolean> {
    this.record("set");
    if (options.xx && !this.exists(key)) {
      return false;
    }
    this.sets.delete(key);
    this.strings.set(key, {
      value,
      expiresAt: options.px === undefined ? undefined : this.time() + options.px,
    });
    return true;
  }

  async del(keys: ReadonlyArray<string>): Promise<number> {
    this.record("del");
    let removed = 0;
    for (const key of keys) {
      if (this.exists(key)) {
        removed += 1;
      }
      this.strings.delete(key);
      this.sets.delete(key);
      this.sortedSets.delete(key);
    }
    return removed;
  }

  async pExpire(key: string, milliseconds: number): Promise<boolean> {
    this.record("pExpire");
    const entry = this.live(this.strings, key) ?? this.live(this.sets, key);
    if (!entry) {
      return false;
    }
    entry.expiresAt = this.time() + milliseconds;
    return true;
  }

  async sAdd(key: string, members: ReadonlyArray<string>): Promise<number> {
    this.record("sAdd");
    let entry = this.live(this.sets, key);
    if (!entry) {
      entry = { value: new Set() };
      this.sets.set(key, entry);
    }
    const before = entry.value.size;
    for (const member of members) {
      entry.value.add(member);
    }
    return entry.value.size - before;
  }

  async sRem(key: string, members: ReadonlyArray<string>): Promise<number> {
    this.record("sRem");
    const entry = this.live(this.sets, key);
    if (!entry) {
      return 0;
    }
    let removed = 0;
    for (const member of members) {
      if (entry.value.delete(member)) {
        removed += 1;
      }
    }
    if (entry.value.size === 0) {
      this.sets.delete(key);
    }
    return removed;
  }

  async sMembers(key: string): Promise<string[]> {
    this.record("sMembers");
    return [...(this.live(this.sets, key)?.value ?? [])];
  }

  async zAdd(key: string, score: number, member: string): Promise<number> {
    this.record("zAdd");
    let entry = this.sortedSets.get(key);
    if (!entry) {
      entry = new Map();
      this.sortedSets.set(key, entry);
    }
    const added = entry.has(member) ? 0 : 1;
    entry.set(member, score);
    return added;
  }

  async zRem(key: string, members: ReadonlyArray<string>): Promise<number> {
    this.record("zRem");
    const entry = this.sortedSets.get(key);
    if (!entry) {
      return 0;
    }
    let removed = 0;
    for (const member of members) {
      if (entry.delete(member)) {
        removed += 1;
      }
    }
    if (entry.size === 0) {
      this.sortedSets.delete(key);
    }
    return removed;
  }

  async zRangeByScore(key: string, min: number, max: number): Promise<string[]> {
    this.record("zRangeByScore");
    return [...(this.sortedSets.get(key) ?? [])]
      .filter(([, score]) => score >= min && score <= max)
      .sort((left, right) => left[1] - right[1])
      .map(([member]) => member);
  }

  async configGet(parameter: string): Promise<string | undefined> {
    this.record("configGet");
    return this.config.get(parameter);
  }

  async configSet(parameter: string, value: string): Promise<void> {
    this.record("configSet");
    this.config.set(parameter, value);
  }

  async pSubscribe(pattern: string, listener: RedisMessageListener): Promise<void> {
    this.listeners.set(pattern, listener);
  }

  async pUnsubscribe(pattern: string): Promise<void> {
    this.listeners.delete(pattern);
  }

  get subscribedPatterns(): string[] {
    return [...this.listeners.keys()];
  }

  /**
   * Removes every key whose TTL is due and notifies subscribers, in key order.
   */
  fireExpirations(): string[] {
    const now = this.time();
    const due: string[] = [];
    for (const store of [this.strings, this.sets]) {
      for (const [key, entry] of store) {
        if (entry.expiresAt !== undefined && entry.expiresAt <= now) {
          store.delete(key);
          due.push(key);
        }
      }
    }
    due.sort();
    for (const key of due) {
      this.notifyExpired(key);
    }
    return due;
  }

  notifyExpired(key: string): void {
    for (const listener of this.listeners.values()) {
      listener(key, "__keyevent@0__:expired");
    }
  }

  keys(): string[] {
    const live = [...this.strings.keys(), ...this.sets.keys()].filter((key) => this.exists(key));
    return [...live, ...this.sortedSets.keys()].sort();
  }

  pttl(key: string): number | undefined {
    const entry = this.live(this.strings, key) ?? this.live(this.sets, key);
    return entry?.expiresAt === undefined ? undefined : entry.expiresAt - this.time();
  }

  zScore(key: string, member: string): number | undefined {
    return this.sortedSets.get(key)?.get(member);
  }

  members(key: string): string[] {
    return [...(this.live(this.sets, key)?.value ?? [])].sort();
  }

  setConfig(parameter: string, value: string): void {
    this.config.set(parameter, value);
  }

  configValue(parameter: string): string | undefined {
    return this.config.get(parameter);
  }

  private exists(key: string): boolean {
    return (
      this.live(this.strings, key) !== undefined ||
      this.live(this.sets, key) !== undefined ||
      this.sortedSets.has(key)
    );
  }

  private live<T>(store: Map<string, Expiring<T>>, key: string): Expiring<T> | undefined {
    const entry = store.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.time()) {
      return undefined;
    }
    return entry;
  }

  private record(command: string): void {
    this.calls.push(command);
    if (this.failing.has(command)) {
      throw new Error(`connection lost during ${command}`);
    }
  }
}
