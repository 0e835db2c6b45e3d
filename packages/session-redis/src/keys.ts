export const DEFAULT_REDIS_NAMESPACE = "session";

/**
 * Data keys outlive their shadow key by this much so an expiry notification
 * can still read the session it is about.
 */
export const EXPIRY_GRACE_MS = 5 * 60 * 1000;

export class RedisSessionKeys {
  readonly namespace: string;

  constructor(namespace: string = DEFAULT_REDIS_NAMESPACE) {
    this.namespace = namespace.replace(/:+$/, "");
  }

  session(id: string): string {
    return `${this.namespace}:sessions:${id}`;
  }

  shadow(id: string): string {
    return `${this.namespace}:sessions:expires:${id}`;
  }

  sessionIndexes(id: string): string {
    return `${this.namespace}:sessions:${id}:idx`;
  }

  index(name: string, value: string): string {
    return `${this.namespace}:index:${name}:${value}`;
  }

  get expirations(): string {
    return `${this.namespace}:expirations`;
  }

  get shadowPrefix(): string {
    return `${this.namespace}:sessions:expires:`;
  }

  /**
   * Session id behind a shadow key, or `undefined` for any other key.
   */
  idFromShadow(key: string): string | undefined {
    if (!key.startsWith(this.shadowPrefix)) {
      return undefined;
    }
    const id = key.slice(this.shadowPrefix.length);
    return id.length > 0 ? id : undefined;
  }
}
