import {
  PRINCIPAL_NAME_INDEX_NAME,
  type IndexResolver,
  type IndexedSessionRepository,
  type Session,
  type SessionIndexes,
} from "@strata-session/contracts";

export interface PrincipalNameIndexResolverOptions {
  /**
   * Attribute consulted when `PRINCIPAL_NAME_INDEX_NAME` is not set. It may
   * hold a string or an object with a string `name`.
   */
  readonly principalAttribute?: string;
}

export const DEFAULT_PRINCIPAL_ATTRIBUTE = "principal";

export class PrincipalNameIndexResolver<S extends Session = Session> implements IndexResolver<S> {
  private readonly principalAttribute: string;

  constructor(options: PrincipalNameIndexResolverOptions = {}) {
    this.principalAttribute = options.principalAttribute ?? DEFAULT_PRINCIPAL_ATTRIBUTE;
  }

  resolveIndexesFor(session: S): SessionIndexes {
    const principalName = this.resolvePrincipalName(session);
    return principalName === undefined ? {} : { [PRINCIPAL_NAME_INDEX_NAME]: principalName };
  }

  private resolvePrincipalName(session: S): string | undefined {
    const explicit = session.getAttribute(PRINCIPAL_NAME_INDEX_NAME);
    if (typeof explicit === "string" && explicit.length > 0) {
      return explicit;
    }

    const principal = session.getAttribute(this.principalAttribute);
    if (typeof principal === "string" && principal.length > 0) {
      return principal;
    }
    if (typeof principal === "object" && principal !== null && "name" in principal) {
      const name = principal.name;
      return typeof name === "string" && name.length > 0 ? name : undefined;
    }
    return undefined;
  }
}

/**
 * Combines several resolvers. The first resolver to produce a value for an
 * index name wins.
 */
export class DelegatingIndexResolver<S extends Session = Session> implements IndexResolver<S> {
  private readonly delegates: ReadonlyArray<IndexResolver<S>>;

  constructor(...delegates: ReadonlyArray<IndexResolver<S>>) {
    this.delegates = delegates;
  }

  resolveIndexesFor(session: S): SessionIndexes {
    const indexes: Record<string, string> = {};
    for (const delegate of this.delegates) {
      for (const [name, value] of Object.entries(delegate.resolveIndexesFor(session))) {
        if (!(name in indexes)) {
          indexes[name] = value;
        }
      }
    }
    return indexes;
  }
}

export const findByPrincipalName = <S extends Session>(
  repository: IndexedSessionRepository<S>,
  principalName: string,
): Promise<ReadonlyMap<string, S>> => repository.findByIndexNameAndIndexValue(PRINCIPAL_NAME_INDEX_NAME, principalName);
