import { randomUUID } from "node:crypto";

import { MapSession, type MapSessionOptions, type SessionState } from "@strata-session/core";

/**
 * A session bound to its table row. The primary key stays fixed across id
 * changes so attribute rows never have to move.
 */
export class PostgresSession extends MapSession {
  readonly primaryKey: string;
  private storedPrincipalName: string | undefined;

  constructor(
    state: SessionState,
    options: MapSessionOptions & { readonly primaryKey?: string; readonly principalName?: string } = {},
  ) {
    super(state, options);
    this.primaryKey = options.primaryKey ?? randomUUID();
    this.storedPrincipalName = options.principalName;
  }

  /**
   * Principal name as last written to the row.
   */
  get principalName(): string | undefined {
    return this.storedPrincipalName;
  }

  recordPrincipalName(principalName: string | undefined): void {
    this.storedPrincipalName = principalName;
  }
}
