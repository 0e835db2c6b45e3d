import type { Session } from "./session.js";

/**
 * Index name under which sessions are grouped by authenticated principal.
 */
export const PRINCIPAL_NAME_INDEX_NAME = "PRINCIPAL_NAME_INDEX_NAME";

export type SessionIndexes = Readonly<Record<string, string>>;

export interface IndexResolver<S extends Session = Session> {
  resolveIndexesFor(session: S): SessionIndexes;
}
