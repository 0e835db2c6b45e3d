import { NotSerializableError, type SessionIndexes } from "@strata-session/contracts";
import { z } from "zod";

import type { SessionState } from "../session/map-session.js";
import { AttributeCodec, type JsonValue } from "./attribute-codec.js";

const ENVELOPE_VERSION = 1;

const envelopeSchema = z.object({
  version: z.literal(ENVELOPE_VERSION),
  id: z.string().min(1),
  creationTime: z.number(),
  lastAccessedTime: z.number(),
  maxInactiveInterval: z.number(),
  attributes: z.record(z.unknown()),
  indexes: z.record(z.string()).default({}),
});

export interface DecodedSession {
  readonly state: SessionState;
  readonly indexes: SessionIndexes;
}

/**
 * Whole-session payload codec for key-value backends: metadata, every
 * attribute and the resolved index values in one JSON document.
 */
export class SessionCodec {
  constructor(private readonly attributeCodec: AttributeCodec = new AttributeCodec()) {}

  encode(state: SessionState, indexes: SessionIndexes = {}): string {
    const attributes: { [key: string]: JsonValue } = {};
    for (const [name, value] of state.attributes) {
      attributes[name] = this.attributeCodec.serialize(value, name);
    }

    return JSON.stringify({
      version: ENVELOPE_VERSION,
      id: state.id,
      creationTime: state.creationTime,
      lastAccessedTime: state.lastAccessedTime,
      maxInactiveInterval: state.maxInactiveInterval,
      attributes,
      indexes,
    });
  }

  decode(payload: string): DecodedSession {
    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      throw new NotSerializableError("Stored session payload is not valid JSON.", "$", { cause: error });
    }

    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new NotSerializableError(
        `Stored session payload is malformed: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
        "$",
      );
    }

    const envelope = parsed.data;
    const attributes = new Map<string, unknown>();
    for (const [name, tree] of Object.entries(envelope.attributes)) {
      attributes.set(name, this.attributeCodec.deserialize(tree, name));
    }

    return {
      state: {
        id: envelope.id,
        creationTime: envelope.creationTime,
        lastAccessedTime: envelope.lastAccessedTime,
        maxInactiveInterval: envelope.maxInactiveInterval,
        attributes,
      },
      indexes: envelope.indexes,
    };
  }
}
