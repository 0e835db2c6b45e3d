import { NotSerializableError } from "@strata-session/contracts";

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

const TAG = "$type";

type Tagged =
  | { readonly $type: "undefined" }
  | { readonly $type: "number"; readonly value: "NaN" | "Infinity" | "-Infinity" | "-0" }
  | { readonly $type: "bigint"; readonly value: string }
  | { readonly $type: "date"; readonly value: number | null }
  | { readonly $type: "regexp"; readonly source: string; readonly flags: string }
  | { readonly $type: "buffer"; readonly value: string }
  | { readonly $type: "bytes"; readonly value: string }
  | { readonly $type: "map"; readonly entries: JsonValue[] }
  | { readonly $type: "set"; readonly values: JsonValue[] }
  | { readonly $type: "object"; readonly value: { [key: string]: JsonValue } };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

// Plain assignment would route "__proto__" to the prototype setter.
const defineEntry = <T>(target: { [key: string]: T }, key: string, value: T): void => {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
};

const describeType = (value: unknown): string => {
  if (typeof value !== "object" || value === null) {
    return typeof value;
  }
  const constructorName: unknown = value.constructor?.name;
  return typeof constructorName === "string" && constructorName.length > 0 ? constructorName : "object";
};

const encodeSpecialNumber = (value: number): Tagged | undefined => {
  if (Number.isNaN(value)) {
    return { $type: "number", value: "NaN" };
  }
  if (value === Number.POSITIVE_INFINITY) {
    return { $type: "number", value: "Infinity" };
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return { $type: "number", value: "-Infinity" };
  }
  if (Object.is(value, -0)) {
    return { $type: "number", value: "-0" };
  }
  return undefined;
};

/**
 * Type-preserving attribute encoding on top of JSON.
 *
 * Values JSON cannot carry are wrapped in `{ "$type": ... }` nodes. A plain
 * object that happens to own a `$type` key is wrapped as `object` so it
 * decodes unchanged.
 */
export class AttributeCodec {
  encode(name: string, value: unknown): string {
    return JSON.stringify(this.serialize(value, name));
  }

  decode(name: string, payload: string): unknown {
    let tree: unknown;
    try {
      tree = JSON.parse(payload);
    } catch (error) {
      throw new NotSerializableError(`Stored value of attribute '${name}' is not valid JSON.`, name, {
        cause: error,
      });
    }
    return this.deserialize(tree, name);
  }

  serialize(value: unknown, path: string): JsonValue {
    return this.toTree(value, path, new Set());
  }

  deserialize(tree: unknown, path: string): unknown {
    if (tree === null || typeof tree === "string" || typeof tree === "boolean" || typeof tree === "number") {
      return tree;
    }

    if (Array.isArray(tree)) {
      return tree.map((item, index) => this.deserialize(item, `${path}[${index}]`));
    }

    if (!isRecord(tree)) {
      throw new NotSerializableError(`Unexpected stored value at '${path}'.`, path);
    }

    const tag = tree[TAG];
    if (tag === undefined) {
      return this.deserializeEntries(tree, path);
    }

    switch (tag) {
      case "undefined":
        return undefined;
      case "number":
        return decodeSpecialNumber(tree.value, path);
      case "bigint":
        return BigInt(expectString(tree.value, path));
      case "date":
        return new Date(tree.value === null ? Number.NaN : expectNumber(tree.value, path));
      case "regexp":
        return new RegExp(expectString(tree.source, path), expectString(tree.flags, path));
      case "buffer":
        return Buffer.from(expectString(tree.value, path), "base64");
      case "bytes":
        return new Uint8Array(Buffer.from(expectString(tree.value, path), "base64"));
      case "map":
        return new Map(
          expectArray(tree.entries, path).map((entry, index) => {
            const pair = expectArray(entry, `${path}<${index}>`);
            if (pair.length !== 2) {
              throw new NotSerializableError(`Malformed map entry at '${path}<${index}>'.`, path);
            }
            return [
              this.deserialize(pair[0], `${path}<${index}>.key`),
              this.deserialize(pair[1], `${path}<${index}>.value`),
            ] as const;
          }),
        );
      case "set":
        return new Set(expectArray(tree.values, path).map((item, index) => this.deserialize(item, `${path}{${index}}`)));
      case "object": {
        const inner = tree.value;
        if (!isRecord(inner)) {
          throw new NotSerializableError(`Malformed object at '${path}'.`, path);
        }
        return this.deserializeEntries(inner, path);
      }
      default:
        throw new NotSerializableError(`Unknown stored type '${String(tag)}' at '${path}'.`, path);
    }
  }

  private deserializeEntries(tree: Record<string, unknown>, path: string): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(tree)) {
      defineEntry(result, key, this.deserialize(child, `${path}.${key}`));
    }
    return result;
  }

  private toTree(value: unknown, path: string, ancestors: Set<object>): JsonValue {
    switch (typeof value) {
      case "string":
      case "boolean":
        return value;
      case "number":
        return encodeSpecialNumber(value) ?? value;
      case "bigint":
        return { $type: "bigint", value: value.toString() };
      case "undefined":
        return { $type: "undefined" };
      case "function":
      case "symbol":
        throw new NotSerializableError(`Attribute value at '${path}' is a ${typeof value} and cannot be serialized.`, path);
      default:
        break;
    }

    if (value === null) {
      return null;
    }
    if (typeof value !== "object") {
      throw new NotSerializableError(`Attribute value at '${path}' cannot be serialized.`, path);
    }

    if (value instanceof Date) {
      const time = value.getTime();
      return { $type: "date", value: Number.isNaN(time) ? null : time };
    }
    if (value instanceof RegExp) {
      return { $type: "regexp", source: value.source, flags: value.flags };
    }
    if (Buffer.isBuffer(value)) {
      return { $type: "buffer", value: value.toString("base64") };
    }
    if (value instanceof Uint8Array) {
      return { $type: "bytes", value: Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64") };
    }

    if (ancestors.has(value)) {
      throw new NotSerializableError(`Attribute value at '${path}' contains a circular reference.`, path);
    }
    ancestors.add(value);
    try {
      if (Array.isArray(value)) {
        const items: JsonValue[] = [];
        for (let index = 0; index < value.length; index += 1) {
          items.push(this.toTree(value[index], `${path}[${index}]`, ancestors));
        }
        return items;
      }
      if (value instanceof Map) {
        const entries: JsonValue[] = [];
        let index = 0;
        for (const [key, item] of value) {
          entries.push([
            this.toTree(key, `${path}<${index}>.key`, ancestors),
            this.toTree(item, `${path}<${index}>.value`, ancestors),
          ]);
          index += 1;
        }
        return { $type: "map", entries };
      }
      if (value instanceof Set) {
        const values: JsonValue[] = [];
        let index = 0;
        for (const item of value) {
          values.push(this.toTree(item, `${path}{${index}}`, ancestors));
          index += 1;
        }
        return { $type: "set", values };
      }
      if (!isPlainObject(value)) {
        throw new NotSerializableError(
          `Attribute value at '${path}' is an instance of ${describeType(value)} and cannot be serialized.`,
          path,
        );
      }

      const entries: { [key: string]: JsonValue } = {};
      for (const [key, child] of Object.entries(value)) {
        defineEntry(entries, key, this.toTree(child, `${path}.${key}`, ancestors));
      }
      return Object.prototype.hasOwnProperty.call(entries, TAG) ? { $type: "object", value: entries } : entries;
    } finally {
      ancestors.delete(value);
    }
  }
}

const expectString = (value: unknown, path: string): string => {
  if (typeof value !== "string") {
    throw new NotSerializableError(`Malformed stored value at '${path}'.`, path);
  }
  return value;
};

const expectNumber = (value: unknown, path: string): number => {
  if (typeof value !== "number") {
    throw new NotSerializableError(`Malformed stored value at '${path}'.`, path);
  }
  return value;
};

const expectArray = (value: unknown, path: string): ReadonlyArray<unknown> => {
  if (!Array.isArray(value)) {
    throw new NotSerializableError(`Malformed stored value at '${path}'.`, path);
  }
  return value;
};

const decodeSpecialNumber = (value: unknown, path: string): number => {
  switch (value) {
    case "NaN":
      return Number.NaN;
    case "Infinity":
      return Number.POSITIVE_INFINITY;
    case "-Infinity":
      return Number.NEGATIVE_INFINITY;
    case "-0":
      return -0;
    default:
      throw new NotSerializableError(`Malformed number at '${path}'.`, path);
  }
};
