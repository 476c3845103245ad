// src/reflect/tags.ts
// Type tokens: runtime stand-ins for the TypeScript types the engine can carry.
//
// A token pairs the canonical tag string with a guard. Tags are the only thing
// compared at dispatch time; guards check values when they enter a box.

export type TypeTag = string;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface TypeToken<T> {
  readonly tag: TypeTag;
  /** True when the tag belongs to the closed, portable set. */
  readonly portable: boolean;
  is(value: unknown): value is T;
  clone(value: T): T;
  /** Flat export encoding; non-scalar types encode as null. */
  toJson(value: T): JsonValue;
}

export type AnyToken = TypeToken<unknown>;

export type ValueOf<K> = K extends TypeToken<infer V> ? V : never;

export type ValuesOf<P extends readonly AnyToken[]> = {
  -readonly [I in keyof P]: ValueOf<P[I]>;
};

/**
 * Mutable cell standing in for a pointer. Boxing a Ref shares the cell, so a
 * `T*` member aliases whatever the caller still holds.
 */
export class Ref<T> {
  constructor(public value: T) {}
}

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;

function scalar<T>(
  tag: TypeTag,
  is: (value: unknown) => value is T,
  toJson: (value: T) => JsonValue
): TypeToken<T> {
  return {
    tag,
    portable: true,
    is,
    clone: (value) => value,
    toJson,
  };
}

function numberJson(value: number): JsonValue {
  return Number.isFinite(value) ? value : null;
}

const intToken = scalar<number>(
  "int",
  (v): v is number => typeof v === "number" && Number.isInteger(v) && v >= INT_MIN && v <= INT_MAX,
  numberJson
);

const doubleToken = scalar<number>(
  "double",
  (v): v is number => typeof v === "number",
  numberJson
);

const floatToken = scalar<number>(
  "float",
  (v): v is number => typeof v === "number" && (Number.isNaN(v) || Math.fround(v) === v),
  numberJson
);

const boolToken = scalar<boolean>("bool", (v): v is boolean => typeof v === "boolean", (v) => v);

const stringToken = scalar<string>("string", (v): v is string => typeof v === "string", (v) => v);

const charToken = scalar<string>(
  "char",
  (v): v is string => typeof v === "string" && v.length === 1,
  (v) => v
);

const voidToken: TypeToken<void> = {
  tag: "void",
  portable: true,
  is: (v): v is void => v === undefined,
  clone: () => undefined,
  toJson: () => null,
};

function vector<T>(element: TypeToken<T>): TypeToken<T[]> {
  return {
    tag: `vector<${element.tag}>`,
    portable: element.portable,
    is: (v): v is T[] => Array.isArray(v) && v.every((item) => element.is(item)),
    clone: (v) => v.map((item) => element.clone(item)),
    toJson: () => null,
  };
}

function ptr<T>(pointee: TypeToken<T>): TypeToken<Ref<T>> {
  return {
    tag: `${pointee.tag}*`,
    portable: pointee.portable,
    is: (v): v is Ref<T> => v instanceof Ref && pointee.is(v.value),
    clone: (v) => v,
    toJson: () => null,
  };
}

/**
 * Extension point for types outside the closed set. The tag is not portable:
 * values dispatch by tag but never marshal across bindings or the wire.
 */
function opaque<T>(name: string, is: (value: unknown) => value is T): TypeToken<T> {
  return {
    tag: `opaque:${name}`,
    portable: false,
    is,
    clone: (v) => v,
    toJson: () => null,
  };
}

export const t = {
  int: intToken,
  double: doubleToken,
  float: floatToken,
  bool: boolToken,
  string: stringToken,
  char: charToken,
  void: voidToken,
  vector,
  ptr,
  opaque,
};

export function tagOf(token: AnyToken): TypeTag {
  return token.tag;
}

const SCALARS: Record<string, AnyToken> = {
  int: intToken,
  double: doubleToken,
  float: floatToken,
  bool: boolToken,
  string: stringToken,
  char: charToken,
  void: voidToken,
};

const VECTOR_TAG = /^vector<(.+)>$/;

/**
 * Token for a portable tag, or undefined for opaque and unknown tags.
 */
export function builtinToken(tag: TypeTag): AnyToken | undefined {
  if (Object.prototype.hasOwnProperty.call(SCALARS, tag)) {
    return SCALARS[tag];
  }
  if (tag.endsWith("*")) {
    const pointee = builtinToken(tag.slice(0, -1));
    return pointee && pointee.tag !== "void" ? ptr(pointee) : undefined;
  }
  const match = VECTOR_TAG.exec(tag);
  if (match) {
    const element = builtinToken(match[1]);
    return element && element.tag !== "void" ? vector(element) : undefined;
  }
  return undefined;
}

export function isPortableTag(tag: TypeTag): boolean {
  return builtinToken(tag) !== undefined;
}

/** Short rendering of a runtime value for diagnostics. */
export function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value instanceof Ref) return "Ref";
  switch (typeof value) {
    case "number":
    case "boolean":
      return `${typeof value}(${String(value)})`;
    case "string":
      return value.length > 20 ? `string("${value.slice(0, 17)}...")` : `string("${value}")`;
    default:
      return typeof value;
  }
}
