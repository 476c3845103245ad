// src/reflect/boxed.ts
// Type-erased value carrier

import { TypeMismatch } from "./errors";
import { describeValue, t, type AnyToken, type JsonValue, type TypeTag, type TypeToken } from "./tags";

/**
 * Holds one value together with the tag it was boxed under.
 *
 * The value is cloned on the way in and on the way out, so two carriers never
 * share mutable state (pointer tags excepted: a `Ref` is the shared cell).
 */
export class Boxed {
  static readonly empty = new Boxed(t.void.tag, undefined);

  private constructor(
    readonly tag: TypeTag,
    private readonly value: unknown
  ) {}

  static of<T>(type: TypeToken<T>, value: T, context?: string): Boxed {
    if (!type.is(value)) {
      throw new TypeMismatch(type.tag, describeValue(value), context);
    }
    return new Boxed(type.tag, type.clone(value));
  }

  isEmpty(): boolean {
    return this.tag === t.void.tag;
  }

  is(type: AnyToken): boolean {
    return this.tag === type.tag;
  }

  /**
   * Recover the value. Fails unless `type` carries exactly the boxed tag.
   */
  as<T>(type: TypeToken<T>, context?: string): T {
    const value = this.value;
    if (this.tag !== type.tag || !type.is(value)) {
      throw new TypeMismatch(type.tag, this.tag, context);
    }
    return type.clone(value);
  }

  /**
   * Flat export encoding. Needs the token because the carrier only knows its
   * tag; a token for another tag yields null.
   */
  toJson(type: AnyToken): JsonValue {
    const value = this.value;
    if (this.tag !== type.tag || !type.is(value)) return null;
    return type.toJson(value);
  }

  toString(): string {
    return `Boxed<${this.tag}>(${describeValue(this.value)})`;
  }
}

export function box<T>(type: TypeToken<T>, value: T): Boxed {
  return Boxed.of(type, value);
}

export function unbox<T>(type: TypeToken<T>, boxed: Boxed): T {
  return boxed.as(type);
}
