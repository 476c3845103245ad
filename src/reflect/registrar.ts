// src/reflect/registrar.ts
// Builder that fills one TypeDescriptor with type-erasing closures

import { Boxed } from "./boxed";
import type { TypeDescriptor } from "./descriptors";
import { ArityMismatch, TypeMismatch } from "./errors";
import { tagOf, type AnyToken, type TypeToken, type ValuesOf } from "./tags";

export interface FieldAccessor<C, T> {
  get(instance: C): T;
  set(instance: C, value: T): void;
}

export type MethodImpl<C, P extends readonly AnyToken[], R> = (instance: C, ...args: ValuesOf<P>) => R;

function matchesParams<P extends readonly AnyToken[]>(
  params: P,
  values: readonly unknown[]
): values is ValuesOf<P> {
  return values.length === params.length && params.every((param, i) => param.is(values[i]));
}

/**
 * Registration API handed to a class's register callback.
 *
 * @example
 * ```typescript
 * reg.member("age", t.int, "age")
 *    .method("setNameAndAge", [t.string, t.int], t.void, (p, name, age) => p.setNameAndAge(name, age));
 * ```
 */
export class TypeRegistrar<C> {
  constructor(private readonly descriptor: TypeDescriptor<C>) {}

  get className(): string {
    return this.descriptor.className;
  }

  /**
   * Register the property `key` under `name`. The token must describe the
   * property's declared type.
   */
  member<K extends keyof C>(name: string, type: TypeToken<C[K]>, key: K): this {
    return this.accessor(name, type, {
      get: (instance) => instance[key],
      set: (instance, value) => {
        instance[key] = value;
      },
    });
  }

  /**
   * Register a member kept behind a getter/setter pair.
   */
  accessor<T>(name: string, type: TypeToken<T>, access: FieldAccessor<C, T>): this {
    const where = `${this.className}.${name}`;
    this.descriptor.addMember({
      name,
      tag: tagOf(type),
      type,
      get: (instance) => Boxed.of(type, access.get(instance), where),
      set: (instance, value) => {
        access.set(instance, value.as(type, where));
      },
    });
    return this;
  }

  /**
   * Register a method of any arity. `params` fixes the parameter tags; the
   * invoker unboxes against them in order before calling `impl`.
   */
  method<const P extends readonly AnyToken[], R>(
    name: string,
    params: P,
    returns: TypeToken<R>,
    impl: MethodImpl<C, P, R>
  ): this {
    const where = `${this.className}.${name}`;
    const paramList: readonly AnyToken[] = Object.freeze([...params]);

    this.descriptor.addMethod({
      name,
      returnTag: tagOf(returns),
      paramTags: Object.freeze(paramList.map(tagOf)),
      returns,
      params: paramList,
      invoke: (instance, args) => {
        if (args.length !== params.length) {
          throw new ArityMismatch(name, params.length, args.length);
        }
        const values = args.map((arg, i) => arg.as(params[i], `${where} argument ${i + 1}`));
        if (!matchesParams(params, values)) {
          throw new TypeMismatch(paramList.map(tagOf).join(", "), "unboxed arguments", where);
        }
        const result = impl(instance, ...values);
        if (tagOf(returns) === "void") {
          return Boxed.empty;
        }
        return Boxed.of(returns, result, `${where} return value`);
      },
    });
    return this;
  }
}
