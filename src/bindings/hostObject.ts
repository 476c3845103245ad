// src/bindings/hostObject.ts
// Plain JavaScript objects backed by a reflective instance
//
// Members become accessor properties and methods become functions. Values
// cross the boundary by tag: only portable tags marshal.

import {
  ArityMismatch,
  Boxed,
  DuplicateRegistration,
  TypeMismatch,
  builtinToken,
  findAccessorPairs,
  type JsonValue,
  type ReflectiveFacade,
  type TypeTag,
} from "../reflect";

export interface HostObjectOptions {
  /** Skip getX/setX methods that duplicate a member property. */
  suppressAccessors?: boolean;
  /** Host-side name for a member or method. */
  rename?: (name: string) => string;
}

/**
 * Members and methods under their host names, plus non-enumerable
 * introspection helpers.
 */
export interface HostObject {
  readonly __className: string;
  __members(): string[];
  __methods(): string[];
  __toJSON(): Record<string, JsonValue>;
  [name: string]: unknown;
}

const META_KEYS = ["__className", "__members", "__methods", "__toJSON"];

export function toSnakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

export function toHostValue(tag: TypeTag, value: Boxed): unknown {
  const token = builtinToken(tag);
  if (!token) {
    throw new TypeMismatch("portable tag", tag, "host conversion");
  }
  return value.as(token);
}

export function fromHostValue(tag: TypeTag, value: unknown, context?: string): Boxed {
  const token = builtinToken(tag);
  if (!token) {
    throw new TypeMismatch("portable tag", tag, "host conversion");
  }
  return Boxed.of(token, value, context);
}

export function createHostObject(facade: ReflectiveFacade, options: HostObjectOptions = {}): HostObject {
  const info = facade.getTypeInfo();
  const rename = options.rename ?? ((name: string) => name);
  const exposed = new Set<string>(META_KEYS);
  const methodNames: string[] = [];
  const host: HostObject = {
    __className: info.className,
    __members: () => info.getMemberNames().map(rename),
    __methods: () => [...methodNames],
    __toJSON: () => facade.toJSON(),
  };
  for (const key of META_KEYS) {
    Object.defineProperty(host, key, { enumerable: false });
  }

  const claim = (name: string): string => {
    const hostName = rename(name);
    if (exposed.has(hostName)) {
      throw new DuplicateRegistration("binding", hostName, info.className);
    }
    exposed.add(hostName);
    return hostName;
  };

  for (const name of info.getMemberNames()) {
    const sig = info.describeMember(name);
    if (!sig) continue;
    Object.defineProperty(host, claim(name), {
      enumerable: true,
      get: () => toHostValue(sig.tag, facade.getMemberValue(name)),
      set: (value: unknown) => {
        facade.setMemberValue(name, fromHostValue(sig.tag, value, `${info.className}.${name}`));
      },
    });
  }

  const suppressed = new Set<string>();
  if (options.suppressAccessors) {
    for (const pair of findAccessorPairs(info)) {
      if (pair.getter) suppressed.add(pair.getter);
      if (pair.setter) suppressed.add(pair.setter);
    }
  }

  for (const name of info.getMethodNames()) {
    const sig = info.describeMethod(name);
    if (!sig || suppressed.has(name)) continue;
    const hostName = claim(name);
    methodNames.push(hostName);
    host[hostName] = (...args: unknown[]): unknown => {
      if (args.length !== sig.paramTags.length) {
        throw new ArityMismatch(name, sig.paramTags.length, args.length);
      }
      const boxed = args.map((arg, i) =>
        fromHostValue(sig.paramTags[i], arg, `${info.className}.${name} argument ${i + 1}`)
      );
      const result = facade.callMethod(name, boxed);
      return result.isEmpty() ? undefined : toHostValue(sig.returnTag, result);
    };
  }

  return host;
}

export interface ClassBinding {
  /** Defaults to the class name reported by a probe instance. */
  name?: string;
  create: () => ReflectiveFacade;
}

/**
 * Bind several classes at once: each entry becomes a zero-argument factory of
 * host objects. Bound names must be unique.
 */
export function bindClasses(
  entries: ClassBinding[],
  options: HostObjectOptions = {}
): Record<string, () => HostObject> {
  const module: Record<string, () => HostObject> = {};

  for (const entry of entries) {
    const name = entry.name ?? entry.create().getClassName();
    if (Object.prototype.hasOwnProperty.call(module, name)) {
      throw new DuplicateRegistration("binding", name);
    }
    module[name] = () => createHostObject(entry.create(), options);
  }

  return module;
}
