import { TypeDescriptor, type TypeInfo, type TypeSchema } from "./descriptors";
import { DuplicateRegistration, ReflectionError } from "./errors";
import { ReflectedInstance } from "./facade";
import { TypeRegistrar } from "./registrar";

export type RegisterFn<C> = (reg: TypeRegistrar<C>) => void;

export type HandleState = "uninitialized" | "initializing" | "initialized";

/**
 * Instance-type-free view of a handle, as stored in a TypeRegistry.
 */
export interface RegisteredType {
  readonly className: string;
  readonly state: HandleState;
  info(): TypeInfo;
}

/**
 * Owns the one TypeDescriptor of a class. The descriptor is built on first
 * access, sealed, and published only after the register callback returns.
 */
export class TypeHandle<C> implements RegisteredType {
  private descriptor: TypeDescriptor<C> | undefined;
  private current: HandleState = "uninitialized";

  constructor(
    readonly className: string,
    private readonly register: RegisterFn<C>
  ) {}

  get state(): HandleState {
    return this.current;
  }

  resolve(): TypeDescriptor<C> {
    if (this.descriptor) return this.descriptor;

    if (this.current === "initializing") {
      throw new ReflectionError(
        `Registration of ${this.className} requested its own descriptor`,
        "REENTRANT_REGISTRATION"
      );
    }

    this.current = "initializing";
    try {
      const draft = new TypeDescriptor<C>(this.className);
      this.register(new TypeRegistrar(draft));
      this.descriptor = draft.seal();
      this.current = "initialized";
      return this.descriptor;
    } catch (e) {
      this.current = "uninitialized";
      throw e;
    }
  }

  info(): TypeInfo {
    return this.resolve();
  }

  bind(instance: C): ReflectedInstance<C> {
    return new ReflectedInstance(this, instance);
  }
}

/**
 * Process-wide catalog of reflective classes, keyed by class name.
 */
export class TypeRegistry {
  private types: Map<string, RegisteredType> = new Map();

  /**
   * Create and enter a handle. Throws on duplicate class names.
   */
  define<C>(className: string, register: RegisterFn<C>): TypeHandle<C> {
    if (this.types.has(className)) {
      throw new DuplicateRegistration("type", className);
    }
    const handle = new TypeHandle<C>(className, register);
    this.types.set(className, handle);
    return handle;
  }

  get(className: string): RegisteredType | undefined {
    return this.types.get(className);
  }

  has(className: string): boolean {
    return this.types.has(className);
  }

  list(): RegisteredType[] {
    return Array.from(this.types.values());
  }

  names(): string[] {
    return Array.from(this.types.keys());
  }

  /**
   * Explicit startup phase: build every descriptor now instead of on first use.
   */
  initializeAll(): TypeInfo[] {
    return this.list().map(entry => entry.info());
  }

  /**
   * Case-insensitive match on class, member and method names.
   */
  search(query: string): TypeInfo[] {
    const q = query.toLowerCase();
    return this.initializeAll().filter(info =>
      info.className.toLowerCase().includes(q) ||
      info.getMemberNames().some(n => n.toLowerCase().includes(q)) ||
      info.getMethodNames().some(n => n.toLowerCase().includes(q))
    );
  }

  describeAll(): TypeSchema[] {
    return this.initializeAll().map(info => info.toJSON());
  }
}

export const defaultRegistry = new TypeRegistry();

export function defineType<C>(
  className: string,
  register: RegisterFn<C>,
  registry: TypeRegistry = defaultRegistry
): TypeHandle<C> {
  return registry.define(className, register);
}
