// src/reflect/descriptors.ts
// Per-type catalog of reflective members and methods

import type { Boxed } from "./boxed";
import { DuplicateRegistration, ReflectionError } from "./errors";
import type { AnyToken, TypeTag } from "./tags";

/**
 * Reflective data member. The closures capture the member's property key
 * (or accessor pair), never an instance.
 */
export interface MemberDescriptor<C> {
  readonly name: string;
  readonly tag: TypeTag;
  readonly type: AnyToken;
  get(instance: C): Boxed;
  set(instance: C, value: Boxed): void;
}

/**
 * Reflective method. `invoke` checks arity, then unboxes arguments in order,
 * then calls; nothing runs when a check fails.
 */
export interface MethodDescriptor<C> {
  readonly name: string;
  readonly returnTag: TypeTag;
  readonly paramTags: readonly TypeTag[];
  readonly returns: AnyToken;
  readonly params: readonly AnyToken[];
  invoke(instance: C, args: readonly Boxed[]): Boxed;
}

export interface MemberSignature {
  name: string;
  tag: TypeTag;
}

export interface MethodSignature {
  name: string;
  returnTag: TypeTag;
  paramTags: TypeTag[];
}

export interface TypeSchema {
  className: string;
  members: MemberSignature[];
  methods: MethodSignature[];
}

/**
 * Read-only view of a descriptor that does not depend on the instance type.
 * Collaborators (server, bindings, docgen) see types through this.
 */
export interface TypeInfo {
  readonly className: string;
  getMemberNames(): string[];
  getMethodNames(): string[];
  hasMember(name: string): boolean;
  hasMethod(name: string): boolean;
  describeMember(name: string): MemberSignature | undefined;
  describeMethod(name: string): MethodSignature | undefined;
  isSealed(): boolean;
  toJSON(): TypeSchema;
}

export class TypeDescriptor<C> implements TypeInfo {
  private readonly members = new Map<string, MemberDescriptor<C>>();
  private readonly methods = new Map<string, MethodDescriptor<C>>();
  private sealed = false;

  constructor(readonly className: string) {}

  /**
   * Add a member. Throws on duplicate names and after sealing.
   */
  addMember(member: MemberDescriptor<C>): void {
    this.assertOpen(member.name);
    if (this.members.has(member.name)) {
      throw new DuplicateRegistration("member", member.name, this.className);
    }
    this.members.set(member.name, Object.freeze(member));
  }

  /**
   * Add a method. Throws on duplicate names and after sealing.
   */
  addMethod(method: MethodDescriptor<C>): void {
    this.assertOpen(method.name);
    if (this.methods.has(method.name)) {
      throw new DuplicateRegistration("method", method.name, this.className);
    }
    this.methods.set(method.name, Object.freeze(method));
  }

  getMember(name: string): MemberDescriptor<C> | undefined {
    return this.members.get(name);
  }

  getMethod(name: string): MethodDescriptor<C> | undefined {
    return this.methods.get(name);
  }

  /** Registration order. */
  getMemberNames(): string[] {
    return Array.from(this.members.keys());
  }

  /** Registration order. */
  getMethodNames(): string[] {
    return Array.from(this.methods.keys());
  }

  hasMember(name: string): boolean {
    return this.members.has(name);
  }

  hasMethod(name: string): boolean {
    return this.methods.has(name);
  }

  describeMember(name: string): MemberSignature | undefined {
    const member = this.members.get(name);
    if (!member) return undefined;
    return { name: member.name, tag: member.tag };
  }

  describeMethod(name: string): MethodSignature | undefined {
    const method = this.methods.get(name);
    if (!method) return undefined;
    return { name: method.name, returnTag: method.returnTag, paramTags: [...method.paramTags] };
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  toJSON(): TypeSchema {
    return {
      className: this.className,
      members: Array.from(this.members.values(), m => ({ name: m.name, tag: m.tag })),
      methods: Array.from(this.methods.values(), m => ({
        name: m.name,
        returnTag: m.returnTag,
        paramTags: [...m.paramTags],
      })),
    };
  }

  private assertOpen(name: string): void {
    if (this.sealed) {
      throw new ReflectionError(
        `Cannot register '${name}': descriptor for ${this.className} is sealed`,
        "SEALED"
      );
    }
  }
}
