// src/reflect/facade.ts
// Per-instance reflective operations

import type { Boxed } from "./boxed";
import type { MemberDescriptor, MethodDescriptor, TypeDescriptor, TypeInfo } from "./descriptors";
import { NotFound } from "./errors";
import type { TypeHandle } from "./registry";
import type { JsonValue } from "./tags";

/**
 * What every reflective instance exposes. Stateless: each call resolves the
 * shared descriptor and acts on the bound instance.
 */
export interface ReflectiveFacade {
  getMemberValue(name: string): Boxed;
  setMemberValue(name: string, value: Boxed): void;
  callMethod(name: string, args?: readonly Boxed[]): Boxed;
  getMemberNames(): string[];
  getMethodNames(): string[];
  hasMember(name: string): boolean;
  hasMethod(name: string): boolean;
  getClassName(): string;
  getTypeInfo(): TypeInfo;
  toJSON(): Record<string, JsonValue>;
  formatMemberValue(name: string): string;
  describe(): string;
}

function formatBoxed<C>(member: MemberDescriptor<C>, value: Boxed): string {
  const json = value.toJson(member.type);
  if (typeof json === "string") return json;
  if (json === null) return `[${member.tag} value]`;
  return String(json);
}

function formatSignature<C>(method: MethodDescriptor<C>): string {
  const head = `${method.name} -> ${method.returnTag}`;
  return method.paramTags.length > 0 ? `${head} (params: ${method.paramTags.join(", ")})` : head;
}

export class ReflectedInstance<C> implements ReflectiveFacade {
  constructor(
    private readonly handle: TypeHandle<C>,
    readonly target: C
  ) {}

  private get descriptor(): TypeDescriptor<C> {
    return this.handle.resolve();
  }

  getMemberValue(name: string): Boxed {
    return this.requireMember(name).get(this.target);
  }

  setMemberValue(name: string, value: Boxed): void {
    this.requireMember(name).set(this.target, value);
  }

  callMethod(name: string, args: readonly Boxed[] = []): Boxed {
    const method = this.descriptor.getMethod(name);
    if (!method) {
      throw new NotFound("method", name, this.descriptor.className);
    }
    return method.invoke(this.target, args);
  }

  getMemberNames(): string[] {
    return this.descriptor.getMemberNames();
  }

  getMethodNames(): string[] {
    return this.descriptor.getMethodNames();
  }

  hasMember(name: string): boolean {
    return this.descriptor.hasMember(name);
  }

  hasMethod(name: string): boolean {
    return this.descriptor.hasMethod(name);
  }

  getClassName(): string {
    return this.descriptor.className;
  }

  getTypeInfo(): TypeInfo {
    return this.descriptor;
  }

  /**
   * Flat `{ member: value }` export. Members without a scalar encoding
   * export as null.
   */
  toJSON(): Record<string, JsonValue> {
    const out: Record<string, JsonValue> = {};
    for (const name of this.getMemberNames()) {
      const member = this.requireMember(name);
      out[name] = member.get(this.target).toJson(member.type);
    }
    return out;
  }

  /** `"age (int): 25"` */
  formatMemberValue(name: string): string {
    const member = this.requireMember(name);
    return `${name} (${member.tag}): ${formatBoxed(member, member.get(this.target))}`;
  }

  describe(): string {
    const d = this.descriptor;
    const lines = [`Class: ${d.className}`, "Members:"];
    for (const name of d.getMemberNames()) {
      lines.push(`  ${name} (${this.requireMember(name).tag})`);
    }
    lines.push("Methods:");
    for (const name of d.getMethodNames()) {
      const method = d.getMethod(name);
      if (method) lines.push(`  ${formatSignature(method)}`);
    }
    return lines.join("\n");
  }

  private requireMember(name: string): MemberDescriptor<C> {
    const member = this.descriptor.getMember(name);
    if (!member) {
      throw new NotFound("member", name, this.descriptor.className);
    }
    return member;
  }
}

/**
 * Base class for reflective types. Subclasses bind themselves to their
 * TypeHandle:
 *
 * ```typescript
 * class Point extends Reflective {
 *   static readonly type = defineType<Point>("Point", reg => reg.member("x", t.double, "x"));
 *   x = 0;
 *   protected reflection() { return Point.type.bind(this); }
 * }
 * ```
 */
export abstract class Reflective implements ReflectiveFacade {
  protected abstract reflection(): ReflectiveFacade;

  getMemberValue(name: string): Boxed {
    return this.reflection().getMemberValue(name);
  }

  setMemberValue(name: string, value: Boxed): void {
    this.reflection().setMemberValue(name, value);
  }

  callMethod(name: string, args: readonly Boxed[] = []): Boxed {
    return this.reflection().callMethod(name, args);
  }

  getMemberNames(): string[] {
    return this.reflection().getMemberNames();
  }

  getMethodNames(): string[] {
    return this.reflection().getMethodNames();
  }

  hasMember(name: string): boolean {
    return this.reflection().hasMember(name);
  }

  hasMethod(name: string): boolean {
    return this.reflection().hasMethod(name);
  }

  getClassName(): string {
    return this.reflection().getClassName();
  }

  getTypeInfo(): TypeInfo {
    return this.reflection().getTypeInfo();
  }

  toJSON(): Record<string, JsonValue> {
    return this.reflection().toJSON();
  }

  formatMemberValue(name: string): string {
    return this.reflection().formatMemberValue(name);
  }

  describe(): string {
    return this.reflection().describe();
  }
}
