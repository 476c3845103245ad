import type { TypeInfo } from "./descriptors";
import type { TypeRegistry } from "./registry";
import { isPortableTag } from "./tags";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface AccessorPair {
  member: string;
  getter?: string;
  setter?: string;
}

function capitalize(name: string): string {
  return name.length === 0 ? name : name[0].toUpperCase() + name.slice(1);
}

export function validateTypeInfo(info: TypeInfo): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const where = info.className || "<unknown>";

  if (!info.className) {
    errors.push("missing className");
  }

  for (const name of info.getMemberNames()) {
    const sig = info.describeMember(name);
    if (!sig?.tag) {
      errors.push(`${where}.${name}: missing member tag`);
      continue;
    }
    if (!isPortableTag(sig.tag)) {
      warnings.push(`${where}.${name}: non-portable tag ${sig.tag}`);
    }
    if (info.hasMethod(name)) {
      warnings.push(`${where}.${name}: name used by both a member and a method`);
    }
  }

  for (const name of info.getMethodNames()) {
    const sig = info.describeMethod(name);
    if (!sig?.returnTag) {
      errors.push(`${where}.${name}: missing return tag`);
      continue;
    }
    if (sig.paramTags.some(tag => !tag)) {
      errors.push(`${where}.${name}: missing parameter tag`);
    }
    for (const tag of [sig.returnTag, ...sig.paramTags]) {
      if (tag && !isPortableTag(tag)) {
        warnings.push(`${where}.${name}: non-portable tag ${tag}`);
      }
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

export function validateRegistry(registry: TypeRegistry): ValidationResult {
  const results = registry.initializeAll().map(validateTypeInfo);
  const errors = results.flatMap(r => r.errors);
  return {
    valid: errors.length === 0,
    errors,
    warnings: results.flatMap(r => r.warnings),
  };
}

/**
 * Methods that only read or write a member: `getX()` returning X's tag and
 * `setX(x)` taking X's tag and returning void. Bindings use this to avoid
 * exposing the same state twice.
 */
export function findAccessorPairs(info: TypeInfo): AccessorPair[] {
  const pairs: AccessorPair[] = [];

  for (const member of info.getMemberNames()) {
    const tag = info.describeMember(member)?.tag;
    if (!tag) continue;

    const suffix = capitalize(member);
    const getter = info.describeMethod(`get${suffix}`);
    const setter = info.describeMethod(`set${suffix}`);

    const pair: AccessorPair = { member };
    if (getter && getter.paramTags.length === 0 && getter.returnTag === tag) {
      pair.getter = getter.name;
    }
    if (setter && setter.paramTags.length === 1 && setter.paramTags[0] === tag && setter.returnTag === "void") {
      pair.setter = setter.name;
    }
    if (pair.getter || pair.setter) {
      pairs.push(pair);
    }
  }

  return pairs;
}
