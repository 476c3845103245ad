/**
 * State Serializer - Convert a reflective instance to JSON for web transport,
 * and inbound JSON values back to boxed values
 */

import {
  Boxed,
  TypeMismatch,
  builtinToken,
  type JsonValue,
  type ReflectiveFacade,
  type TypeTag,
} from '../reflect';
import type { StateDocument, TypeDocument } from './stateService';

// ============================================================
// OUTBOUND
// ============================================================

export function serializeState(target: ReflectiveFacade): StateDocument {
  const info = target.getTypeInfo();
  const values = target.toJSON();
  const members: StateDocument['members'] = {};

  for (const name of info.getMemberNames()) {
    const sig = info.describeMember(name);
    if (!sig) continue;
    members[name] = { type: sig.tag, value: values[name] ?? null };
  }

  return { className: info.className, members };
}

export function serializeType(target: ReflectiveFacade): TypeDocument {
  const schema = target.getTypeInfo().toJSON();
  return { className: schema.className, members: schema.members, methods: schema.methods };
}

/**
 * Encode a method result. Void and tags without a scalar encoding give null.
 */
export function encodeResult(tag: TypeTag, result: Boxed): JsonValue {
  if (result.isEmpty()) return null;
  const token = builtinToken(tag);
  return token ? result.toJson(token) : null;
}

// ============================================================
// INBOUND
// ============================================================

function coerceString(tag: TypeTag, raw: string): unknown {
  switch (tag) {
    case 'int': {
      const n = parseInt(raw, 10);
      return Number.isNaN(n) ? raw : n;
    }
    case 'double':
    case 'float': {
      const n = parseFloat(raw);
      if (Number.isNaN(n)) return raw;
      return tag === 'float' ? Math.fround(n) : n;
    }
    case 'bool':
      return raw === 'true' || raw === '1';
    default:
      return raw;
  }
}

/**
 * Box an inbound value against a member or parameter tag. Strings are parsed
 * by tag first; a value that still does not fit fails with TypeMismatch.
 */
export function coerceValue(tag: TypeTag, raw: unknown, context?: string): Boxed {
  const token = builtinToken(tag);
  if (!token) {
    throw new TypeMismatch('portable tag', tag, context);
  }
  const value = typeof raw === 'string' ? coerceString(tag, raw) : raw;
  return Boxed.of(token, value, context);
}
