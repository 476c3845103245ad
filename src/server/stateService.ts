/**
 * State Service - Contract for live viewing and editing of one reflective instance
 *
 * Clients see the instance as a state document (class name plus typed
 * member values) and change it through member updates and method calls.
 * Every type here is JSON-serializable.
 */

import type { JsonValue, MemberSignature, MethodSignature, TypeTag } from '../reflect';

// ============================================================
// STATE TYPES
// ============================================================

/**
 * One member as seen by clients
 */
export interface SerializedMember {
  type: TypeTag;
  /** Scalar encoding; null for tags without one */
  value: JsonValue;
}

/**
 * Full state of the served instance
 */
export interface StateDocument {
  className: string;
  members: Record<string, SerializedMember>;
}

/**
 * Type description served at /api/type
 */
export interface TypeDocument {
  className: string;
  members: MemberSignature[];
  methods: MethodSignature[];
}

// ============================================================
// WEBSOCKET PROTOCOL
// ============================================================

/**
 * Server -> client
 */
export type ServerEvent =
  | ({ type: 'state'; timestamp: number } & StateDocument)
  | { type: 'update_success'; field: string }
  | { type: 'method_success'; method: string; result: JsonValue }
  | { type: 'pong' }
  | { type: 'error'; message: string; code?: string };

/**
 * Client -> server. `value` and `args` may be strings; they are coerced by
 * the target's tags.
 */
export type ClientCommand =
  | { type: 'update'; field: string; value: unknown }
  | { type: 'method'; name: string; args?: unknown[] }
  | { type: 'ping' };

/**
 * Outcome of one client command
 */
export interface CommandResult {
  reply: ServerEvent;
  /** True when the instance may have changed and clients need fresh state */
  stateChanged: boolean;
}

// ============================================================
// SERVICE INTERFACE
// ============================================================

export interface IStateService {
  getState(): StateDocument;
  getType(): TypeDocument;
  updateMember(field: string, value: unknown): StateDocument;
  invokeMethod(name: string, args?: unknown[]): JsonValue;
}
