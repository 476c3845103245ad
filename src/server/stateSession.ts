/**
 * State Session - Applies client commands to one reflective instance
 *
 * Transport-free: the HTTP routes and the WebSocket handler both delegate
 * here, so every protocol rule lives in one place.
 */

import {
  ArityMismatch,
  NotFound,
  isReflectionError,
  type JsonValue,
  type ReflectiveFacade,
} from '../reflect';
import { coerceValue, encodeResult, serializeState, serializeType } from './stateSerializer';
import type {
  ClientCommand,
  CommandResult,
  IStateService,
  ServerEvent,
  StateDocument,
  TypeDocument,
} from './stateService';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A client message or request body that does not have the protocol's shape.
 */
export class MalformedCommand extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedCommand';
  }
}

/**
 * Method arguments from a message or request body: absent means none.
 */
export function parseArgs(value: unknown): unknown[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new MalformedCommand('Malformed method call: "args" must be an array');
  }
  return value;
}

/**
 * Parse and shape-check one WebSocket message.
 */
export function parseCommand(raw: string): ClientCommand {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new MalformedCommand(`Malformed message: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(data) || typeof data.type !== 'string') {
    throw new MalformedCommand('Malformed message: missing "type"');
  }

  switch (data.type) {
    case 'update':
      if (typeof data.field !== 'string' || data.field === '') {
        throw new MalformedCommand('Malformed update: missing "field"');
      }
      return { type: 'update', field: data.field, value: data.value };
    case 'method':
      if (typeof data.name !== 'string' || data.name === '') {
        throw new MalformedCommand('Malformed method call: missing "name"');
      }
      const args = parseArgs(data.args);
      return args === undefined ? { type: 'method', name: data.name } : { type: 'method', name: data.name, args };
    case 'ping':
      return { type: 'ping' };
    default:
      throw new MalformedCommand(`Unknown command: ${data.type}`);
  }
}

export function errorEvent(e: unknown): ServerEvent {
  const message = e instanceof Error ? e.message : String(e);
  return isReflectionError(e) ? { type: 'error', message, code: e.code } : { type: 'error', message };
}

export class StateSession implements IStateService {
  private lastBroadcast: string | undefined;

  constructor(
    readonly target: ReflectiveFacade,
    private readonly now: () => number = Date.now
  ) {}

  getState(): StateDocument {
    return serializeState(this.target);
  }

  getType(): TypeDocument {
    return serializeType(this.target);
  }

  /**
   * Current state as a broadcastable event. A member that cannot be read
   * (its field holds a value outside its tag) yields an error event instead.
   */
  stateEvent(): ServerEvent {
    const { key, event } = this.snapshot();
    this.lastBroadcast = key;
    return event;
  }

  /**
   * True when the state differs from the last one handed out by stateEvent().
   */
  hasChanged(): boolean {
    return this.snapshot().key !== this.lastBroadcast;
  }

  private snapshot(): { key: string; event: ServerEvent } {
    try {
      const state = this.getState();
      return { key: JSON.stringify(state), event: { type: 'state', timestamp: this.now(), ...state } };
    } catch (e) {
      const event = errorEvent(e);
      return { key: JSON.stringify(event), event };
    }
  }

  updateMember(field: string, value: unknown): StateDocument {
    const sig = this.target.getTypeInfo().describeMember(field);
    if (!sig) {
      throw new NotFound('member', field, this.target.getClassName());
    }
    this.target.setMemberValue(field, coerceValue(sig.tag, value, `update of ${field}`));
    return this.getState();
  }

  invokeMethod(name: string, args: unknown[] = []): JsonValue {
    const sig = this.target.getTypeInfo().describeMethod(name);
    if (!sig) {
      throw new NotFound('method', name, this.target.getClassName());
    }
    if (args.length !== sig.paramTags.length) {
      throw new ArityMismatch(name, sig.paramTags.length, args.length);
    }
    const boxed = args.map((arg, i) => coerceValue(sig.paramTags[i], arg, `${name} argument ${i + 1}`));
    return encodeResult(sig.returnTag, this.target.callMethod(name, boxed));
  }

  /**
   * Apply one raw WebSocket message. Failures become an error reply; they
   * never leave the instance half-updated.
   */
  handleMessage(raw: string): CommandResult {
    try {
      const cmd = parseCommand(raw);
      switch (cmd.type) {
        case 'update':
          this.updateMember(cmd.field, cmd.value);
          return { reply: { type: 'update_success', field: cmd.field }, stateChanged: true };
        case 'method': {
          const result = this.invokeMethod(cmd.name, cmd.args);
          return { reply: { type: 'method_success', method: cmd.name, result }, stateChanged: true };
        }
        case 'ping':
          return { reply: { type: 'pong' }, stateChanged: false };
      }
    } catch (e) {
      return { reply: errorEvent(e), stateChanged: false };
    }
  }
}
