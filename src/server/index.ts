/**
 * Live state-sync server: public API
 *
 * TYPES:
 *   - IStateService      - The service interface contract
 *   - StateDocument      - Class name plus typed member values
 *   - TypeDocument       - Member and method signatures
 *   - ServerEvent        - WebSocket events (server -> client)
 *   - ClientCommand      - WebSocket commands (client -> server)
 *
 * IMPLEMENTATION:
 *   - StateServer        - The HTTP/WebSocket server
 *   - StateSession       - Transport-free command handling
 *   - startStateServer() - Quick start function
 */

export type {
  IStateService,
  SerializedMember,
  StateDocument,
  TypeDocument,
  ServerEvent,
  ClientCommand,
  CommandResult,
} from './stateService';

export { StateServer } from './stateServer';
export { StateSession, MalformedCommand, parseCommand, parseArgs, errorEvent } from './stateSession';
export { serializeState, serializeType, encodeResult, coerceValue } from './stateSerializer';

import type { ReflectiveFacade } from '../reflect';
import type { ServerConfig } from '../config';
import { StateServer } from './stateServer';

/**
 * Serve one reflective instance.
 *
 * @example
 * ```typescript
 * import { startStateServer } from 'reflectkit';
 *
 * // `person` is any Reflective instance
 * const server = await startStateServer(person, { port: 8080 });
 * // REST at http://localhost:8080/api/object
 * // WebSocket at ws://localhost:8080/ws
 * ```
 */
export async function startStateServer(
  target: ReflectiveFacade,
  config: Partial<ServerConfig> = {}
): Promise<StateServer> {
  const server = new StateServer(target, config);
  await server.start();
  return server;
}

/**
 * # REST Endpoints
 * - GET  /                           - static viewer page (config.staticDir)
 * - GET  /health                     - { status, clients }
 * - GET  /api/object                 - StateDocument
 * - GET  /api/type                   - TypeDocument
 * - POST /api/object/members/:name   - body { value } -> StateDocument
 * - POST /api/object/methods/:name   - body { args? } -> { result }
 *
 * Errors: { error, code? } with 404 for unknown names, 400 for other
 * reflection errors and malformed bodies, 500 otherwise.
 *
 * # WebSocket Protocol
 * Server events:
 * - { type: 'state', className, members, timestamp }
 * - { type: 'update_success', field }
 * - { type: 'method_success', method, result }
 * - { type: 'pong' }
 * - { type: 'error', message, code? }
 *
 * Client commands:
 * - { type: 'update', field, value }
 * - { type: 'method', name, args? }
 * - { type: 'ping' }
 */
