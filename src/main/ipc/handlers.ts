/**
 * Handler Registration Utilities
 *
 * WHY THIS FILE EXISTS:
 * - Keeps an in-process registry of channel handlers that the interactive surface invokes
 * - Wraps all handlers in try-catch blocks so one failure never crashes the process
 * - Logs all calls with their duration for debugging
 * - Turns thrown errors into IPCErrorResponse, tagged with the failing pipeline stage
 */

import { SubtitleAssistantError } from '../errors';
import {
  IPCErrorResponse,
  IPCEventMap,
  IPCInvokeMap,
  IPCResult,
  InvokeChannel,
} from '../../types/ipc';

/**
 * What a handler gets besides its request: a way to emit events back to the caller
 * and the caller's abandonment flag.
 */
export interface HandlerContext {
  send<E extends keyof IPCEventMap>(channel: E, payload: IPCEventMap[E]): void;
  isAbandoned(): boolean;
}

export type IPCHandler<C extends InvokeChannel> = (
  context: HandlerContext,
  request: IPCInvokeMap[C]['request']
) => Promise<IPCResult<IPCInvokeMap[C]['response']>>;

type HandlerMap = { [C in InvokeChannel]: IPCHandler<C> };
type HandlerRegistry = Partial<HandlerMap>;

const registry: HandlerRegistry = {};

/** Context for callers that neither listen for events nor abandon jobs */
export const silentContext: HandlerContext = {
  send: () => undefined,
  isAbandoned: () => false,
};

/**
 * Register a handler for a channel, replacing any previous one
 *
 * @example
 * registerHandler(IPC_CHANNELS.READ_TEXT_FILE, handleReadTextFile);
 */
export function registerHandler<C extends InvokeChannel>(channel: C, handler: HandlerMap[C]): void {
  console.log(`[IPC] Registering handler for channel: ${channel}`);
  registry[channel] = handler;
}

export function unregisterHandler(channel: InvokeChannel): void {
  console.log(`[IPC] Unregistering handler for channel: ${channel}`);
  delete registry[channel];
}

export function hasHandler(channel: InvokeChannel): boolean {
  return registry[channel] !== undefined;
}

/**
 * Call the handler registered for `channel`.
 *
 * Never rejects: a missing handler or a thrown error comes back as IPCErrorResponse.
 */
export async function invoke<C extends InvokeChannel>(
  channel: C,
  request: IPCInvokeMap[C]['request'],
  context: HandlerContext = silentContext
): Promise<IPCResult<IPCInvokeMap[C]['response']>> {
  const handler: IPCHandler<C> | undefined = registry[channel];
  if (!handler) {
    const err: IPCErrorResponse = { success: false, error: `No handler registered for '${channel}'` };
    return err;
  }

  const startTime = Date.now();
  console.log(`[IPC] Incoming call to '${channel}'`);

  try {
    const result = await handler(context, request);
    const duration = Date.now() - startTime;
    console.log(`[IPC] Call to '${channel}' completed (${duration}ms)`);
    return result;
  } catch (error) {
    console.error(`[IPC] Error in handler '${channel}':`, error);

    const errorResponse: IPCErrorResponse = {
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error occurred',
      details: error instanceof Error ? error.stack : String(error),
      stage: error instanceof SubtitleAssistantError ? error.stage : undefined,
    };
    return errorResponse;
  }
}
