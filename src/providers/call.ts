/**
 * A chat call bounded by a deadline, whatever the backend does itself.
 */

import { withTimeout } from '../utils/timeout.js';
import { BackendError } from './errors.js';
import type { BackendReply, ChatBackend, ChatRequest } from './types.js';

export interface BoundedCallOptions {
  /** Non-positive disables the deadline */
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * @throws BackendError for every failure, including the deadline passing
 */
export async function callChat(
  backend: ChatBackend,
  request: ChatRequest,
  options: BoundedCallOptions
): Promise<BackendReply> {
  try {
    return await withTimeout((signal) => backend.chat(request, { signal }), options.timeoutMs, {
      parent: options.signal,
      label: `${backend.name} chat request`,
    });
  } catch (error) {
    throw BackendError.from(error);
  }
}
