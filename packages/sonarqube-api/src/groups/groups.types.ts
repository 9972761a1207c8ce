import type { JsonObject } from '../core/types';

export interface Group {
  id: string;
  name: string;
  description?: string;
}

/**
 * Decoded response of a mutating call, stamped with whether the server state changed.
 */
export type GroupMutationResult = JsonObject & { changed: boolean };
