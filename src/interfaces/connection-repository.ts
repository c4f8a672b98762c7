import type { ConnectionDefinition, ConnectionInput } from '../connections/types.js';

/**
 * Persistence boundary for connection definitions. Load order is list order.
 * Definitions loaded without an id are given one by the store.
 */
export interface IConnectionRepository {
  load(): ConnectionInput[];
  save(connections: readonly ConnectionDefinition[]): void;
}
