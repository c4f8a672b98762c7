import { IndexError } from '../errors.js';
import type { ConnectionDefinition, ConnectionInput } from './types.js';

export function newConnectionId(): string {
  return `conn-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

function freeze(connection: ConnectionDefinition): ConnectionDefinition {
  return Object.freeze({ ...connection, extraArgs: Object.freeze([...connection.extraArgs]) });
}

/**
 * Ordered, in-memory list of connection definitions. Pure data: no I/O,
 * no validation. Removing an entry shifts later indices down by one;
 * nothing else moves.
 */
export class ConnectionStore {
  private connections: ConnectionDefinition[] = [];

  constructor(private readonly generateId: () => string = newConnectionId) {}

  get size(): number {
    return this.connections.length;
  }

  list(): ConnectionDefinition[] {
    return [...this.connections];
  }

  at(index: number): ConnectionDefinition {
    this.checkIndex(index);
    return this.connections[index];
  }

  getById(id: string): ConnectionDefinition | undefined {
    return this.connections.find((c) => c.id === id);
  }

  indexOf(id: string): number {
    return this.connections.findIndex((c) => c.id === id);
  }

  /** All connections with this name. Names are not unique. */
  findByName(name: string): ConnectionDefinition[] {
    return this.connections.filter((c) => c.name === name);
  }

  /** Append a definition. Keeps a supplied id unless it is already taken. */
  add(input: ConnectionInput): ConnectionDefinition {
    const stored = freeze({ ...input, id: this.claimId(input.id) });
    this.connections.push(stored);
    return stored;
  }

  /** Replace the definition at `index`, keeping its id. */
  update(index: number, input: ConnectionInput): ConnectionDefinition {
    this.checkIndex(index);
    const stored = freeze({ ...input, id: this.connections[index].id });
    this.connections[index] = stored;
    return stored;
  }

  remove(index: number): ConnectionDefinition {
    this.checkIndex(index);
    const [removed] = this.connections.splice(index, 1);
    return removed;
  }

  /** Swap in a freshly loaded list. */
  replaceAll(inputs: readonly ConnectionInput[]): void {
    this.connections = [];
    for (const input of inputs) this.add(input);
  }

  private claimId(requested: string | undefined): string {
    if (requested && !this.getById(requested)) return requested;
    let id = this.generateId();
    while (this.getById(id)) id = this.generateId();
    return id;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.connections.length) {
      throw new IndexError(
        `Connection index ${index} out of range (size ${this.connections.length})`,
        index,
        this.connections.length,
      );
    }
  }
}
