import { tritName } from '../types/trit.js';
import { ConnectionError } from '../core/errors.js';
import type { Simulation } from '../core/simulation.js';
import type { ConnectionPoint } from './connection-point.js';

/**
 * A bus joining connection points.
 *
 * Resolves one value from its writers and fans it out to its readers.
 * Connection order is kept: with several writers, the first one
 * connected wins.
 */
export class Wire {
  readonly id: number;
  private readonly sim: Simulation;
  private readonly connections: ConnectionPoint[] = [];

  constructor(sim: Simulation) {
    this.sim = sim;
    this.id = sim.allocateWireId();
  }

  /**
   * Resolve the writers and push the result to every reader.
   * No writers: readers are left as they are.
   */
  update(): void {
    const writers = this.connections.filter((c) => c.isWriter());
    const first = writers[0];
    if (!first) {
      return;
    }

    const resolved = first.value;
    if (writers.length > this.sim.config.multiWriterWarnThreshold) {
      this.sim.warn(
        'MULTIPLE_WRITERS',
        {
          wire: this.toString(),
          writers: writers.length,
          values: writers.map((w) => tritName(w.value)),
          resolved: tritName(resolved),
        },
        'More than one writer on this wire, defaulting to first connected value'
      );
    }

    // Snapshot: a reader's cascade may rewire this wire
    for (const connection of [...this.connections]) {
      if (connection.isReader()) {
        connection.setFromWire(resolved);
      }
    }
  }

  /**
   * Attach a point. Throws ConnectionError if it is already on this
   * wire or on any other.
   */
  connect(point: ConnectionPoint): void {
    if (this.has(point)) {
      throw new ConnectionError(`${point.toString()} is already connected to ${this.toString()}`);
    }
    point.attach(this);
    this.connections.push(point);
  }

  /**
   * Detach a point. Throws ConnectionError if it is not on this wire.
   */
  disconnect(point: ConnectionPoint): void {
    const index = this.connections.indexOf(point);
    if (index === -1) {
      throw new ConnectionError(`${point.toString()} is not connected to ${this.toString()}`);
    }
    this.connections.splice(index, 1);
    point.detach();
  }

  disconnectAll(): void {
    for (const connection of this.connections) {
      connection.detach();
    }
    this.connections.length = 0;
  }

  has(point: ConnectionPoint): boolean {
    return this.connections.includes(point);
  }

  getConnections(): readonly ConnectionPoint[] {
    return this.connections;
  }

  writerCount(): number {
    return this.connections.filter((c) => c.isWriter()).length;
  }

  toString(): string {
    return `Wire#${String(this.id)}<${String(this.connections.length)} conns>`;
  }
}
