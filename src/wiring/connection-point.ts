import { Trit, isTrit, tritName } from '../types/trit.js';
import { ConnectionError, InvalidValueError } from '../core/errors.js';
import type { GateId, Simulation } from '../core/simulation.js';
import type { Wire } from './wire.js';

/**
 * What a terminal does on its wire.
 * - writer: contributes its value to the wire's resolved value
 * - reader: receives the wire's resolved value
 * - high-impedance: attached but neither reads nor writes
 */
export type ConnectionRole = 'writer' | 'reader' | 'high-impedance';

const ROLE_LABELS: Readonly<Record<ConnectionRole, string>> = {
  writer: 'Writer',
  reader: 'Reader',
  'high-impedance': 'High impedance',
};

function assertTrit(value: unknown): asserts value is Trit {
  if (!isTrit(value)) {
    throw new InvalidValueError(value);
  }
}

/**
 * A terminal with a fixed role, a current value, an optional owning
 * gate (by arena handle) and at most one attached wire.
 */
export class ConnectionPoint {
  readonly role: ConnectionRole;
  readonly owner: GateId | null;
  private readonly sim: Simulation;
  private state: Trit;
  private wire: Wire | null = null;

  constructor(sim: Simulation, role: ConnectionRole, value: Trit = Trit.NEUTRAL, owner: GateId | null = null) {
    assertTrit(value);
    this.sim = sim;
    this.role = role;
    this.state = value;
    this.owner = owner;
  }

  get value(): Trit {
    return this.state;
  }

  getState(): Trit {
    return this.state;
  }

  /**
   * Display name of the current value, e.g. `(+)`.
   */
  getName(): string {
    return tritName(this.state);
  }

  isReader(): boolean {
    return this.role === 'reader';
  }

  isWriter(): boolean {
    return this.role === 'writer';
  }

  hasWire(): boolean {
    return this.wire !== null;
  }

  getWire(): Wire | null {
    return this.wire;
  }

  /**
   * Attach to a wire. Throws ConnectionError if already attached.
   */
  connect(wire: Wire): void {
    if (this.wire) {
      throw new ConnectionError(`${this.toString()} already connected to ${this.wire.toString()}`);
    }
    wire.connect(this);
  }

  /**
   * Detach from the current wire and return it. Without a wire this
   * only warns and returns undefined.
   */
  disconnect(): Wire | undefined {
    const wire = this.wire;
    if (!wire) {
      this.sim.warn('UNCONNECTED_DISCONNECT', { point: this.toString() }, 'No wire to disconnect');
      return undefined;
    }
    wire.disconnect(this);
    return wire;
  }

  /**
   * Receive the resolved value of the wire. Readers only; the owning
   * gate (if any) recomputes afterwards.
   */
  setFromWire(value: Trit): void {
    if (!this.isReader()) {
      this.sim.warn(
        'ROLE_MISMATCH',
        { point: this.toString(), value: tritName(value) },
        'Attempting to set the state of a writer/high impedance point from a wire'
      );
      return;
    }

    this.state = value;
    if (this.owner !== null) {
      this.sim.notifyOwner(this.owner);
    }
  }

  /**
   * Drive a new value. Non-readers only; the attached wire (if any)
   * updates afterwards. Throws InvalidValueError outside the domain.
   */
  setFromWrite(value: Trit): void {
    assertTrit(value);
    if (this.isReader()) {
      this.sim.warn(
        'ROLE_MISMATCH',
        { point: this.toString(), value: tritName(value) },
        'Attempting to write to a reading connection point'
      );
      return;
    }

    this.state = value;
    this.wire?.update();
  }

  /**
   * Record the wire this point joined. Called by Wire only.
   * @internal
   */
  attach(wire: Wire): void {
    if (this.wire) {
      throw new ConnectionError(`${this.toString()} already connected to ${this.wire.toString()}`);
    }
    this.wire = wire;
  }

  /**
   * Forget the wire. Called by Wire only.
   * @internal
   */
  detach(): void {
    this.wire = null;
  }

  toString(): string {
    return `ConnectionPoint<${ROLE_LABELS[this.role]},${this.getName()}>`;
  }
}
