import type { Trit } from '../types/trit.js';
import { ConnectionError } from '../core/errors.js';
import type { Simulation } from '../core/simulation.js';
import type { Wire } from '../wiring/wire.js';
import { DiadicGate, MonadicGate, type GateOptions } from '../gates/gate.js';

/**
 * Number of memory cells in a tryte.
 */
export const TRYTE_WIDTH = 9;

/**
 * Nine-cell ternary memory register.
 *
 * Every cell is a memory gate; all nine share one control wire, fed
 * through an internal identity gate from the read wire:
 * - read (+): outputs follow the inputs
 * - read (-): outputs follow the negated inputs
 * - read (0): outputs hold, whatever the inputs do
 */
export class Tryte {
  private readonly cells: DiadicGate[];
  private readonly readGate: MonadicGate;

  constructor(sim: Simulation, options: GateOptions = {}) {
    const prefix = options.label ?? 'tryte';
    const control = sim.wire();

    this.readGate = new MonadicGate(sim, 'identity', {
      delayMs: options.delayMs,
      label: `${prefix}.read`,
    });
    this.readGate.setOutputWire(control);

    this.cells = [];
    for (let index = 0; index < TRYTE_WIDTH; index++) {
      const cell = new DiadicGate(sim, 'memory', {
        delayMs: options.delayMs,
        label: `${prefix}.cell${String(index)}`,
      });
      cell.setInputWire2(control);
      this.cells.push(cell);
    }
  }

  setInputWireAt(index: number, wire: Wire): void {
    this.cellAt(index).setInputWire1(wire);
  }

  /**
   * Attach one data wire per cell, cell 0 first.
   */
  setInputWires(wires: readonly Wire[]): void {
    this.assertWidth(wires, 'memory inputs');
    wires.forEach((wire, index) => this.setInputWireAt(index, wire));
  }

  setOutputWireAt(index: number, wire: Wire): void {
    this.cellAt(index).setOutputWire(wire);
  }

  setOutputWires(wires: readonly Wire[]): void {
    this.assertWidth(wires, 'memory outputs');
    wires.forEach((wire, index) => this.setOutputWireAt(index, wire));
  }

  /**
   * Attach the shared read/control signal.
   */
  setReadWire(wire: Wire): void {
    this.readGate.setInputWire(wire);
  }

  /**
   * Current output of every cell, cell 0 first.
   */
  readOutputs(): Trit[] {
    return this.cells.map((cell) => cell.getOutput());
  }

  private cellAt(index: number): DiadicGate {
    const cell = Number.isInteger(index) ? this.cells[index] : undefined;
    if (!cell) {
      throw new ConnectionError(
        `Index not in range [0,${String(TRYTE_WIDTH - 1)}]: ${String(index)}`
      );
    }
    return cell;
  }

  private assertWidth(wires: readonly Wire[], target: string): void {
    if (wires.length !== TRYTE_WIDTH) {
      throw new ConnectionError(
        `Cannot attach ${String(wires.length)} wires to ${String(TRYTE_WIDTH)} ${target}`
      );
    }
  }
}
