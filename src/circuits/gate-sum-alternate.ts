import type { Trit } from '../types/trit.js';
import type { Simulation } from '../core/simulation.js';
import type { Wire } from '../wiring/wire.js';
import { DiadicGate, MonadicGate, type Gate, type GateOptions } from '../gates/gate.js';
import type { DiadicKind, MonadicKind } from '../gates/transfer.js';

/**
 * Wiring surface shared by the table-driven `sum` gate and the
 * composite adder, so either can be dropped into a circuit.
 */
export interface Adder {
  setInputWire1(wire: Wire): void;
  setInputWire2(wire: Wire): void;
  setOutputWire(wire: Wire): void;
  setOverflowWire(wire: Wire): void;
  getOutput(): Trit;
  getOverflow(): Trit | null;
}

/**
 * Balanced-ternary adder built only from primitive gates.
 *
 *   sum      = ((a = -1) ^ (b - 1)) v ((a = 0) ^ b) v ((a = 1) ^ (b + 1))
 *   overflow = consensus(a, b)
 *
 * where `= -1` is isLow, `= 0` isNeutral, `= 1` isHigh, `- 1` decrement,
 * `+ 1` increment, `^` and, `v` or. Behaves exactly like a `sum` gate.
 */
export class GateSumAlternate implements Adder {
  private readonly identityA: MonadicGate;
  private readonly identityB: MonadicGate;
  private readonly outputGate: DiadicGate;
  private readonly overflowGate: DiadicGate;
  /** Every internal gate, in topological order */
  private readonly gates: Gate[];

  constructor(sim: Simulation, options: GateOptions = {}) {
    const prefix = options.label ?? 'sumAlternate';
    const gateOptions = (name: string): GateOptions => ({
      delayMs: options.delayMs,
      label: `${prefix}.${name}`,
    });
    const monadic = (kind: MonadicKind, name: string): MonadicGate =>
      new MonadicGate(sim, kind, gateOptions(name));
    const diadic = (kind: DiadicKind, name: string): DiadicGate =>
      new DiadicGate(sim, kind, gateOptions(name));

    const a = sim.wire();
    const b = sim.wire();

    this.identityA = monadic('identity', 'a');
    this.identityA.setOutputWire(a);
    this.identityB = monadic('identity', 'b');
    this.identityB.setOutputWire(b);

    // A = (a = -1) ^ (b - 1)
    const lowA = monadic('isLow', 'lowA');
    const lowDec = monadic('decrement', 'lowDec');
    const lowAnd = diadic('and', 'lowAnd');
    const lowTerm = this.join(sim, lowA, lowDec, lowAnd, a, b);

    // B = (a = 0) ^ b
    const midA = monadic('isNeutral', 'midA');
    const midWire = sim.wire();
    midA.setInputWire(a);
    midA.setOutputWire(midWire);
    const midAnd = diadic('and', 'midAnd');
    midAnd.setInputWire1(midWire);
    midAnd.setInputWire2(b);
    const midTerm = sim.wire();
    midAnd.setOutputWire(midTerm);

    // C = (a = 1) ^ (b + 1)
    const highA = monadic('isHigh', 'highA');
    const highInc = monadic('increment', 'highInc');
    const highAnd = diadic('and', 'highAnd');
    const highTerm = this.join(sim, highA, highInc, highAnd, a, b);

    // (A v B) v C
    const firstOr = diadic('or', 'or1');
    firstOr.setInputWire1(lowTerm);
    firstOr.setInputWire2(midTerm);
    const partial = sim.wire();
    firstOr.setOutputWire(partial);

    this.outputGate = diadic('or', 'or2');
    this.outputGate.setInputWire1(highTerm);
    this.outputGate.setInputWire2(partial);

    // Consensus is the equivalent of an overflow/underflow
    this.overflowGate = diadic('consensus', 'overflow');
    this.overflowGate.setInputWire1(a);
    this.overflowGate.setInputWire2(b);

    this.gates = [
      this.identityA,
      this.identityB,
      lowA,
      lowDec,
      lowAnd,
      midA,
      midAnd,
      highA,
      highInc,
      highAnd,
      firstOr,
      this.outputGate,
      this.overflowGate,
    ];

    // Internal outputs start at (0); bring every stage in line with
    // its (0) inputs before anything outside is connected.
    for (const gate of this.gates) {
      gate.recompute();
    }

    sim.logger.debug({ adder: prefix, gates: this.gates.length }, 'Composite adder built');
  }

  setInputWire1(wire: Wire): void {
    this.identityA.setInputWire(wire);
  }

  setInputWire2(wire: Wire): void {
    this.identityB.setInputWire(wire);
  }

  setOutputWire(wire: Wire): void {
    this.outputGate.setOutputWire(wire);
  }

  setOverflowWire(wire: Wire): void {
    this.overflowGate.setOutputWire(wire);
  }

  getOutput(): Trit {
    return this.outputGate.getOutput();
  }

  getOverflow(): Trit {
    return this.overflowGate.getOutput();
  }

  gateCount(): number {
    return this.gates.length;
  }

  /**
   * Wire `test(a) ^ shift(b)` and return the term's output wire.
   */
  private join(
    sim: Simulation,
    test: MonadicGate,
    shift: MonadicGate,
    and: DiadicGate,
    a: Wire,
    b: Wire
  ): Wire {
    const tested = sim.wire();
    test.setInputWire(a);
    test.setOutputWire(tested);

    const shifted = sim.wire();
    shift.setInputWire(b);
    shift.setOutputWire(shifted);

    and.setInputWire1(tested);
    and.setInputWire2(shifted);
    const term = sim.wire();
    and.setOutputWire(term);
    return term;
  }
}
