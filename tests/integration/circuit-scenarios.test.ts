/**
 * End-to-end circuits built only through the public entry point.
 */

import { describe, it, expect } from 'vitest';
import {
  ConnectionError,
  DiadicGate,
  GateSumAlternate,
  MonadicGate,
  Trit,
  Tryte,
  TRYTE_WIDTH,
  type ConnectionPoint,
  type Simulation,
  type Wire,
} from '../../src/index.js';
import { createTestSimulation } from '../helpers/factories.js';

describe('Circuit scenarios', () => {
  it('increments (+) to (-) through a gate', () => {
    const { sim } = createTestSimulation();
    const writer = sim.writer();
    const reader = sim.reader();
    const input = sim.wire();
    const output = sim.wire();
    const increment = new MonadicGate(sim, 'increment');

    input.connect(writer);
    increment.setInputWire(input);
    increment.setOutputWire(output);
    output.connect(reader);
    writer.setFromWrite(Trit.PLUS);

    expect(reader.value).toBe(Trit.MINUS);
  });

  it('resolves competing writers to the first connected one', () => {
    const { sim, logger } = createTestSimulation();
    const wire = sim.wire();
    const reader = sim.reader();
    wire.connect(sim.writer(Trit.PLUS));
    wire.connect(sim.writer(Trit.MINUS));
    wire.connect(reader);

    wire.update();

    expect(reader.value).toBe(Trit.PLUS);
    expect(sim.getWarnings('MULTIPLE_WRITERS')).toHaveLength(1);
    expect(logger.calls.warn).toHaveLength(1);
  });

  it('rejects double connection and tolerates a stray disconnect', () => {
    const { sim } = createTestSimulation();
    const point = sim.reader();
    const wire = sim.wire();
    wire.connect(point);

    expect(() => wire.connect(point)).toThrow(ConnectionError);
    expect(() => sim.writer().disconnect()).not.toThrow();
    expect(sim.getWarnings('UNCONNECTED_DISCONNECT')).toHaveLength(1);
  });

  it('stores a tryte under the read line', () => {
    const { sim } = createTestSimulation();
    const tryte = new Tryte(sim);
    const inputs: ConnectionPoint[] = [];
    const outputs: ConnectionPoint[] = [];
    for (let i = 0; i < TRYTE_WIDTH; i++) {
      const inWire = sim.wire();
      const writer = sim.writer();
      inWire.connect(writer);
      tryte.setInputWireAt(i, inWire);
      inputs.push(writer);

      const outWire = sim.wire();
      const reader = sim.reader();
      outWire.connect(reader);
      tryte.setOutputWireAt(i, outWire);
      outputs.push(reader);
    }
    const read = sim.writer();
    const readWire = sim.wire();
    readWire.connect(read);
    tryte.setReadWire(readWire);

    const writeInputs = (value: Trit): void => inputs.forEach((p) => p.setFromWrite(value));
    const outputValues = (): Set<Trit> => new Set(outputs.map((p) => p.value));

    writeInputs(Trit.NEUTRAL);
    read.setFromWrite(Trit.PLUS);
    expect(outputValues()).toEqual(new Set([Trit.NEUTRAL]));

    read.setFromWrite(Trit.NEUTRAL);
    writeInputs(Trit.PLUS);
    expect(outputValues()).toEqual(new Set([Trit.NEUTRAL]));

    read.setFromWrite(Trit.PLUS);
    expect(outputValues()).toEqual(new Set([Trit.PLUS]));

    read.setFromWrite(Trit.MINUS);
    expect(outputValues()).toEqual(new Set([Trit.MINUS]));
  });

  describe('two-trit ripple adder', () => {
    interface RippleAdder {
      a: [ConnectionPoint, ConnectionPoint];
      b: [ConnectionPoint, ConnectionPoint];
      sum: [ConnectionPoint, ConnectionPoint];
      carry: ConnectionPoint;
    }

    /**
     * Low trit: a0 + b0 -> s0, c0.
     * High trit: (a1 + b1) + c0 -> s1. The two partial overflows are
     * never both (+) or both (-), so one more sum digit combines them.
     */
    function buildRippleAdder(sim: Simulation): RippleAdder {
      const driver = (): [ConnectionPoint, Wire] => {
        const writer = sim.writer();
        const wire = sim.wire();
        wire.connect(writer);
        return [writer, wire];
      };
      const probe = (): [ConnectionPoint, Wire] => {
        const reader = sim.reader();
        const wire = sim.wire();
        wire.connect(reader);
        return [reader, wire];
      };

      const [a0, a0Wire] = driver();
      const [b0, b0Wire] = driver();
      const [a1, a1Wire] = driver();
      const [b1, b1Wire] = driver();
      const [s0, s0Wire] = probe();
      const [s1, s1Wire] = probe();
      const [carry, carryWire] = probe();

      const low = new GateSumAlternate(sim, { label: 'low' });
      low.setInputWire1(a0Wire);
      low.setInputWire2(b0Wire);
      low.setOutputWire(s0Wire);
      const c0 = sim.wire();
      low.setOverflowWire(c0);

      const partial = new DiadicGate(sim, 'sum', { label: 'partial' });
      partial.setInputWire1(a1Wire);
      partial.setInputWire2(b1Wire);
      const partialSum = sim.wire();
      const partialCarry = sim.wire();
      partial.setOutputWire(partialSum);
      partial.setOverflowWire(partialCarry);

      const high = new DiadicGate(sim, 'sum', { label: 'high' });
      high.setInputWire1(partialSum);
      high.setInputWire2(c0);
      high.setOutputWire(s1Wire);
      const highCarry = sim.wire();
      high.setOverflowWire(highCarry);

      const carryOut = new DiadicGate(sim, 'sum', { label: 'carry' });
      carryOut.setInputWire1(partialCarry);
      carryOut.setInputWire2(highCarry);
      carryOut.setOutputWire(carryWire);

      return { a: [a0, a1], b: [b0, b1], sum: [s0, s1], carry };
    }

    function toTrits(value: number): [Trit, Trit, Trit] {
      const digits: Trit[] = [];
      let rest = value;
      for (let i = 0; i < 3; i++) {
        let digit = ((rest % 3) + 3) % 3;
        if (digit === 2) digit = -1;
        digits.push(digit === 1 ? Trit.PLUS : digit === -1 ? Trit.MINUS : Trit.NEUTRAL);
        rest = (rest - digit) / 3;
      }
      const [d0 = Trit.NEUTRAL, d1 = Trit.NEUTRAL, d2 = Trit.NEUTRAL] = digits;
      return [d0, d1, d2];
    }

    it.each([
      [0, 0],
      [1, 1],
      [4, 4],
      [-4, 3],
      [2, -3],
      [-4, -4],
    ])('adds %i and %i', (x, y) => {
      const { sim } = createTestSimulation();
      const adder = buildRippleAdder(sim);
      const [x0, x1] = toTrits(x);
      const [y0, y1] = toTrits(y);

      adder.a[0].setFromWrite(x0);
      adder.a[1].setFromWrite(x1);
      adder.b[0].setFromWrite(y0);
      adder.b[1].setFromWrite(y1);

      expect([adder.sum[0].value, adder.sum[1].value, adder.carry.value]).toEqual(toTrits(x + y));
    });
  });
});
