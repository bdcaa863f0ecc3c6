/**
 * tritwire demo entry point.
 *
 * Loads configuration, confirms the gate library is available and
 * drives one small circuit: writer -> increment -> reader.
 */

import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './core/logger.js';
import { createSimulation } from './core/simulation.js';
import { GATE_KINDS, MonadicGate } from './gates/index.js';
import { Trit, tritName } from './types/trit.js';

async function main(): Promise<void> {
  const config = await loadConfig(process.env['TRIT_CONFIG_DIR']);
  const logger = createLogger(config.logging);
  const sim = createSimulation({ config, logger });

  logger.info({ gateKinds: GATE_KINDS.length, mode: config.propagation.mode }, 'Done loading gates!');

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
  sim.settle();

  logger.info(
    { input: tritName(writer.value), output: tritName(reader.value), gate: increment.toString() },
    'Demo circuit settled'
  );
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
