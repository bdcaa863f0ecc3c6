import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const PROPAGATION_MODES = ['immediate', 'delayed'] as const;

/**
 * Simulation configuration schema.
 *
 * This is what gets loaded from data/config/simulation.json and what
 * createSimulation() accepts. All fields are optional - defaults are
 * used for missing values.
 */
export const simulationConfigSchema = z.object({
  /** How gate outputs are applied */
  propagation: z
    .object({
      /** immediate: write during the cascade; delayed: schedule on the event queue */
      mode: z.enum(PROPAGATION_MODES).default('immediate'),
      /** Uniform per-gate delay in simulated ms (delayed mode only) */
      gateDelayMs: z.number().finite().nonnegative().default(1),
    })
    .strict()
    .default({}),

  /** Nested gate updates allowed within one synchronous cascade */
  maxCascadeDepth: z.number().int().positive().default(256),

  /** Events Simulation.settle() may fire before giving up */
  maxSettleEvents: z.number().int().positive().default(100_000),

  /** A wire warns when it has more writers than this */
  multiWriterWarnThreshold: z.number().int().min(1).default(1),

  /** Number of recent warnings kept in memory */
  warningRetention: z.number().int().nonnegative().default(100),

  /** Logging configuration */
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      pretty: z.boolean().default(false),
      logDir: z.string().min(1).optional(),
    })
    .strict()
    .default({}),
});

/**
 * Fully resolved configuration (defaults applied).
 */
export type SimulationConfig = z.infer<typeof simulationConfigSchema>;

/**
 * Partial configuration as written by callers or config files.
 */
export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;

export type PropagationMode = (typeof PROPAGATION_MODES)[number];

export const DEFAULT_CONFIG: SimulationConfig = simulationConfigSchema.parse({});
