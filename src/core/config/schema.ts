import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Project configuration, read from `.refgraph.yaml`. */
export const ConfigSchema = z.object({
  /** Directory document paths are relative to */
  base_dir: z.string().default('.'),
  /** Reserved key that marks an indirection node */
  reference_key: z.string().min(1).default('$ref'),
  /** Maximum indirection hops per resolution */
  max_depth: z.number().int().min(1).default(64),
  /** Glob patterns (relative to base_dir) of component documents to preload */
  components: z.array(z.string()).default([]),
  log_level: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
