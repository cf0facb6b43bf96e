/**
 * Configuration schema (.gcl/config.json)
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export const ORACLE_KINDS = ['dijkstra', 'bfs'] as const;
export const NODE_POLICIES = ['edges', 'all'] as const;

export const configSchema = z.object({
  /** Graph import settings */
  graph: z
    .object({
      /** Edges imported as one-way when true */
      directed: z.boolean().default(false),
      /** Distance used for edge list lines without a third column */
      default_distance: z.number().nonnegative().finite().default(1),
    })
    .default({}),

  /** Closeness calculation settings */
  closeness: z
    .object({
      oracle: z.enum(ORACLE_KINDS).default('dijkstra'),
      node_policy: z.enum(NODE_POLICIES).default('edges'),
      top: z.number().int().positive().default(10),
    })
    .default({}),

  /** Logging */
  log: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      file: z.string().nullable().default(null),
    })
    .default({}),
});

export type GclConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: GclConfig = configSchema.parse({});
