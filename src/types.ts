import { z } from 'zod';

// Timing Schemas
export const PollTimingSchema = z.object({
  timeoutMs: z.number().positive(),
  intervalMs: z.number().positive()
}).refine(t => t.intervalMs <= t.timeoutMs, { message: 'intervalMs must be <= timeoutMs', path: ['intervalMs'] });

export const InvariantTimingSchema = z.object({
  durationMs: z.number().positive(),
  intervalMs: z.number().positive()
}).refine(t => t.intervalMs <= t.durationMs, { message: 'intervalMs must be <= durationMs', path: ['intervalMs'] });

export const ProfileSchema = z.object({
  description: z.string().optional(),
  timeoutSec: z.number().positive().optional(),
  intervalSec: z.number().positive().optional(),
  durationSec: z.number().positive().optional()
});

export const ProfileFileSchema = z.object({
  profiles: z.record(ProfileSchema).default({}),
  defaults: ProfileSchema.omit({ description: true }).optional()
});

export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileFile = z.infer<typeof ProfileFileSchema>;

export interface Timing {
  timeoutMs: number;
  intervalMs: number;
  durationMs: number;
}

export const EntitySchema = z.object({
  name: z.string().min(1),
  labels: z.record(z.string()).optional(),
  revision: z.number().int().nonnegative().default(0),
  data: z.record(z.unknown()).default({})
});

export type Entity = z.infer<typeof EntitySchema>;

/** Evaluated by the poller; `signal` aborts when the surrounding poll is cancelled. */
export type Predicate = (signal: AbortSignal) => boolean | Promise<boolean>;

export type PollMode = 'until_true' | 'invariant';
export type TaskKind = 'eventually' | 'consistently';
export type TaskState = 'succeeded' | 'failed' | 'cancelled' | 'timed_out';
