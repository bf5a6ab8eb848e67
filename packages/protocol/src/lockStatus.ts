import { z } from 'zod';

export const LOCK_STATUSES = ['started', 'paused', 'resumed', 'stopped', 'heartbeat'] as const;

export const LockStatusSchema = z.enum(LOCK_STATUSES);

export type LockStatus = z.infer<typeof LockStatusSchema>;

/**
 * Status event pushed by the native phone-lock service.
 * Android reports the elapsed time as `duration`; both spellings are accepted.
 */
export const LockStatusEventSchema = z.object({
  status: LockStatusSchema,
  sessionId: z.string().min(1),
  elapsedSeconds: z.number().int().min(0).optional(),
  duration: z.number().int().min(0).optional(),
}).passthrough().transform((event) => ({
  status: event.status,
  sessionId: event.sessionId,
  elapsedSeconds: event.elapsedSeconds ?? event.duration ?? 0,
}));

export type LockStatusEvent = z.output<typeof LockStatusEventSchema>;
