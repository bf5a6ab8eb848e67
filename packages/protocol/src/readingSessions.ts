import { z } from 'zod';

const PageSchema = z.number().int().min(0);
const FocusScoreSchema = z.number().int().min(0).max(100);
const IsoDateTimeSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Expected an ISO-8601 date-time',
});

export const StartSessionRequestSchema = z.object({
  user_book_id: z.string().min(1),
  start_page: PageSchema.optional(),
}).strict();

export type StartSessionRequest = z.infer<typeof StartSessionRequestSchema>;

export const StartSessionResponseSchema = z.object({
  session_id: z.string().min(1),
  started_at: IsoDateTimeSchema,
}).passthrough();

export type StartSessionResponse = z.infer<typeof StartSessionResponseSchema>;

export const EndSessionRequestSchema = z.object({
  end_page: PageSchema,
  focus_score: FocusScoreSchema.optional(),
}).strict();

export type EndSessionRequest = z.infer<typeof EndSessionRequestSchema>;

export const SessionRewardsResponseSchema = z.object({
  coins_earned: z.number().int(),
  exp_earned: z.number().int(),
  bonus_coins: z.number().int().default(0),
  bonus_exp: z.number().int().default(0),
  streak_bonus: z.boolean().default(false),
  daily_goal_bonus: z.boolean().default(false),
}).passthrough();

export type SessionRewardsResponse = z.infer<typeof SessionRewardsResponseSchema>;

export const SessionResultResponseSchema = z.object({
  session_id: z.string().min(1),
  duration: z.number().int().min(0),
  pages_read: z.number().int(),
  streak_days: z.number().int().min(0),
  rewards: SessionRewardsResponseSchema,
  level_up: z.boolean().default(false),
  new_level: z.number().int().nullable().default(null),
  badges_earned: z.array(z.string()).default([]),
}).passthrough();

export type SessionResultResponse = z.infer<typeof SessionResultResponseSchema>;

/**
 * Replay of a session the authority never saw start.
 * `idempotency_key` lets the server reject a second replay of the same local session with 409.
 */
export const SyncSessionRequestSchema = z.object({
  user_book_id: z.string().min(1),
  start_time: IsoDateTimeSchema,
  end_time: IsoDateTimeSchema,
  start_page: PageSchema,
  end_page: PageSchema,
  focus_score: FocusScoreSchema.optional(),
  total_pause_seconds: z.number().int().min(0),
  local_id: z.string().min(1),
  idempotency_key: z.string().min(1),
}).strict();

export type SyncSessionRequest = z.infer<typeof SyncSessionRequestSchema>;

export const SessionResponseSchema = z.object({
  id: z.string().min(1),
  user_book_id: z.string().min(1),
  start_time: IsoDateTimeSchema,
  end_time: IsoDateTimeSchema.nullable().default(null),
  start_page: PageSchema,
  end_page: PageSchema.nullable().default(null),
  duration: z.number().int().min(0).default(0),
  focus_score: FocusScoreSchema.nullable().default(null),
  is_active: z.boolean().default(false),
  is_paused: z.boolean().default(false),
  paused_at: IsoDateTimeSchema.nullable().default(null),
  total_pause_seconds: z.number().int().min(0).default(0),
}).passthrough();

export type SessionResponse = z.infer<typeof SessionResponseSchema>;

// The authority answers a replay with the stored session (`id`); older deployments sent only `session_id`.
export const SyncSessionResponseSchema = z.union([
  SessionResponseSchema.transform((body) => ({ session_id: body.id })),
  z.object({ session_id: z.string().min(1) }).passthrough().transform((body) => ({ session_id: body.session_id })),
]);

export type SyncSessionResponse = z.output<typeof SyncSessionResponseSchema>;

export const ActiveSessionResponseSchema = SessionResponseSchema.nullable();

export type ActiveSessionResponse = z.infer<typeof ActiveSessionResponseSchema>;

export const SessionListResponseSchema = z.object({
  items: z.array(SessionResponseSchema),
  total: z.number().int().min(0),
  page: z.number().int().min(1),
  page_size: z.number().int().min(1),
  has_more: z.boolean(),
}).passthrough();

export type SessionListResponse = z.infer<typeof SessionListResponseSchema>;

// FastAPI-style error body. `detail` may be a message or a list of field errors.
export const ErrorResponseSchema = z.object({
  detail: z.union([
    z.string(),
    z.array(z.object({ msg: z.string() }).passthrough()),
  ]),
}).passthrough();

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
