import { z } from "zod";

export const SCHEMA_VERSION = 1;

export const phaseSchema = z.union([z.literal("focus"), z.literal("shortBreak"), z.literal("longBreak")]);

const boundsSchema = z.object({
  minSeconds: z.number().int().min(1),
  maxSeconds: z.number().int().min(1)
}).refine((b) => b.maxSeconds >= b.minSeconds, { message: "maxSeconds must be at least minSeconds" });

export const adaptiveSettingsSchema = z.object({
  enabled: z.boolean(),
  historySize: z.number().int().min(1).max(100),
  highThreshold: z.number().min(0).max(1),
  lowThreshold: z.number().min(0).max(1),
  focusStepSeconds: z.number().int().min(0),
  breakStepSeconds: z.number().int().min(0),
  bounds: z.object({ focus: boundsSchema, shortBreak: boundsSchema, longBreak: boundsSchema })
}).superRefine((adaptive, ctx) => {
  if (adaptive.lowThreshold >= adaptive.highThreshold) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "lowThreshold must be below highThreshold", path: ["lowThreshold"] });
  }
});

export const defaultAdaptiveSettings: z.infer<typeof adaptiveSettingsSchema> = {
  enabled: true,
  historySize: 10,
  highThreshold: 0.8,
  lowThreshold: 0.4,
  focusStepSeconds: 300,
  breakStepSeconds: 60,
  bounds: {
    focus: { minSeconds: 900, maxSeconds: 3600 },
    shortBreak: { minSeconds: 60, maxSeconds: 900 },
    longBreak: { minSeconds: 300, maxSeconds: 1800 }
  }
};

export const settingsSchema = z.object({
  focusMinutes: z.number().int().min(1),
  shortBreakMinutes: z.number().int().min(1),
  longBreakMinutes: z.number().int().min(1),
  longBreakInterval: z.number().int().min(1),
  autoStartBreaks: z.boolean(),
  autoStartFocus: z.boolean(),
  adaptive: adaptiveSettingsSchema.default(defaultAdaptiveSettings),
  alarmPrecision: z.union([z.literal("minute"), z.literal("second")]).default("second"),
  alarmSound: z.string().min(1).nullable().default(null)
});

export const timestampSchema = z.object({
  wallClock: z.string().datetime({ offset: true }),
  monotonicMs: z.number().min(0)
});

export const sessionRecordSchema = z.object({
  id: z.string().min(1),
  phase: phaseSchema,
  plannedDurationSeconds: z.number().int().positive(),
  actualDurationSeconds: z.number().int().nonnegative(),
  completed: z.boolean(),
  taskId: z.string().nullable().default(null),
  timestamp: timestampSchema,
  note: z.string().nullable().default(null)
}).superRefine((record, ctx) => {
  if (record.actualDurationSeconds > record.plannedDurationSeconds) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "actualDurationSeconds cannot exceed plannedDurationSeconds", path: ["actualDurationSeconds"] });
  }
});

export const journalLineSchema = z.object({
  schemaVersion: z.number().int().min(1),
  record: sessionRecordSchema
});

export const taskSchema = z.object({
  id: z.string().min(1),
  title: z.string().trim().min(1),
  estimatedPomodoros: z.number().int().positive(),
  createdAt: z.string()
});

export const taskPayloadSchema = z.object({
  title: z.string().trim().min(1, "title must not be empty"),
  estimatedPomodoros: z.number().int().positive().optional().default(1)
});

export const taskUpdateSchema = z.object({
  title: z.string().trim().min(1, "title must not be empty").optional(),
  estimatedPomodoros: z.number().int().positive().optional()
});

export const timeOfDaySchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  second: z.number().int().min(0).max(59).optional()
});

export const alarmSchema = z.object({
  id: z.string().min(1),
  label: z.string().default(""),
  timeOfDay: timeOfDaySchema,
  soundRef: z.string().nullable().default(null),
  enabled: z.boolean(),
  repeat: z.union([z.literal("once"), z.literal("daily")]).default("daily"),
  createdAt: z.string()
});

const clockTextSchema = z.string().regex(/^\d{1,2}:\d{2}(:\d{2})?$/, "time must be HH:MM or HH:MM:SS");

/** Accepts either a structured time of day or the "HH:MM[:SS]" text form. */
export const timeOfDayInputSchema = z.union([
  timeOfDaySchema,
  clockTextSchema.transform((text, ctx) => {
    const [hour, minute, second] = text.split(":").map(Number);
    const parsed = timeOfDaySchema.safeParse({ hour, minute, second });
    if (!parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "time is out of range" });
      return z.NEVER;
    }
    return parsed.data;
  })
]);

export const alarmPayloadSchema = z.object({
  label: z.string().optional().default(""),
  timeOfDay: timeOfDayInputSchema,
  soundRef: z.string().min(1).nullable().optional().default(null),
  enabled: z.boolean().optional().default(true),
  repeat: z.union([z.literal("once"), z.literal("daily")]).optional().default("daily")
});

export const alarmUpdateSchema = z.object({
  label: z.string().optional(),
  timeOfDay: timeOfDayInputSchema.optional(),
  soundRef: z.string().min(1).nullable().optional(),
  enabled: z.boolean().optional(),
  repeat: z.union([z.literal("once"), z.literal("daily")]).optional()
});

export const startPayloadSchema = z.object({
  phase: phaseSchema.optional(),
  taskId: z.string().min(1).nullable().optional(),
  note: z.string().nullable().optional()
});

export const notePayloadSchema = z.object({ note: z.string().nullable() });
