import { z } from 'zod';

/** Lowercases the domain part; the local part keeps its case. */
export function normalizeEmail(value: string): string {
  const at = value.lastIndexOf('@');
  return at < 0 ? value : value.slice(0, at) + value.slice(at).toLowerCase();
}

const email = z.string().email().transform(normalizeEmail);
const optionalText = z.string().nullish().transform((v) => v ?? null);

export const userRecordSchema = z.object({
  name: z.string().min(2).max(80),
  email,
  password_hash: z.string().regex(/^[0-9a-f]{64}$/, 'must be a SHA-256 hex digest'),
  major: z.string().max(80).nullish().transform((v) => v ?? null),
  year: optionalText,
  avatar: optionalText,
});

export const registerSchema = z.object({
  name: z.string().min(2).max(80),
  email,
  password: z.string(),
  major: z.string().max(80).nullish(),
  year: z.string().nullish(),
});

export const loginSchema = z.object({
  email,
  password: z.string(),
});

// null and omitted fields are both "leave untouched".
export const profileUpdateSchema = z.object({
  name: z.string().min(2).max(80).nullish(),
  major: z.string().max(80).nullish(),
  year: z.string().nullish(),
  avatar: z.string().nullish(),
});

export const courseSchema = z.object({
  code: z.string(),
  title: z.string(),
  instructor: optionalText,
  credits: z.number().int().min(0).max(10).nullish().transform((v) => v ?? null),
  owner_email: email,
});

export const scheduleEntrySchema = z.object({
  owner_email: email,
  title: z.string(),
  day: z.string(),
  start_time: z.string(),
  end_time: z.string(),
  location: optionalText,
  notes: optionalText,
  color: optionalText,
});

export const announcementSchema = z.object({
  title: z.string(),
  body: z.string(),
  visible: z.boolean().default(true),
});

export type UserRecord = z.infer<typeof userRecordSchema>;
export type CourseRecord = z.infer<typeof courseSchema>;
export type ScheduleEntryRecord = z.infer<typeof scheduleEntrySchema>;
export type AnnouncementRecord = z.infer<typeof announcementSchema>;

export type RegisterPayload = z.infer<typeof registerSchema>;
export type LoginPayload = z.infer<typeof loginSchema>;
export type ProfileUpdatePayload = z.infer<typeof profileUpdateSchema>;
