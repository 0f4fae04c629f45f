import { z } from 'zod';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Calendar date, YYYY-MM-DD, that actually exists (no Feb-30)
const calendarDate = z
  .string()
  .regex(DATE_PATTERN, 'Birthday must be a date in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Birthday is not a valid date');

export const createContactSchema = z.object({
  first_name: z.string().trim().min(1, 'First name is required').max(50),
  last_name: z.string().trim().min(1, 'Last name is required').max(50),
  email: z.string().trim().email('Invalid email address').max(255),
  phone_number: z.string().trim().min(10, 'Phone number must be at least 10 characters').max(15),
  birthday: calendarDate,
  extra_info: z.string().max(1000).nullish(),
});

export const updateContactSchema = createContactSchema.partial();

export const contactIdParamsSchema = z.object({
  id: z.coerce.number().int().positive('Contact id must be a positive integer'),
});

// `?first_name=` is no filter at all
const optionalFilter = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

export const listContactsQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(100),
  first_name: optionalFilter,
  last_name: optionalFilter,
  email: optionalFilter,
});

export const upcomingBirthdaysQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});
