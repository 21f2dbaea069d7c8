import { z } from 'zod';

const USER_ID_REGEX = /^[a-zA-Z0-9._-]+$/;

export const UserIdSchema = z
  .string()
  .trim()
  .min(2, 'Username must be at least 2 characters')
  .max(64, 'Username must be at most 64 characters')
  .regex(USER_ID_REGEX, 'Username may only contain letters, digits, dots, underscores, and hyphens');

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(128, 'Password must be at most 128 characters');

export const DisplayNameSchema = z.string().trim().min(1, 'Name is required').max(255);

export const EmailSchema = z.string().trim().email('Invalid email address').max(255);

export const SignupRequestSchema = z.object({
  id: UserIdSchema,
  password: PasswordSchema,
  name: DisplayNameSchema,
  email: EmailSchema,
});

export const LoginRequestSchema = z.object({
  id: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export const ProfileRequestSchema = z.object({
  name: DisplayNameSchema,
  email: EmailSchema,
});

export const PasswordChangeRequestSchema = z.object({
  currentPassword: z.string().min(1, 'Current password is required'),
  newPassword: PasswordSchema,
});

export const DeleteAccountRequestSchema = z.object({
  password: z.string().min(1).optional(),
});

export const PublicUserResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export const AccountResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  groupId: z.string(),
});

export type SignupRequest = z.infer<typeof SignupRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type ProfileRequest = z.infer<typeof ProfileRequestSchema>;
export type PasswordChangeRequest = z.infer<typeof PasswordChangeRequestSchema>;
export type DeleteAccountRequest = z.infer<typeof DeleteAccountRequestSchema>;
export type PublicUserResponse = z.infer<typeof PublicUserResponseSchema>;
export type AccountResponse = z.infer<typeof AccountResponseSchema>;
