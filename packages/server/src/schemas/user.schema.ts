import { z } from 'zod';

export const PASSWORD_MIN_LENGTH = 5;

const emailSchema = z.string().trim().min(1).email().max(255);
const passwordSchema = z.string().min(PASSWORD_MIN_LENGTH).max(128);

export const createUserSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
  name: z.string().trim().min(1).max(255),
});

export const updateUserSchema = createUserSchema.partial();

export const tokenRequestSchema = z.object({
  email: emailSchema,
  password: z.string().min(1),
});

export const changePasswordSchema = z.object({
  old_password: z.string().min(1),
  new_password: passwordSchema,
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
export type TokenRequestInput = z.infer<typeof tokenRequestSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
