import { z } from "zod";
import { ROLES } from "../../shared/auth/token.service";
import { optionalText } from "../../shared/validation/fields";

export const usernameSchema = z
  .string({ required_error: "Kullanıcı adı zorunludur" })
  .trim()
  .regex(/^[A-Za-z0-9._-]{3,80}$/, "Kullanıcı adı 3-80 karakter olmalı; harf, rakam, nokta, tire veya alt çizgi içerebilir");

export const passwordSchema = z
  .string({ required_error: "Şifre zorunludur" })
  .min(8, "Şifre en az 8 karakter olmalıdır")
  .max(200, "Şifre en fazla 200 karakter olabilir");

export const createUserSchema = z.object({
  username: usernameSchema,
  email: z.string().trim().email("Geçersiz e-posta adresi").max(120).nullable().optional(),
  password: passwordSchema,
  fullName: optionalText(100),
  role: z.enum(ROLES).default("kullanici"),
  active: z.boolean().optional(),
});

export const updateUserSchema = createUserSchema.omit({ username: true }).partial();

export const loginAttemptsQuerySchema = z.object({
  username: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
