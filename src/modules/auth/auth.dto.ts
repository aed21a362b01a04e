import { z } from "zod";
import { optionalText } from "../../shared/validation/fields";
import { passwordSchema, usernameSchema } from "../users/user.dto";

export const loginSchema = z.object({
  username: z
    .string({ required_error: "Kullanıcı adı zorunludur" })
    .trim()
    .min(1, "Kullanıcı adı zorunludur")
    .max(80),
  password: z.string({ required_error: "Şifre zorunludur" }).min(1, "Şifre zorunludur").max(200),
});

export const setupSchema = z.object({
  username: usernameSchema,
  email: z.string().trim().email("Geçersiz e-posta adresi").max(120).nullable().optional(),
  password: passwordSchema,
  fullName: optionalText(100),
});

export type LoginInput = z.infer<typeof loginSchema>;
export type SetupInput = z.infer<typeof setupSchema>;
