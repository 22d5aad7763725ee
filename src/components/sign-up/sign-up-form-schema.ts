import { z } from "zod";

export const PASSWORD_MIN_LENGTH = 8;

/**
 * Zod schema for the sign-up form used throughout the article.
 *
 * Fields:
 * - name: Required, surrounding whitespace ignored
 * - email: Required, must look like an address
 * - password: At least 8 characters, at least one digit
 * - acceptTerms: Must be checked
 *
 * No `.optional()` fields: every key has a default value, so an empty
 * input reaches the schema as "" and gets the "required" message.
 */
export const signUpFormSchema = z.object({
  name: z.string().trim().min(1, "Name is required"),
  email: z.string().min(1, "Email is required").email("Enter a valid email address"),
  password: z
    .string()
    .min(PASSWORD_MIN_LENGTH, `Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
    .regex(/\d/, "Password must contain a number"),
  acceptTerms: z.boolean().refine((accepted) => accepted, "You must accept the terms"),
});

/**
 * Input shape of the form. `name` is trimmed only on the parsed output,
 * which is what the submit handler receives; both share one type.
 */
export type SignUpFormData = z.input<typeof signUpFormSchema>;
