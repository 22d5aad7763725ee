import { zodResolver } from "@hookform/resolvers/zod";
import type { UseFormProps } from "react-hook-form";
import { signUpFormSchema, type SignUpFormData } from "./sign-up-form-schema";

/**
 * Empty sign-up form. Terms start unchecked.
 */
export const defaultSignUp: SignUpFormData = {
  name: "",
  email: "",
  password: "",
  acceptTerms: false,
};

/**
 * React Hook Form options for the sign-up form.
 *
 * Fields are first validated when they lose focus, then on every change.
 * Submitting validates everything and hands the handler the parsed values.
 *
 * Usage:
 * ```typescript
 * const { register, handleSubmit } = useForm<SignUpFormData>(signUpFormOpts);
 * ```
 */
export const signUpFormOpts: UseFormProps<SignUpFormData> = {
  defaultValues: defaultSignUp,
  resolver: zodResolver(signUpFormSchema),
  mode: "onTouched",
};
