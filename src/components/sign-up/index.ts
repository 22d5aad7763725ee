// Sign-up example components
export { FieldError, type FieldErrorProps } from "./FieldError";

// Form schema and options for React Hook Form
export { signUpFormSchema, PASSWORD_MIN_LENGTH, type SignUpFormData } from "./sign-up-form-schema";
export { signUpFormOpts, defaultSignUp } from "./sign-up-form-opts";
