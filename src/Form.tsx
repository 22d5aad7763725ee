import { useState, type FormEvent } from "react";
import { useForm } from "react-hook-form";
import { Loader2, UserPlus } from "lucide-react";
import { createBrowserLogger } from "./lib/browser-logger";
import {
  FieldError,
  PASSWORD_MIN_LENGTH,
  signUpFormOpts,
  type SignUpFormData,
} from "./components/sign-up";
import { fieldStyles, formStyles, inputClassName, inputStyles } from "./styles/form-styles";

const log = createBrowserLogger("sign-up-form");

// =============================================================================
// Component Types
// =============================================================================

export interface FormProps {
  /**
   * Called with the parsed values (name trimmed) once the schema accepts them.
   * A rejection is shown above the submit button and the values are kept.
   */
  onSubmit?: (value: SignUpFormData) => void | Promise<void>;
}

function logSubmission(value: SignUpFormData): void {
  log.info("Sign-up submitted", { name: value.name, email: value.email });
}

// =============================================================================
// Main Form Component
// =============================================================================

/**
 * Form - the sign-up form the article builds step by step.
 *
 * - **State**: React Hook Form (`useForm` + `register`)
 * - **Validation**: `signUpFormSchema` through `zodResolver`; a field is checked
 *   once it loses focus, then on every change
 * - **Submission**: blocked while invalid; success resets the form
 *
 * Layout:
 * ```
 * ┌──────────────────────────────────────┐
 * │ Create an account                    │
 * │ Name      [__________________]       │
 * │ Email     [__________________]       │
 * │ Password  [__________________]       │
 * │ [ ] I accept the terms               │
 * │                     [Create account] │
 * └──────────────────────────────────────┘
 * ```
 */
export function Form({ onSubmit = logSubmission }: FormProps) {
  const [welcomeName, setWelcomeName] = useState<string | null>(null);
  const {
    register,
    handleSubmit,
    reset,
    setError,
    formState: { errors, isSubmitting },
  } = useForm<SignUpFormData>(signUpFormOpts);

  const submit = async (value: SignUpFormData) => {
    try {
      await onSubmit(value);
      setWelcomeName(value.name);
      reset();
    } catch (error) {
      log.error("Sign-up submission failed", error instanceof Error ? error : undefined);
      setError("root.submit", {
        type: "submit",
        message: error instanceof Error ? error.message : "Sign-up failed",
      });
    }
  };

  const submitError = errors.root?.submit?.message;

  // submit catches its own failures, so this never rejects
  const onFormSubmit = (e: FormEvent<HTMLFormElement>) => void handleSubmit(submit)(e);

  return (
    <form
      onSubmit={onFormSubmit}
      noValidate
      className={formStyles.container}
      aria-labelledby="sign-up-title"
      data-testid="sign-up-form"
    >
      <h2 id="sign-up-title" className={formStyles.title}>
        Create an account
      </h2>

      {welcomeName && (
        <p role="status" className={formStyles.success} data-testid="sign-up-success">
          Welcome aboard, {welcomeName}!
        </p>
      )}

      {/* Name */}
      <div className={fieldStyles.group}>
        <label htmlFor="name" className={fieldStyles.label}>
          Name
        </label>
        <input
          id="name"
          type="text"
          autoComplete="name"
          {...register("name")}
          aria-invalid={Boolean(errors.name)}
          aria-describedby="name-error"
          className={inputClassName(Boolean(errors.name))}
          data-testid="sign-up-name-input"
        />
        <FieldError id="name-error" error={errors.name} />
      </div>

      {/* Email */}
      <div className={fieldStyles.group}>
        <label htmlFor="email" className={fieldStyles.label}>
          Email
        </label>
        <input
          id="email"
          type="email"
          autoComplete="email"
          {...register("email")}
          aria-invalid={Boolean(errors.email)}
          aria-describedby="email-error"
          className={inputClassName(Boolean(errors.email))}
          data-testid="sign-up-email-input"
        />
        <FieldError id="email-error" error={errors.email} />
      </div>

      {/* Password */}
      <div className={fieldStyles.group}>
        <label htmlFor="password" className={fieldStyles.label}>
          Password
        </label>
        <input
          id="password"
          type="password"
          autoComplete="new-password"
          {...register("password")}
          aria-invalid={Boolean(errors.password)}
          aria-describedby="password-hint password-error"
          className={inputClassName(Boolean(errors.password))}
          data-testid="sign-up-password-input"
        />
        <p id="password-hint" className={fieldStyles.hint}>
          At least {PASSWORD_MIN_LENGTH} characters, including a number.
        </p>
        <FieldError id="password-error" error={errors.password} />
      </div>

      {/* Terms */}
      <div className={fieldStyles.group}>
        <label htmlFor="acceptTerms" className={formStyles.checkboxRow}>
          <input
            id="acceptTerms"
            type="checkbox"
            {...register("acceptTerms")}
            aria-describedby="acceptTerms-error"
            className={inputStyles.checkbox}
            data-testid="sign-up-terms-checkbox"
          />
          I accept the terms
        </label>
        <FieldError id="acceptTerms-error" error={errors.acceptTerms} />
      </div>

      {submitError && (
        <div role="alert" className={formStyles.alert} data-testid="sign-up-submit-error">
          {submitError}
        </div>
      )}

      <button
        type="submit"
        disabled={isSubmitting}
        className={formStyles.submit}
        data-testid="sign-up-submit-button"
      >
        {isSubmitting ? (
          <>
            <Loader2 size={16} className="animate-spin" aria-hidden="true" />
            <span>Creating account...</span>
          </>
        ) : (
          <>
            <UserPlus size={16} aria-hidden="true" />
            <span>Create account</span>
          </>
        )}
      </button>
    </form>
  );
}

export default Form;
