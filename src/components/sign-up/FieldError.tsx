import { fieldStyles } from "../../styles/form-styles";

export interface FieldErrorProps {
  /** id referenced by the input's `aria-describedby` */
  id: string;
  /** The field's entry in `formState.errors`, if any. */
  error?: { message?: string };
}

/**
 * Validation message of one field. React Hook Form keeps only the first
 * failing rule per field, so there is at most one message to show.
 */
export function FieldError({ id, error }: FieldErrorProps) {
  const message = error?.message;
  if (!message) return null;

  return (
    <p id={id} role="alert" className={fieldStyles.error} data-testid={id}>
      {message}
    </p>
  );
}
