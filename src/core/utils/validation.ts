import { ValidationError } from 'class-validator';
import { FieldError } from '../interfaces';

/**
 * Flatten class-validator errors to one entry per failed field
 */
export function toFieldErrors(errors: ValidationError[]): FieldError[] {
  return errors.map((error) => ({
    field: error.property,
    messages: Object.values(error.constraints ?? {}),
  }));
}
