import { ValidationError } from "../utils/errors.js";

interface TextRule {
  field: string;
  max: number;
  /** Store the trimmed value instead of the original. */
  trim: boolean;
}

export const requireText = (value: string, { field, max, trim }: TextRule): string => {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} must not be empty`, { field });
  }
  const stored = trim ? trimmed : value;
  if (stored.length > max) {
    throw new ValidationError(`${field} must be at most ${max} characters`, {
      field,
      max,
    });
  }
  return stored;
};

export const requirePositiveInt = (
  value: number,
  field: string,
  max: number = Number.MAX_SAFE_INTEGER
): number => {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new ValidationError(`${field} must be an integer between 1 and ${max}`, {
      field,
    });
  }
  return value;
};
