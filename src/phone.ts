/**
 * Phone number normalization.
 * Numbers are stored as bare digit strings of a fixed length.
 */
import { ValidationError } from './errors';
import { Field, FieldRule } from './fields';

export const PHONE_DIGITS = 9;

export interface PhoneValidationResult {
  valid: boolean;
  formatted?: string;
  error?: string;
}

export function validateAndFormatPhone(input: string): PhoneValidationResult {
  // Strip everything that is not a digit: spaces, dashes, brackets, a leading +
  const cleaned = input.replace(/[^\d]/g, '');

  if (cleaned.length !== PHONE_DIGITS) {
    return { valid: false, error: `phone must have exactly ${PHONE_DIGITS} digits` };
  }

  return { valid: true, formatted: cleaned };
}

export function normalizePhone(input: string): string {
  const result = validateAndFormatPhone(input);
  if (!result.valid || result.formatted === undefined) {
    throw new ValidationError('phone', result.error ?? 'invalid phone number');
  }
  return result.formatted;
}

const NORMALIZED_PHONE = new RegExp(`^\\d{${PHONE_DIGITS}}$`);

export function isNormalizedPhone(phone: string): boolean {
  return NORMALIZED_PHONE.test(phone);
}

export const phoneRule: FieldRule<string> = {
  kind: 'phone',
  parse: normalizePhone,
  format: (value) => value,
};

export class Phone extends Field<string> {
  constructor(input: string) {
    super(phoneRule, input);
  }

  override get value(): string {
    return this.required();
  }
}
