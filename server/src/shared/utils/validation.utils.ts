/**
 * Shared validation utilities for route handlers
 */
import type { z } from 'zod';
import { HttpError } from '../errors.js';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export const TICKER_RE = /^[A-Za-z0-9.-]{1,10}$/;

export class ValidationUtils {
  public static validateSymbol(symbol: unknown): ValidationResult {
    const errors: string[] = [];

    if (!symbol || typeof symbol !== 'string') {
      errors.push('Symbol is required');
    } else {
      const trimmed = symbol.trim();
      if (trimmed.length === 0) {
        errors.push('Symbol cannot be empty');
      } else if (trimmed.length > 10) {
        errors.push('Symbol cannot exceed 10 characters');
      } else if (!TICKER_RE.test(trimmed)) {
        errors.push('Symbol can only contain letters, numbers, dots and dashes');
      }
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  /** Upper-cased symbol, or a 400 naming what is wrong with it. */
  public static requireSymbol(symbol: unknown): string {
    const result = ValidationUtils.validateSymbol(symbol);
    if (!result.isValid || typeof symbol !== 'string') {
      throw new HttpError(400, result.errors[0] ?? 'Symbol is required', result.errors);
    }
    return symbol.trim().toUpperCase();
  }

  /** Parses a request body or query with a zod schema; issues become a 400 with one entry per problem. */
  public static parse<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
    const parsed = schema.safeParse(input ?? {});
    if (!parsed.success) {
      const errors = parsed.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`);
      throw new HttpError(400, errors[0] ?? 'Invalid request', errors);
    }
    return parsed.data;
  }
}
