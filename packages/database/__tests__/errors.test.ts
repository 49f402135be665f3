import { describe, expect, it } from 'vitest';

import { getPgErrorCode, isUniqueViolation, sanitizeDBError } from '../errors';

function pgError(message: string, fields: Record<string, string>): Error {
  return Object.assign(new Error(message), fields);
}

describe('pg error helpers', () => {
  it('reads the SQLSTATE code', () => {
    expect(getPgErrorCode(pgError('dup', { code: '23505' }))).toBe('23505');
    expect(getPgErrorCode(new Error('plain'))).toBeUndefined();
    expect(getPgErrorCode('23505')).toBeUndefined();
  });

  it('matches unique violations by constraint', () => {
    const error = pgError('dup', { code: '23505', constraint: 'items_pkey' });

    expect(isUniqueViolation(error)).toBe(true);
    expect(isUniqueViolation(error, 'items_pkey')).toBe(true);
    expect(isUniqueViolation(error, 'other_index')).toBe(false);
    expect(isUniqueViolation(pgError('fk', { code: '23503' }))).toBe(false);
  });

  it('maps errors to client-safe messages', () => {
    expect(sanitizeDBError(new Error('connect ECONNREFUSED 127.0.0.1:5432')))
      .toBe('Database connection error. Please try again later.');
    expect(sanitizeDBError(new Error('canceling statement due to statement timeout')))
      .toBe('Database query timeout. Please try again later.');
    expect(sanitizeDBError(pgError('dup', { code: '23505' })))
      .toBe('A record with this information already exists.');
    expect(sanitizeDBError(pgError('fk', { code: '23503' })))
      .toBe('Referenced record does not exist.');
    expect(sanitizeDBError(new Error('syntax error at or near "SELEC"')))
      .toBe('An unexpected database error occurred. Please try again later.');
  });
});
