import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { parseInstant } from './time';

describe('parseInstant', () => {
  it('reads date-times without a zone as UTC', () => {
    expect(parseInstant('2026-03-01T15:00', 'expires_at', true).toISOString()).toBe('2026-03-01T15:00:00.000Z');
    expect(parseInstant('2026-03-01 15:00:30', 'expires_at', true).toISOString()).toBe('2026-03-01T15:00:30.000Z');
  });

  it('honours explicit offsets', () => {
    expect(parseInstant('2026-03-01T15:00:00+02:00', 'expires_at', true).toISOString()).toBe(
      '2026-03-01T13:00:00.000Z'
    );
    expect(parseInstant('2026-03-01T15:00:00Z', 'expires_at', true).toISOString()).toBe('2026-03-01T15:00:00.000Z');
  });

  it('reads a bare date as UTC midnight', () => {
    expect(parseInstant('2026-03-01', 'expires_at', true).toISOString()).toBe('2026-03-01T00:00:00.000Z');
  });

  it('accepts fractional seconds and compact offsets', () => {
    expect(parseInstant('2026-03-01T09:30:00.5+0530', 'expires_at', true).toISOString()).toBe(
      '2026-03-01T04:00:00.500Z'
    );
  });

  it('returns null for an absent optional value', () => {
    expect(parseInstant(undefined, 'starts_at', false)).toBeNull();
    expect(parseInstant('  ', 'starts_at', false)).toBeNull();
  });

  it('rejects a missing required value', () => {
    expect(() => parseInstant('', 'expires_at', true)).toThrow(new ValidationError('expires_at is required'));
  });

  it('rejects unparsable input', () => {
    expect(() => parseInstant('next tuesday', 'starts_at', false)).toThrow('Invalid starts_at format');
  });

  it('rejects loose formats that Date would otherwise accept', () => {
    expect(() => parseInstant('1', 'expires_at', true)).toThrow(new ValidationError('Invalid expires_at format'));
    expect(() => parseInstant('12', 'expires_at', true)).toThrow('Invalid expires_at format');
    expect(() => parseInstant('March 5, 2026 10:00', 'expires_at', true)).toThrow('Invalid expires_at format');
  });

  it('rejects dates that are not on the calendar', () => {
    expect(() => parseInstant('2026-02-30', 'expires_at', true)).toThrow('Invalid expires_at format');
    expect(() => parseInstant('2026-03-01T24:00', 'expires_at', true)).toThrow('Invalid expires_at format');
  });
});
