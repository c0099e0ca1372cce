import { describe, expect, it } from 'vitest';
import { SCHEMA, isDuplicateEntry } from './mysqlStore';

describe('isDuplicateEntry', () => {
  it('recognises a unique-key violation', () => {
    const err = Object.assign(new Error("Duplicate entry 'Chess Club-a@school.edu' for key 'activity_email'"), {
      code: 'ER_DUP_ENTRY',
    });
    expect(isDuplicateEntry(err)).toBe(true);
  });

  it('ignores other failures', () => {
    expect(isDuplicateEntry(Object.assign(new Error('Lock wait timeout'), { code: 'ER_LOCK_WAIT_TIMEOUT' }))).toBe(false);
    expect(isDuplicateEntry(new Error('Connection lost'))).toBe(false);
    expect(isDuplicateEntry('ER_DUP_ENTRY')).toBe(false);
  });
});

describe('SCHEMA', () => {
  const table = (name: string) => SCHEMA.find(statement => statement.includes(`EXISTS ${name} (`)) ?? '';

  it('compares activity names and emails case-sensitively', () => {
    expect(table('activities')).toContain('name VARCHAR(100) CHARACTER SET utf8mb4 COLLATE utf8mb4_bin PRIMARY KEY');
    expect(table('students')).toContain('email VARCHAR(255) CHARACTER SET utf8mb4 COLLATE utf8mb4_bin PRIMARY KEY');
    expect(table('activity_participants')).toContain(
      'activity_name VARCHAR(100) CHARACTER SET utf8mb4 COLLATE utf8mb4_bin NOT NULL'
    );
    expect(table('activity_participants')).toContain('email VARCHAR(255) CHARACTER SET utf8mb4 COLLATE utf8mb4_bin NOT NULL');
  });
});
