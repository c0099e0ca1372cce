import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { seedActivitySchema } from './seed';
import seedActivities from './seed/activities.json';

const activity = (participants: string[]) => ({
  name: 'Chess Club',
  description: 'Learn strategies and compete in chess tournaments',
  schedule: 'Mondays and Fridays, 3:15 PM - 4:45 PM',
  maxParticipants: 10,
  participants,
});

describe('seedActivitySchema', () => {
  it('accepts the bundled activities', () => {
    expect(z.array(seedActivitySchema).safeParse(seedActivities).success).toBe(true);
  });

  it('rejects an activity that lists a participant twice', () => {
    const result = seedActivitySchema.safeParse(activity(['a@school.edu', 'b@school.edu', 'a@school.edu']));
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe('Chess Club lists a participant more than once');
  });

  it('accepts distinct participants', () => {
    expect(seedActivitySchema.safeParse(activity(['a@school.edu', 'b@school.edu'])).success).toBe(true);
  });
});
