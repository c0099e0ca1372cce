import { describe, expect, it } from 'vitest';
import { chessClub, emails, gardenVolunteers, morningFitness, roboticsWorkshop } from '../test-utils/fixtures';
import { ActivityCategory } from '../types';
import {
  buildActivityQuery,
  filterActivities,
  formatSchedule,
  formatTime,
  getActivityType,
  getCapacity,
  inferCategory,
} from './activityView';

describe('inferCategory', () => {
  it('matches name and description keywords', () => {
    expect(inferCategory('Soccer Team', 'Join the school soccer team')).toBe(ActivityCategory.SPORTS);
    expect(inferCategory('Drama Club', 'Act, direct, and produce plays')).toBe(ActivityCategory.ARTS);
    expect(inferCategory('Coding Club', 'Build apps')).toBe(ActivityCategory.TECHNOLOGY);
    expect(inferCategory('Food Drive', 'Community service for families')).toBe(ActivityCategory.COMMUNITY);
  });

  it('defaults to academic when nothing matches', () => {
    expect(inferCategory('Chess Club', 'Learn strategies and compete in chess tournaments')).toBe(
      ActivityCategory.ACADEMIC
    );
  });

  it('applies the precedence order to incidental keywords', () => {
    // "smart" contains "art", and arts is checked before technology
    expect(inferCategory('Smart Robotics', 'Build robots')).toBe(ActivityCategory.ARTS);
    expect(inferCategory('Math Club', 'Solve problems as a team')).toBe(ActivityCategory.SPORTS);
  });
});

describe('getActivityType', () => {
  it('prefers the stored category', () => {
    expect(getActivityType({ ...chessClub(), category: ActivityCategory.COMMUNITY })).toBe(ActivityCategory.COMMUNITY);
  });

  it('falls back to the keyword guess', () => {
    expect(getActivityType(morningFitness())).toBe(ActivityCategory.SPORTS);
  });
});

describe('formatSchedule', () => {
  it('formats 24h times on a 12h clock', () => {
    expect(formatTime('15:15')).toBe('3:15 PM');
    expect(formatTime('07:00')).toBe('7:00 AM');
    expect(formatTime('12:00')).toBe('12:00 PM');
    expect(formatTime('00:05')).toBe('12:05 AM');
  });

  it('renders structured schedules', () => {
    expect(formatSchedule(chessClub())).toBe('Monday, Friday, 3:15 PM - 4:45 PM');
  });

  it('falls back to the display string', () => {
    expect(formatSchedule(gardenVolunteers())).toBe('Every other Saturday morning');
  });
});

describe('buildActivityQuery', () => {
  it('sends day and before-school window', () => {
    expect(buildActivityQuery('Monday', 'morning')).toBe('?day=Monday&start_time=06%3A00&end_time=08%3A00');
  });

  it('keeps the weekend selection on the client', () => {
    expect(buildActivityQuery('', 'weekend')).toBe('');
    expect(buildActivityQuery('Saturday', 'weekend')).toBe('?day=Saturday');
  });

  it('is empty without filters', () => {
    expect(buildActivityQuery('', '')).toBe('');
  });
});

describe('filterActivities', () => {
  const all = [chessClub(), roboticsWorkshop(), morningFitness(), gardenVolunteers()];
  const names = (list: { name: string }[]) => list.map(a => a.name);

  it('returns everything with no filters', () => {
    expect(filterActivities(all, { category: 'all', search: '', timeRange: '' })).toHaveLength(4);
  });

  it('keeps weekend activities and those without a structured schedule', () => {
    expect(names(filterActivities(all, { category: 'all', search: '', timeRange: 'weekend' }))).toEqual([
      'Weekend Robotics Workshop',
      'Community Garden Volunteers',
    ]);
  });

  it('filters by category', () => {
    expect(names(filterActivities(all, { category: ActivityCategory.TECHNOLOGY, search: '', timeRange: '' }))).toEqual([
      'Weekend Robotics Workshop',
    ]);
  });

  it('searches name, description and formatted schedule', () => {
    expect(names(filterActivities(all, { category: 'all', search: 'TOURNAMENTS', timeRange: '' }))).toEqual([
      'Chess Club',
    ]);
    expect(names(filterActivities(all, { category: 'all', search: '6:30 am', timeRange: '' }))).toEqual([
      'Morning Fitness',
    ]);
    expect(filterActivities(all, { category: 'all', search: 'underwater', timeRange: '' })).toEqual([]);
  });
});

describe('getCapacity', () => {
  it('flags an activity with one spot left as near full', () => {
    expect(getCapacity(chessClub(emails(9)))).toEqual({
      taken: 9,
      total: 10,
      spotsLeft: 1,
      percentage: 90,
      status: 'near-full',
    });
  });

  it('flags a full activity', () => {
    const capacity = getCapacity(chessClub(emails(10)));
    expect(capacity.spotsLeft).toBe(0);
    expect(capacity.percentage).toBe(100);
    expect(capacity.status).toBe('full');
  });

  it('treats exactly 75% as near full', () => {
    expect(getCapacity({ ...chessClub(emails(3)), maxParticipants: 4 }).status).toBe('near-full');
  });

  it('reports availability below 75%', () => {
    expect(getCapacity(chessClub(emails(2)))).toMatchObject({ spotsLeft: 8, percentage: 20, status: 'available' });
  });
});
