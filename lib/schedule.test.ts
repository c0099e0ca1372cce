import { describe, expect, it } from 'vitest';
import { chessClub, gardenVolunteers, morningFitness, roboticsWorkshop } from '../test-utils/fixtures';
import { filterBySchedule, matchesSchedule } from './schedule';

describe('matchesSchedule', () => {
  it('requires the day to be in the schedule', () => {
    expect(matchesSchedule(chessClub(), { day: 'Monday' })).toBe(true);
    expect(matchesSchedule(chessClub(), { day: 'Tuesday' })).toBe(false);
  });

  it('keeps activities overlapping the window', () => {
    expect(matchesSchedule(morningFitness(), { startTime: '06:00', endTime: '08:00' })).toBe(true);
    expect(matchesSchedule(chessClub(), { startTime: '16:00', endTime: '18:00' })).toBe(true);
    expect(matchesSchedule(chessClub(), { startTime: '06:00', endTime: '08:00' })).toBe(false);
  });

  it('treats touching windows as not overlapping', () => {
    expect(matchesSchedule(chessClub(), { startTime: '16:45', endTime: '18:00' })).toBe(false);
    expect(matchesSchedule(chessClub(), { startTime: '13:00', endTime: '15:15' })).toBe(false);
  });

  it('accepts a one-sided window', () => {
    expect(matchesSchedule(chessClub(), { startTime: '16:00' })).toBe(true);
    expect(matchesSchedule(chessClub(), { endTime: '15:00' })).toBe(false);
  });

  it('never excludes activities without a structured schedule', () => {
    expect(matchesSchedule(gardenVolunteers(), { day: 'Tuesday', startTime: '06:00', endTime: '08:00' })).toBe(true);
  });
});

describe('filterBySchedule', () => {
  it('combines day and window', () => {
    const result = filterBySchedule([chessClub(), morningFitness(), roboticsWorkshop(), gardenVolunteers()], {
      day: 'Friday',
      startTime: '15:00',
      endTime: '18:00',
    });
    expect(result.map(a => a.name)).toEqual(['Chess Club', 'Community Garden Volunteers']);
  });
});
