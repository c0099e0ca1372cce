import { createApp } from '../app';
import { issueToken } from '../middleware/auth';
import { ActivityCategory, StaffRole } from '../types';
import type { Activity } from '../types';
import { TEST_JWT_SECRET, createMemoryStore, testTeacher } from './memoryStore';
import type { MemoryStore, MemoryStoreSeed } from './memoryStore';

export const emails = (count: number, prefix = 'student'): string[] =>
  Array.from({ length: count }, (_, i) => `${prefix}${i + 1}@school.edu`);

export const chessClub = (participants: string[] = emails(9)): Activity => ({
  name: 'Chess Club',
  description: 'Learn strategies and compete in chess tournaments',
  schedule: 'Mondays and Fridays, 3:15 PM - 4:45 PM',
  scheduleDetails: { days: ['Monday', 'Friday'], startTime: '15:15', endTime: '16:45' },
  maxParticipants: 10,
  participants,
});

export const roboticsWorkshop = (): Activity => ({
  name: 'Weekend Robotics Workshop',
  description: 'Build and program robots in our workshop',
  schedule: 'Saturdays, 10:00 AM - 2:00 PM',
  scheduleDetails: { days: ['Saturday'], startTime: '10:00', endTime: '14:00' },
  maxParticipants: 15,
  participants: ['ethan@school.edu'],
  category: ActivityCategory.TECHNOLOGY,
});

export const morningFitness = (): Activity => ({
  name: 'Morning Fitness',
  description: 'Early morning physical training and exercises',
  schedule: 'Mondays, Wednesdays, Fridays, 6:30 AM - 7:45 AM',
  scheduleDetails: { days: ['Monday', 'Wednesday', 'Friday'], startTime: '06:30', endTime: '07:45' },
  maxParticipants: 30,
  participants: [],
});

export const gardenVolunteers = (): Activity => ({
  name: 'Community Garden Volunteers',
  description: 'Volunteer service growing vegetables for the local food bank',
  schedule: 'Every other Saturday morning',
  maxParticipants: 25,
  participants: [],
});

export const TOKENS = { secret: TEST_JWT_SECRET, ttlSeconds: 3600 };

export const defaultTeachers = () => [
  testTeacher('mrodriguez', 'Ms. Rodriguez'),
  testTeacher('principal', 'Principal Martinez', StaffRole.ADMIN),
];

export function createTestApp(seed: MemoryStoreSeed = {}, now?: () => Date) {
  const store: MemoryStore = createMemoryStore({ teachers: defaultTeachers(), ...seed });
  const app = createApp(store, { ...TOKENS, now });
  return { app, store };
}

export const bearer = (username = 'mrodriguez', displayName = 'Ms. Rodriguez', role = StaffRole.TEACHER) =>
  `Bearer ${issueToken({ username, displayName, role }, TOKENS)}`;
