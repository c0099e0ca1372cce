import bcrypt from 'bcryptjs';
import type { Pool, RowDataPacket } from 'mysql2/promise';
import { z } from 'zod';
import { ActivityCategory, StaffRole, WEEKDAYS } from '../types';
import { TIME_OF_DAY } from '../lib/schedule';
import { SCHEMA, inTransaction } from './mysqlStore';
import { defaultStudentName } from './store';
import seedActivities from './seed/activities.json';
import seedTeachers from './seed/teachers.json';

export const seedActivitySchema = z
  .object({
    name: z.string().min(1),
    description: z.string(),
    schedule: z.string(),
    scheduleDetails: z
      .object({
        days: z.array(z.enum(WEEKDAYS)).min(1),
        startTime: z.string().regex(TIME_OF_DAY),
        endTime: z.string().regex(TIME_OF_DAY),
      })
      .optional(),
    maxParticipants: z.number().int().positive(),
    participants: z.array(z.string().email()),
    category: z.nativeEnum(ActivityCategory).optional(),
  })
  .refine(
    activity => new Set(activity.participants).size === activity.participants.length,
    activity => ({ message: `${activity.name} lists a participant more than once` })
  );

const seedTeacherSchema = z.object({
  username: z.string().min(1),
  displayName: z.string().min(1),
  role: z.nativeEnum(StaffRole),
});

interface CountRow extends RowDataPacket {
  total: number;
}

async function isEmpty(pool: Pool, table: string): Promise<boolean> {
  const [rows] = await pool.query<CountRow[]>(`SELECT COUNT(*) AS total FROM ${table}`);
  return rows[0].total === 0;
}

// One transaction: a failed run leaves the table empty.
async function seedActivityTable(pool: Pool): Promise<void> {
  const activities = z.array(seedActivitySchema).parse(seedActivities);
  await inTransaction(pool, async connection => {
    for (const activity of activities) {
      const details = activity.scheduleDetails;
      await connection.execute(
        `INSERT INTO activities (name, description, schedule, schedule_days, start_time, end_time, max_participants, category)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          activity.name,
          activity.description,
          activity.schedule,
          details ? JSON.stringify(details.days) : null,
          details?.startTime ?? null,
          details?.endTime ?? null,
          activity.maxParticipants,
          activity.category ?? null,
        ]
      );
      for (const email of activity.participants.slice(0, activity.maxParticipants)) {
        await connection.execute('INSERT IGNORE INTO students (email, name) VALUES (?, ?)', [
          email,
          defaultStudentName(email),
        ]);
        await connection.execute('INSERT INTO activity_participants (activity_name, email) VALUES (?, ?)', [
          activity.name,
          email,
        ]);
      }
    }
  });
  console.log(`Seeded ${activities.length} activities.`);
}

async function seedTeacherTable(pool: Pool, password: string): Promise<void> {
  const teachers = z.array(seedTeacherSchema).parse(seedTeachers);
  const passwordHash = await bcrypt.hash(password, 10);
  for (const teacher of teachers) {
    await pool.execute('INSERT INTO teachers (username, display_name, role, password_hash) VALUES (?, ?, ?, ?)', [
      teacher.username,
      teacher.displayName,
      teacher.role,
      passwordHash,
    ]);
  }
  console.log(`Seeded ${teachers.length} staff accounts: ${teachers.map(t => t.username).join(', ')}`);
}

export async function initializeDatabase(pool: Pool, seedTeacherPassword: string): Promise<void> {
  // Test the connection before proceeding
  const connection = await pool.getConnection();
  connection.release();
  console.log('Connected to MySQL database.');

  for (const statement of SCHEMA) {
    await pool.query(statement);
  }

  if (await isEmpty(pool, 'activities')) {
    console.log('No activities found. Seeding defaults...');
    await seedActivityTable(pool);
  }
  if (await isEmpty(pool, 'teachers')) {
    console.log('No staff accounts found. Creating defaults...');
    await seedTeacherTable(pool, seedTeacherPassword);
  }
}
