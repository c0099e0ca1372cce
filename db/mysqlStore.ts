import mysql from 'mysql2/promise';
import type { Pool, PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { ConflictError, NotFoundError } from '../errors';
import type { Activity, ActivityCategory, StaffRole, Weekday } from '../types';
import { defaultStudentName } from './store';
import type {
  ActivityRepository,
  AnnouncementInput,
  AnnouncementRecord,
  AnnouncementRepository,
  DataStore,
  StudentInput,
  TeacherRecord,
  TeacherRepository,
} from './store';
import type { DatabaseConfig } from '../config';

interface ActivityRow extends RowDataPacket {
  name: string;
  description: string;
  schedule: string;
  schedule_days: Weekday[] | null;
  start_time: string | null;
  end_time: string | null;
  max_participants: number;
  category: ActivityCategory | null;
}

interface ParticipantRow extends RowDataPacket {
  activity_name: string;
  email: string;
}

interface CapacityRow extends RowDataPacket {
  max_participants: number;
}

interface TeacherRow extends RowDataPacket {
  username: string;
  display_name: string;
  role: StaffRole;
  password_hash: string;
}

interface AnnouncementRow extends RowDataPacket {
  id: number;
  message: string;
  starts_at: Date | null;
  expires_at: Date;
  created_at: Date;
  updated_at: Date;
  created_by: string | null;
}

export const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS activities (
    name VARCHAR(100) CHARACTER SET utf8mb4 COLLATE utf8mb4_bin PRIMARY KEY,
    description TEXT NOT NULL,
    schedule VARCHAR(255) NOT NULL,
    schedule_days JSON NULL,
    start_time CHAR(5) NULL,
    end_time CHAR(5) NULL,
    max_participants INT NOT NULL,
    category VARCHAR(20) NULL
  )`,
  `CREATE TABLE IF NOT EXISTS students (
    email VARCHAR(255) CHARACTER SET utf8mb4 COLLATE utf8mb4_bin PRIMARY KEY,
    name VARCHAR(255) NOT NULL,
    grade VARCHAR(20) NULL
  )`,
  `CREATE TABLE IF NOT EXISTS activity_participants (
    id INT AUTO_INCREMENT PRIMARY KEY,
    activity_name VARCHAR(100) CHARACTER SET utf8mb4 COLLATE utf8mb4_bin NOT NULL,
    email VARCHAR(255) CHARACTER SET utf8mb4 COLLATE utf8mb4_bin NOT NULL,
    enrolled_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
    UNIQUE KEY activity_email (activity_name, email),
    FOREIGN KEY (activity_name) REFERENCES activities(name) ON DELETE CASCADE
  )`,
  `CREATE TABLE IF NOT EXISTS teachers (
    username VARCHAR(100) PRIMARY KEY,
    display_name VARCHAR(255) NOT NULL,
    role VARCHAR(20) NOT NULL,
    password_hash VARCHAR(255) NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS announcements (
    id INT AUTO_INCREMENT PRIMARY KEY,
    message VARCHAR(500) NOT NULL,
    starts_at DATETIME NULL,
    expires_at DATETIME NOT NULL,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    created_by VARCHAR(100) NULL
  )`,
];

const toActivity = (row: ActivityRow, participants: string[]): Activity => {
  const activity: Activity = {
    name: row.name,
    description: row.description,
    schedule: row.schedule,
    maxParticipants: row.max_participants,
    participants,
  };
  if (row.schedule_days && row.start_time && row.end_time) {
    activity.scheduleDetails = { days: row.schedule_days, startTime: row.start_time, endTime: row.end_time };
  }
  if (row.category) activity.category = row.category;
  return activity;
};

const toAnnouncement = (row: AnnouncementRow): AnnouncementRecord => ({
  id: row.id,
  message: row.message,
  startsAt: row.starts_at,
  expiresAt: row.expires_at,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
  createdBy: row.created_by,
});

/** True for mysql2's unique-key violation. */
export const isDuplicateEntry = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ER_DUP_ENTRY';

export async function inTransaction<T>(pool: Pool, work: (connection: PoolConnection) => Promise<T>): Promise<T> {
  const connection = await pool.getConnection();
  try {
    await connection.beginTransaction();
    const result = await work(connection);
    await connection.commit();
    return result;
  } catch (err) {
    await connection.rollback();
    throw err;
  } finally {
    connection.release();
  }
}

class MysqlActivityRepository implements ActivityRepository {
  constructor(private readonly pool: Pool) {}

  async list(): Promise<Activity[]> {
    const [rows] = await this.pool.query<ActivityRow[]>('SELECT * FROM activities ORDER BY name');
    const [participantRows] = await this.pool.query<ParticipantRow[]>(
      'SELECT activity_name, email FROM activity_participants ORDER BY id'
    );
    const byActivity = new Map<string, string[]>();
    for (const { activity_name, email } of participantRows) {
      const emails = byActivity.get(activity_name) ?? [];
      emails.push(email);
      byActivity.set(activity_name, emails);
    }
    return rows.map(row => toActivity(row, byActivity.get(row.name) ?? []));
  }

  async addParticipant(activityName: string, student: StudentInput): Promise<void> {
    await inTransaction(this.pool, async connection => {
      // Row lock serialises concurrent signups for the same activity.
      const [capacity] = await connection.execute<CapacityRow[]>(
        'SELECT max_participants FROM activities WHERE name = ? FOR UPDATE',
        [activityName]
      );
      if (capacity.length === 0) throw new NotFoundError('Activity not found');

      const [enrolled] = await connection.execute<ParticipantRow[]>(
        'SELECT activity_name, email FROM activity_participants WHERE activity_name = ?',
        [activityName]
      );
      if (enrolled.some(row => row.email === student.email)) {
        throw new ConflictError('Student is already signed up for this activity');
      }
      if (enrolled.length >= capacity[0].max_participants) {
        throw new ConflictError('Activity is full');
      }

      await connection.execute('INSERT IGNORE INTO students (email, name, grade) VALUES (?, ?, ?)', [
        student.email,
        student.name ?? defaultStudentName(student.email),
        student.grade ?? null,
      ]);
      await connection.execute('INSERT INTO activity_participants (activity_name, email) VALUES (?, ?)', [
        activityName,
        student.email,
      ]);
    }).catch((err: unknown) => {
      if (isDuplicateEntry(err)) throw new ConflictError('Student is already signed up for this activity');
      throw err;
    });
  }

  async removeParticipant(activityName: string, email: string): Promise<void> {
    const [rows] = await this.pool.execute<CapacityRow[]>(
      'SELECT max_participants FROM activities WHERE name = ?',
      [activityName]
    );
    if (rows.length === 0) throw new NotFoundError('Activity not found');

    const [result] = await this.pool.execute<ResultSetHeader>(
      'DELETE FROM activity_participants WHERE activity_name = ? AND email = ?',
      [activityName, email]
    );
    if (result.affectedRows === 0) {
      throw new ConflictError('Student is not signed up for this activity');
    }
  }
}

class MysqlTeacherRepository implements TeacherRepository {
  constructor(private readonly pool: Pool) {}

  async find(username: string): Promise<TeacherRecord | null> {
    const [rows] = await this.pool.execute<TeacherRow[]>('SELECT * FROM teachers WHERE username = ?', [username]);
    if (rows.length === 0) return null;
    const row = rows[0];
    return { username: row.username, displayName: row.display_name, role: row.role, passwordHash: row.password_hash };
  }
}

class MysqlAnnouncementRepository implements AnnouncementRepository {
  constructor(private readonly pool: Pool) {}

  async listActive(now: Date): Promise<AnnouncementRecord[]> {
    const [rows] = await this.pool.execute<AnnouncementRow[]>(
      `SELECT * FROM announcements
       WHERE expires_at > ? AND (starts_at IS NULL OR starts_at <= ?)
       ORDER BY expires_at ASC`,
      [now, now]
    );
    return rows.map(toAnnouncement);
  }

  async listAll(): Promise<AnnouncementRecord[]> {
    const [rows] = await this.pool.query<AnnouncementRow[]>('SELECT * FROM announcements ORDER BY created_at DESC, id DESC');
    return rows.map(toAnnouncement);
  }

  async create(input: AnnouncementInput, createdBy: string, now: Date): Promise<AnnouncementRecord> {
    const [result] = await this.pool.execute<ResultSetHeader>(
      'INSERT INTO announcements (message, starts_at, expires_at, created_at, updated_at, created_by) VALUES (?, ?, ?, ?, ?, ?)',
      [input.message, input.startsAt, input.expiresAt, now, now, createdBy]
    );
    return {
      id: result.insertId,
      ...input,
      createdAt: now,
      updatedAt: now,
      createdBy,
    };
  }

  async update(id: number, input: AnnouncementInput, now: Date): Promise<AnnouncementRecord | null> {
    const [result] = await this.pool.execute<ResultSetHeader>(
      'UPDATE announcements SET message = ?, starts_at = ?, expires_at = ?, updated_at = ? WHERE id = ?',
      [input.message, input.startsAt, input.expiresAt, now, id]
    );
    if (result.affectedRows === 0) return null;
    const [rows] = await this.pool.execute<AnnouncementRow[]>('SELECT * FROM announcements WHERE id = ?', [id]);
    return rows.length > 0 ? toAnnouncement(rows[0]) : null;
  }

  async delete(id: number): Promise<boolean> {
    const [result] = await this.pool.execute<ResultSetHeader>('DELETE FROM announcements WHERE id = ?', [id]);
    return result.affectedRows > 0;
  }
}

export function createPool(db: DatabaseConfig): Pool {
  return mysql.createPool({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.database,
    waitForConnections: true,
    connectionLimit: 10,
    queueLimit: 0,
    timezone: 'Z',
  });
}

export function createMysqlStore(pool: Pool): DataStore {
  return {
    activities: new MysqlActivityRepository(pool),
    teachers: new MysqlTeacherRepository(pool),
    announcements: new MysqlAnnouncementRepository(pool),
  };
}
