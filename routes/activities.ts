import { Router } from 'express';
import type { RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { DataStore } from '../db/store';
import { TIME_OF_DAY, filterBySchedule } from '../lib/schedule';
import { asyncHandler } from '../middleware/asyncHandler';
import { currentTeacher } from '../middleware/auth';
import type { AuthRequest } from '../middleware/auth';
import { WEEKDAYS } from '../types';
import type { Activity, MessageResponse } from '../types';

const listQuerySchema = z.object({
  day: z.enum(WEEKDAYS, { errorMap: () => ({ message: 'day must be a weekday name' }) }).optional(),
  start_time: z.string().regex(TIME_OF_DAY, 'start_time must be HH:MM').optional(),
  end_time: z.string().regex(TIME_OF_DAY, 'end_time must be HH:MM').optional(),
});

const signupQuerySchema = z.object({
  email: z.string({ required_error: 'email is required' }).trim().email('Invalid email address'),
  student_name: z.string().trim().min(1).optional(),
  grade: z.string().trim().min(1).optional(),
});

const unregisterQuerySchema = signupQuerySchema.pick({ email: true });

export function activitiesRouter(store: DataStore, requireTeacher: RequestHandler): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res: Response<Activity[]>) => {
      const query = listQuerySchema.parse(req.query);
      const activities = await store.activities.list();
      res.json(filterBySchedule(activities, { day: query.day, startTime: query.start_time, endTime: query.end_time }));
    })
  );

  router.post(
    '/:name/signup',
    requireTeacher,
    asyncHandler<AuthRequest>(async (req, res: Response<MessageResponse>) => {
      const teacher = currentTeacher(req);
      const { name } = req.params;
      const { email, student_name, grade } = signupQuerySchema.parse(req.query);
      await store.activities.addParticipant(name, { email, name: student_name, grade });
      console.log(`${teacher.username} signed up ${email} for ${name}`);
      res.json({ message: `Signed up ${email} for ${name}` });
    })
  );

  router.post(
    '/:name/unregister',
    requireTeacher,
    asyncHandler<AuthRequest>(async (req, res: Response<MessageResponse>) => {
      const teacher = currentTeacher(req);
      const { name } = req.params;
      const { email } = unregisterQuerySchema.parse(req.query);
      await store.activities.removeParticipant(name, email);
      console.log(`${teacher.username} unregistered ${email} from ${name}`);
      res.json({ message: `Unregistered ${email} from ${name}` });
    })
  );

  return router;
}
