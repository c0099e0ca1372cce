import { Router } from 'express';
import type { RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { AnnouncementInput, AnnouncementRecord, DataStore } from '../db/store';
import { NotFoundError, ValidationError } from '../errors';
import { parseInstant } from '../lib/time';
import { asyncHandler } from '../middleware/asyncHandler';
import { currentTeacher } from '../middleware/auth';
import type { AuthRequest } from '../middleware/auth';
import type { Announcement, MessageResponse } from '../types';

export const MAX_MESSAGE_LENGTH = 500;

const announcementQuerySchema = z.object({
  message: z.string().optional(),
  starts_at: z.string().optional(),
  expires_at: z.string().optional(),
});

export const serializeAnnouncement = (record: AnnouncementRecord): Announcement => ({
  id: record.id,
  message: record.message,
  startsAt: record.startsAt?.toISOString() ?? null,
  expiresAt: record.expiresAt.toISOString(),
  createdAt: record.createdAt.toISOString(),
  updatedAt: record.updatedAt.toISOString(),
  createdBy: record.createdBy,
});

function parseAnnouncementInput(query: unknown): AnnouncementInput {
  const raw = announcementQuerySchema.parse(query);

  const message = raw.message?.trim() ?? '';
  if (!message) throw new ValidationError('Message is required');
  if (message.length > MAX_MESSAGE_LENGTH) throw new ValidationError('Message is too long');

  const startsAt = parseInstant(raw.starts_at, 'starts_at', false);
  const expiresAt = parseInstant(raw.expires_at, 'expires_at', true);
  if (startsAt && startsAt.getTime() >= expiresAt.getTime()) {
    throw new ValidationError('Expiration must be after start date');
  }

  return { message, startsAt, expiresAt };
}

function parseAnnouncementId(value: string): number {
  if (!/^\d+$/.test(value)) {
    console.warn(`Invalid announcement id '${value}'`);
    throw new ValidationError('Invalid announcement id');
  }
  return Number(value);
}

export function announcementsRouter(store: DataStore, requireTeacher: RequestHandler, now: () => Date): Router {
  const router = Router();

  // Public banner
  router.get(
    '/',
    asyncHandler(async (req, res: Response<Announcement[]>) => {
      const records = await store.announcements.listActive(now());
      res.json(records.map(serializeAnnouncement));
    })
  );

  router.get(
    '/manage',
    requireTeacher,
    asyncHandler(async (req, res: Response<Announcement[]>) => {
      const records = await store.announcements.listAll();
      res.json(records.map(serializeAnnouncement));
    })
  );

  router.post(
    '/',
    requireTeacher,
    asyncHandler<AuthRequest>(async (req, res: Response<Announcement>) => {
      const teacher = currentTeacher(req);
      const input = parseAnnouncementInput(req.query);
      const created = await store.announcements.create(input, teacher.username, now());
      console.log(`${teacher.username} created announcement ${created.id}`);
      res.status(201).json(serializeAnnouncement(created));
    })
  );

  router.put(
    '/:id',
    requireTeacher,
    asyncHandler<AuthRequest>(async (req, res: Response<Announcement>) => {
      const teacher = currentTeacher(req);
      const input = parseAnnouncementInput(req.query);
      const id = parseAnnouncementId(req.params.id);
      const updated = await store.announcements.update(id, input, now());
      if (!updated) throw new NotFoundError('Announcement not found');
      console.log(`${teacher.username} updated announcement ${id}`);
      res.json(serializeAnnouncement(updated));
    })
  );

  router.delete(
    '/:id',
    requireTeacher,
    asyncHandler<AuthRequest>(async (req, res: Response<MessageResponse>) => {
      const teacher = currentTeacher(req);
      const id = parseAnnouncementId(req.params.id);
      const deleted = await store.announcements.delete(id);
      if (!deleted) throw new NotFoundError('Announcement not found');
      console.log(`${teacher.username} deleted announcement ${id}`);
      res.json({ message: 'Announcement deleted' });
    })
  );

  return router;
}
