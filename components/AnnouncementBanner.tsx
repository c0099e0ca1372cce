import React from 'react';
import { Megaphone } from 'lucide-react';
import { formatDateTimeLabel } from '../lib/dates';
import type { Announcement } from '../types';

const AnnouncementBanner: React.FC<{ announcements: Announcement[] }> = ({ announcements }) => {
  if (announcements.length === 0) return null;

  return (
    <section className="border-b border-amber-200 bg-amber-50 px-4 py-2">
      {announcements.map(announcement => (
        <article key={announcement.id} className="flex items-center gap-2 text-sm text-amber-900">
          <Megaphone size={16} />
          <div className="flex-grow">{announcement.message}</div>
          <span className="text-xs text-amber-700">Expires {formatDateTimeLabel(announcement.expiresAt)}</span>
        </article>
      ))}
    </section>
  );
};

export default AnnouncementBanner;
