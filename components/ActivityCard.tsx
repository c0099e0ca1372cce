import React from 'react';
import { CalendarClock, UserPlus, X } from 'lucide-react';
import { ACTIVITY_TYPES, formatSchedule, getActivityType, getCapacity } from '../lib/activityView';
import type { CapacityStatus } from '../lib/activityView';
import type { Activity } from '../types';

interface ActivityCardProps {
  activity: Activity;
  canManage: boolean;
  onRegister: (activityName: string) => void;
  onUnregister: (activityName: string, email: string) => void;
}

const capacityColors: Record<CapacityStatus, string> = {
  available: 'bg-green-500',
  'near-full': 'bg-amber-500',
  full: 'bg-red-500',
};

const ActivityCard: React.FC<ActivityCardProps> = ({ activity, canManage, onRegister, onUnregister }) => {
  const typeInfo = ACTIVITY_TYPES[getActivityType(activity)];
  const { taken, spotsLeft, percentage, status } = getCapacity(activity);
  const isFull = status === 'full';

  return (
    <div className="flex flex-col rounded-lg border border-slate-200 bg-white p-4 shadow-sm transition-shadow hover:shadow-md">
      <span className={`mb-2 self-start rounded px-2 py-0.5 text-xs font-bold ${typeInfo.className}`}>
        {typeInfo.label}
      </span>
      <h4 className="mb-1 text-lg font-semibold text-slate-800">{activity.name}</h4>
      <p className="mb-2 text-sm text-slate-500">{activity.description}</p>
      <p className="mb-3 flex items-center text-sm text-slate-600" title="Regular meetings at this time throughout the semester">
        <CalendarClock size={14} className="mr-1.5" />
        <span>{formatSchedule(activity)}</span>
      </p>

      <div className="mb-3" data-capacity={status}>
        <div className="h-1.5 w-full rounded bg-slate-100">
          <div className={`h-1.5 rounded ${capacityColors[status]}`} style={{ width: `${percentage}%` }} />
        </div>
        <div className="mt-1 flex justify-between text-xs text-slate-500">
          <span>{taken} enrolled</span>
          <span>{spotsLeft} spots left</span>
        </div>
      </div>

      <div className="mb-3">
        <h5 className="text-xs font-semibold uppercase text-slate-400">Current Participants:</h5>
        <ul className="mt-1 space-y-0.5 text-sm text-slate-600">
          {activity.participants.map(email => (
            <li key={email} className="flex items-center justify-between">
              <span>{email}</span>
              {canManage && (
                <button
                  onClick={() => onUnregister(activity.name, email)}
                  className="text-red-400 hover:text-red-600"
                  title="Unregister this student"
                  aria-label={`Unregister ${email}`}
                >
                  <X size={14} />
                </button>
              )}
            </li>
          ))}
        </ul>
      </div>

      <div className="mt-auto border-t border-slate-50 pt-3">
        {canManage ? (
          <button
            onClick={() => onRegister(activity.name)}
            disabled={isFull}
            className="flex w-full items-center justify-center gap-1 rounded bg-blue-700 py-1.5 text-sm font-semibold text-white hover:bg-blue-800 disabled:bg-slate-300"
          >
            <UserPlus size={16} />
            {isFull ? 'Activity Full' : 'Register Student'}
          </button>
        ) : (
          <p className="text-center text-xs text-slate-400">Teachers can register students.</p>
        )}
      </div>
    </div>
  );
};

export default ActivityCard;
