import { ActivityCategory } from '../types';
import type { Activity, ScheduleDetails, Weekday } from '../types';

export interface ActivityTypeInfo {
  label: string;
  className: string;
}

export const ACTIVITY_TYPES: Record<ActivityCategory, ActivityTypeInfo> = {
  [ActivityCategory.SPORTS]: { label: 'Sports', className: 'bg-green-50 text-green-800' },
  [ActivityCategory.ARTS]: { label: 'Arts', className: 'bg-purple-50 text-purple-800' },
  [ActivityCategory.ACADEMIC]: { label: 'Academic', className: 'bg-blue-50 text-blue-800' },
  [ActivityCategory.COMMUNITY]: { label: 'Community', className: 'bg-orange-50 text-orange-800' },
  [ActivityCategory.TECHNOLOGY]: { label: 'Technology', className: 'bg-indigo-50 text-indigo-800' },
};

interface CategoryKeywords {
  category: ActivityCategory;
  name: string[];
  description: string[];
}

// Checked in order; the first match wins.
const CATEGORY_KEYWORDS: CategoryKeywords[] = [
  {
    category: ActivityCategory.SPORTS,
    name: ['soccer', 'basketball', 'sport', 'fitness'],
    description: ['team', 'game', 'athletic'],
  },
  {
    category: ActivityCategory.ARTS,
    name: ['art', 'music', 'theater', 'drama'],
    description: ['creative', 'paint'],
  },
  {
    category: ActivityCategory.ACADEMIC,
    name: ['science', 'math', 'academic', 'study', 'olympiad'],
    description: ['learning', 'education', 'competition'],
  },
  {
    category: ActivityCategory.COMMUNITY,
    name: ['volunteer', 'community'],
    description: ['service', 'volunteer'],
  },
  {
    category: ActivityCategory.TECHNOLOGY,
    name: ['computer', 'coding', 'tech', 'robotics'],
    description: ['programming', 'technology', 'digital', 'robot'],
  },
];

/** Keyword guess used for activities that carry no stored category. */
export function inferCategory(name: string, description: string): ActivityCategory {
  const lowerName = name.toLowerCase();
  const lowerDescription = description.toLowerCase();
  const match = CATEGORY_KEYWORDS.find(
    ({ name: nameWords, description: descriptionWords }) =>
      nameWords.some(word => lowerName.includes(word)) ||
      descriptionWords.some(word => lowerDescription.includes(word))
  );
  return match?.category ?? ActivityCategory.ACADEMIC;
}

export const getActivityType = (activity: Activity): ActivityCategory =>
  activity.category ?? inferCategory(activity.name, activity.description);

export function formatTime(time24: string): string {
  const [hours, minutes] = time24.split(':').map(part => parseInt(part, 10));
  const period = hours >= 12 ? 'PM' : 'AM';
  const displayHours = hours % 12 || 12;
  return `${displayHours}:${String(minutes).padStart(2, '0')} ${period}`;
}

export function formatScheduleDetails(details: ScheduleDetails): string {
  return `${details.days.join(', ')}, ${formatTime(details.startTime)} - ${formatTime(details.endTime)}`;
}

export const formatSchedule = (activity: Activity): string =>
  activity.scheduleDetails ? formatScheduleDetails(activity.scheduleDetails) : activity.schedule;

export type TimeRangeKey = 'morning' | 'afternoon' | 'weekend';

export type TimeRange = { start: string; end: string } | { days: Weekday[] };

export const TIME_RANGES: Record<TimeRangeKey, TimeRange> = {
  morning: { start: '06:00', end: '08:00' }, // before school
  afternoon: { start: '15:00', end: '18:00' }, // after school
  weekend: { days: ['Saturday', 'Sunday'] },
};

/**
 * Query string for GET /activities. Weekend selection never reaches the
 * server; it is applied by filterActivities instead.
 */
export function buildActivityQuery(day: Weekday | '', timeRange: TimeRangeKey | ''): string {
  const params = new URLSearchParams();
  if (day) params.set('day', day);
  if (timeRange) {
    const range = TIME_RANGES[timeRange];
    if ('start' in range) {
      params.set('start_time', range.start);
      params.set('end_time', range.end);
    }
  }
  const query = params.toString();
  return query ? `?${query}` : '';
}

export interface ActivityFilters {
  category: ActivityCategory | 'all';
  search: string;
  timeRange: TimeRangeKey | '';
}

export const isWeekendActivity = (activity: Activity): boolean => {
  const weekend = TIME_RANGES.weekend;
  if (!activity.scheduleDetails || !('days' in weekend)) return true;
  return activity.scheduleDetails.days.some(day => weekend.days.includes(day));
};

export function filterActivities(activities: Activity[], filters: ActivityFilters): Activity[] {
  const query = filters.search.trim().toLowerCase();
  return activities.filter(activity => {
    if (filters.category !== 'all' && getActivityType(activity) !== filters.category) return false;
    if (filters.timeRange === 'weekend' && !isWeekendActivity(activity)) return false;
    if (!query) return true;
    const searchable = [activity.name, activity.description, formatSchedule(activity)].join(' ').toLowerCase();
    return searchable.includes(query);
  });
}

export type CapacityStatus = 'full' | 'near-full' | 'available';

export interface Capacity {
  taken: number;
  total: number;
  spotsLeft: number;
  percentage: number;
  status: CapacityStatus;
}

export function getCapacity(activity: Activity): Capacity {
  const total = activity.maxParticipants;
  const taken = activity.participants.length;
  const spotsLeft = total - taken;
  const percentage = (taken / total) * 100;
  let status: CapacityStatus = 'available';
  if (spotsLeft <= 0) {
    status = 'full';
  } else if (percentage >= 75) {
    status = 'near-full';
  }
  return { taken, total, spotsLeft, percentage, status };
}
