import React from 'react';
import { Search } from 'lucide-react';
import { ACTIVITY_TYPES } from '../lib/activityView';
import type { TimeRangeKey } from '../lib/activityView';
import { ActivityCategory, WEEKDAYS } from '../types';
import type { Weekday } from '../types';

interface FilterBarProps {
  search: string;
  category: ActivityCategory | 'all';
  day: Weekday | '';
  timeRange: TimeRangeKey | '';
  onSearchChange: (value: string) => void;
  onCategoryChange: (value: ActivityCategory | 'all') => void;
  onDayChange: (value: Weekday | '') => void;
  onTimeRangeChange: (value: TimeRangeKey | '') => void;
}

const TIME_LABELS: Array<[TimeRangeKey | '', string]> = [
  ['', 'All Times'],
  ['morning', 'Before School'],
  ['afternoon', 'After School'],
  ['weekend', 'Weekend'],
];

const chip = (active: boolean) =>
  `rounded-full px-3 py-1 text-sm ${active ? 'bg-blue-700 text-white' : 'bg-slate-100 text-slate-600 hover:bg-slate-200'}`;

const FilterBar: React.FC<FilterBarProps> = props => {
  const categories: Array<ActivityCategory | 'all'> = ['all', ...Object.values(ActivityCategory)];
  const days: Array<Weekday | ''> = ['', ...WEEKDAYS];

  return (
    <aside className="space-y-4">
      <div className="flex items-center rounded border border-slate-300 bg-white px-2">
        <Search size={16} className="text-slate-400" />
        <input
          value={props.search}
          onChange={e => props.onSearchChange(e.target.value)}
          placeholder="Search activities..."
          aria-label="Search activities"
          className="w-full px-2 py-1.5 outline-none"
        />
      </div>

      <div>
        <h4 className="mb-2 text-xs font-semibold uppercase text-slate-400">Category</h4>
        <div className="flex flex-wrap gap-2">
          {categories.map(category => (
            <button key={category} className={chip(props.category === category)} onClick={() => props.onCategoryChange(category)}>
              {category === 'all' ? 'All' : ACTIVITY_TYPES[category].label}
            </button>
          ))}
        </div>
      </div>

      <div>
        <h4 className="mb-2 text-xs font-semibold uppercase text-slate-400">Day</h4>
        <div className="flex flex-wrap gap-2">
          {days.map(day => (
            <button key={day || 'all'} className={chip(props.day === day)} onClick={() => props.onDayChange(day)}>
              {day || 'All Days'}
            </button>
          ))}
        </div>
      </div>

      <div>
        <h4 className="mb-2 text-xs font-semibold uppercase text-slate-400">Time</h4>
        <div className="flex flex-wrap gap-2">
          {TIME_LABELS.map(([key, label]) => (
            <button key={label} className={chip(props.timeRange === key)} onClick={() => props.onTimeRangeChange(key)}>
              {label}
            </button>
          ))}
        </div>
      </div>
    </aside>
  );
};

export default FilterBar;
