import React, { useCallback, useContext, useEffect, useMemo, useState } from 'react';
import { Loader2 } from 'lucide-react';
import ActivityCard from '../components/ActivityCard';
import ConfirmDialog from '../components/ConfirmDialog';
import FilterBar from '../components/FilterBar';
import RegistrationModal from '../components/RegistrationModal';
import { AppContext } from '../context/AppContext';
import { filterActivities } from '../lib/activityView';
import type { TimeRangeKey } from '../lib/activityView';
import { ApiError, fetchActivities, signupStudent, unregisterStudent } from '../services/api';
import type { Activity, ActivityCategory, Weekday } from '../types';

const Activities: React.FC = () => {
  const { auth, showMessage } = useContext(AppContext);
  const [activities, setActivities] = useState<Activity[]>([]);
  const [isLoading, setIsLoading] = useState(true);
  const [loadError, setLoadError] = useState(false);

  const [search, setSearch] = useState('');
  const [category, setCategory] = useState<ActivityCategory | 'all'>('all');
  const [day, setDay] = useState<Weekday | ''>('');
  const [timeRange, setTimeRange] = useState<TimeRangeKey | ''>('');

  const [registeringFor, setRegisteringFor] = useState<string | null>(null);
  const [pendingUnregister, setPendingUnregister] = useState<{ activity: string; email: string } | null>(null);

  // Day and before/after-school windows are filtered by the server.
  const loadActivities = useCallback(async () => {
    setIsLoading(true);
    try {
      setActivities(await fetchActivities(day, timeRange));
      setLoadError(false);
    } catch (error) {
      console.error('Error fetching activities:', error);
      setLoadError(true);
    } finally {
      setIsLoading(false);
    }
  }, [day, timeRange]);

  useEffect(() => {
    void loadActivities();
  }, [loadActivities]);

  const visible = useMemo(
    () => filterActivities(activities, { category, search, timeRange }),
    [activities, category, search, timeRange]
  );

  const describeError = (error: unknown, fallback: string) => (error instanceof ApiError ? error.message : fallback);

  const handleSignup = async (email: string): Promise<boolean> => {
    if (!auth.token || !registeringFor) {
      showMessage('You must be logged in as a teacher to register students.', 'error');
      return false;
    }
    try {
      const result = await signupStudent(registeringFor, email, auth.token);
      showMessage(result.message, 'success');
      await loadActivities();
      return true;
    } catch (error) {
      console.error('Error signing up:', error);
      showMessage(describeError(error, 'Failed to sign up. Please try again.'), 'error');
      return false;
    }
  };

  const confirmUnregister = async () => {
    const pending = pendingUnregister;
    setPendingUnregister(null);
    if (!pending || !auth.token) {
      showMessage('You must be logged in as a teacher to unregister students.', 'error');
      return;
    }
    try {
      const result = await unregisterStudent(pending.activity, pending.email, auth.token);
      showMessage(result.message, 'success');
      await loadActivities();
    } catch (error) {
      console.error('Error unregistering:', error);
      showMessage(describeError(error, 'Failed to unregister. Please try again.'), 'error');
    }
  };

  return (
    <div className="mx-auto grid max-w-6xl gap-6 px-4 py-6 md:grid-cols-[240px_1fr]">
      <FilterBar
        search={search}
        category={category}
        day={day}
        timeRange={timeRange}
        onSearchChange={setSearch}
        onCategoryChange={setCategory}
        onDayChange={setDay}
        onTimeRangeChange={setTimeRange}
      />

      <section>
        {isLoading ? (
          <div className="flex justify-center py-12 text-slate-400">
            <Loader2 className="animate-spin" />
          </div>
        ) : loadError ? (
          <p className="text-slate-500">Failed to load activities. Please try again later.</p>
        ) : visible.length === 0 ? (
          <div className="py-12 text-center">
            <h4 className="font-semibold text-slate-700">No activities found</h4>
            <p className="text-sm text-slate-500">Try adjusting your search or filter criteria</p>
          </div>
        ) : (
          <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-3">
            {visible.map(activity => (
              <ActivityCard
                key={activity.name}
                activity={activity}
                canManage={auth.isAuthenticated}
                onRegister={setRegisteringFor}
                onUnregister={(name, email) => setPendingUnregister({ activity: name, email })}
              />
            ))}
          </div>
        )}
      </section>

      {registeringFor && (
        <RegistrationModal activityName={registeringFor} onSubmit={handleSignup} onClose={() => setRegisteringFor(null)} />
      )}
      {pendingUnregister && (
        <ConfirmDialog
          message={`Are you sure you want to unregister ${pendingUnregister.email} from ${pendingUnregister.activity}?`}
          onConfirm={() => void confirmUnregister()}
          onCancel={() => setPendingUnregister(null)}
        />
      )}
    </div>
  );
};

export default Activities;
