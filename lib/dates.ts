// Helpers between <input type="datetime-local"> values and ISO instants.

export function toIsoStringFromLocalInput(value: string): string | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function toLocalInputValue(isoDate: string | null): string {
  if (!isoDate) return '';
  const date = new Date(isoDate);
  if (Number.isNaN(date.getTime())) return '';
  const offsetMs = date.getTime() - date.getTimezoneOffset() * 60000;
  return new Date(offsetMs).toISOString().slice(0, 16);
}

export function formatDateTimeLabel(isoDate: string | null): string {
  if (!isoDate) return 'Not set';
  const parsed = new Date(isoDate);
  if (Number.isNaN(parsed.getTime())) return 'Invalid date';
  return parsed.toLocaleString([], {
    year: 'numeric',
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
  });
}
