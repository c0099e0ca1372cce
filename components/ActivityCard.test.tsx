// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { chessClub, emails } from '../test-utils/fixtures';
import ActivityCard from './ActivityCard';

afterEach(cleanup);

describe('ActivityCard', () => {
  it('shows capacity and the schedule', () => {
    render(<ActivityCard activity={chessClub(emails(9))} canManage={false} onRegister={vi.fn()} onUnregister={vi.fn()} />);

    expect(screen.getByText('9 enrolled')).toBeTruthy();
    expect(screen.getByText('1 spots left')).toBeTruthy();
    expect(screen.getByText('Monday, Friday, 3:15 PM - 4:45 PM')).toBeTruthy();
    expect(screen.getByText('Academic')).toBeTruthy();
    expect(screen.getByText('Teachers can register students.')).toBeTruthy();
    expect(screen.queryByRole('button')).toBeNull();
  });

  it('lets staff register and unregister', () => {
    const onRegister = vi.fn();
    const onUnregister = vi.fn();
    render(<ActivityCard activity={chessClub(emails(2))} canManage onRegister={onRegister} onUnregister={onUnregister} />);

    fireEvent.click(screen.getByRole('button', { name: 'Register Student' }));
    expect(onRegister).toHaveBeenCalledWith('Chess Club');

    fireEvent.click(screen.getByRole('button', { name: 'Unregister student2@school.edu' }));
    expect(onUnregister).toHaveBeenCalledWith('Chess Club', 'student2@school.edu');
  });

  it('disables registration when full', () => {
    render(<ActivityCard activity={chessClub(emails(10))} canManage onRegister={vi.fn()} onUnregister={vi.fn()} />);
    expect(screen.getByRole('button', { name: 'Activity Full' })).toHaveProperty('disabled', true);
    expect(screen.getByText('0 spots left')).toBeTruthy();
  });
});
