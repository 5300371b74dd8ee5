import type { TimeEntry } from '@pulseboard/core';
import type { TeamTimeRow } from './types.js';

/**
 * Hours and billable amount per team, busiest team first.
 */
export function timeRecordedPerTeam(entries: TimeEntry[]): TeamTimeRow[] {
    const byTeam = new Map<string, TeamTimeRow>();
    for (const entry of entries) {
        const row = byTeam.get(entry.team) ?? { team: entry.team, hours: 0, billableAmount: 0 };
        row.hours += entry.hours;
        row.billableAmount += entry.billableAmount;
        byTeam.set(entry.team, row);
    }
    return [...byTeam.values()].sort((a, b) => b.hours - a.hours);
}
