// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * Human-readable summaries of a joint plan.
 */

import * as _ from 'lodash';
import { sprintf } from 'sprintf-js';

import { parseEdgeKey, Schedule } from './joint-state';
import { TripSpec } from './options';
import { Solution } from './scheduler';
import { formatClock, formatMinutes } from './utils';

/** Totals, then one block per taxi with its route, completion time and waits. */
export function formatSolution(trips: TripSpec[], solution: Solution): string[] {
  const lines = [
    `Total objective (sum of completion times) = ${formatMinutes(solution.totalCost)} minutes`,
  ];
  solution.state.forEach((taxi, i) => {
    const [origin, destination] = trips[i];
    lines.push('');
    lines.push(`Taxi ${i + 1} (${origin} -> ${destination}):`);
    lines.push(`  Route: ${taxi.route.join(' -> ')}`);
    lines.push(`  Completion time (min): ${formatMinutes(taxi.availableAt)}`);
    if (taxi.waitEvents.length) {
      lines.push('  Wait events:');
      for (const w of taxi.waitEvents) {
        lines.push(`   - Node ${w.node} from ${formatMinutes(w.fromTime)} ` +
            `to ${formatMinutes(w.toTime)} (reason: ${w.reason})`);
      }
    }
  });
  return lines;
}

/**
 * A text stand-in for a Gantt chart: one line per edge crossing, ordered by start time.
 * Crossings placed over capacity are marked with a '!'.
 */
export function formatTimeline(schedule: Schedule): string[] {
  const entries = _.sortBy(schedule, ['start', 'taxiIndex']);
  return entries.map(entry => {
    const [u, v] = parseEdgeKey(entry.edgeKey);
    return sprintf('%s taxi %-3d %-9s %6s -> %6s',
        entry.degraded ? '!' : ' ',
        entry.taxiIndex + 1,
        `${u}-${v}`,
        formatClock(entry.start),
        formatClock(entry.end));
  });
}
