/**
 * Time utilities for run identifiers and report labels
 */

import { format } from 'date-fns';

export function formatTimestamp(date: Date): string {
  return format(date, 'yyyyMMdd-HHmmss');
}

export function getRunId(date: Date, suffix: string): string {
  return `${formatTimestamp(date)}__${suffix.substring(0, 8)}`;
}

export function secondsToWholeMinutes(seconds: number): number {
  return Math.floor(seconds / 60);
}
