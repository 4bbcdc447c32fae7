// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * Shared utility code.
 */

import * as fs from 'fs';

import { sprintf } from 'sprintf-js';

/** Format a duration in minutes with two decimal places, e.g. 90 --> '90.00'. */
export function formatMinutes(mins: number): string {
  if (mins === Infinity) {
    return 'inf';
  }
  return sprintf('%.2f', mins);
}

/** Format minutes as a clock offset from the start of the plan, e.g. 95 --> '+1:35'. */
export function formatClock(mins: number): string {
  const whole = Math.round(mins);
  const hours = Math.floor(whole / 60);
  return sprintf('+%d:%02d', hours, whole % 60);
}

/** Check whether a file or directory exists. */
export function fileExists(filename: string): boolean {
  try {
    fs.accessSync(filename, fs.constants.F_OK);
  } catch (e) {
    return false;
  }
  return true;
}

/** Like Number(text), but throws on invalid input. */
export function parseNumber(text: string): number {
  const x = Number(text);
  if (text.trim() === '' || isNaN(x)) {
    throw new Error(`'${text}' is not a number.`);
  }
  return x;
}
